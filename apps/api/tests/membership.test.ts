import { describe, it, expect, beforeEach } from 'vitest';
import { createTestApp, readJson } from './helpers.js';

const DAY = 24 * 60 * 60 * 1000;

describe('Invites & membership API', () => {
    let ctx: ReturnType<typeof createTestApp>;
    let groupId: string;

    beforeEach(async () => {
        ctx = createTestApp(['X7K2QP']);
        const res = await ctx.call('alice', 'POST', '/api/v1/groups', { name: 'Family' });
        const data = await readJson<{ id: string }>(res);
        groupId = data.id;
    });

    it('GET /api/v1/invites/:code previews the group in any case', async () => {
        const res = await ctx.call('bob', 'GET', '/api/v1/invites/x7k2qp');

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ id: groupId, name: 'Family', memberCount: 1, isFull: false });
    });

    it('POST /api/v1/invites/:code/join adds a read-only member', async () => {
        const res = await ctx.call('bob', 'POST', '/api/v1/invites/x7k2qp/join', { displayName: 'Bob' });

        expect(res.status).toBe(201);
        const data = await readJson<{ status: string; member: unknown; group: { memberIds: string[] } }>(res);
        expect(data.status).toBe('joined');
        expect(data.member).toEqual({
            userId: 'bob',
            groupId,
            role: 'member',
            permission: 'read',
            displayName: 'Bob',
            isAccessEnabled: true,
            joinedAt: '2026-03-02T09:00:00.000Z',
        });
        expect(data.group.memberIds).toEqual(['alice', 'bob']);
    });

    it('answers 409 with a distinct code for each roster violation', async () => {
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });
        await ctx.call('carol', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Carol' });

        const again = await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });
        expect(again.status).toBe(409);
        expect(await again.json()).toMatchObject({ code: 'ALREADY_MEMBER' });

        const full = await ctx.call('dave', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Dave' });
        expect(full.status).toBe(409);
        expect(await full.json()).toEqual({
            error: 'Conflict',
            code: 'GROUP_FULL',
            message: 'This group is full (maximum 3 members).',
        });
    });

    it('answers 404 for an unknown invite code', async () => {
        const res = await ctx.call('bob', 'POST', '/api/v1/invites/ZZZZZZ/join', { displayName: 'Bob' });

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Invalid invite code.' });
    });

    it('runs the approval flow when the group requires it', async () => {
        await ctx.call('alice', 'PATCH', `/api/v1/groups/${groupId}`, { requireApproval: true });

        const join = await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });
        expect(join.status).toBe(202);
        const pending = await readJson<{ status: string; request: { id: string; status: string } }>(join);
        expect(pending.status).toBe('pending');

        const duplicate = await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });
        expect(await duplicate.json()).toMatchObject({ code: 'DUPLICATE_PENDING' });

        const list = await ctx.call('alice', 'GET', `/api/v1/groups/${groupId}/requests`);
        const requests = await readJson<{ id: string }[]>(list);
        expect(requests.map(r => r.id)).toEqual([pending.request.id]);

        const approve = await ctx.call('alice', 'POST', `/api/v1/groups/${groupId}/requests/${pending.request.id}/approve`);
        expect(approve.status).toBe(200);
        expect(await approve.json()).toMatchObject({
            member: { userId: 'bob', role: 'member', permission: 'read' },
            request: { status: 'approved', resolvedBy: 'alice', resolvedAt: '2026-03-02T09:00:00.000Z' },
        });
    });

    it('lets the requester cancel and an admin deny', async () => {
        await ctx.call('alice', 'PATCH', `/api/v1/groups/${groupId}`, { requireApproval: true });
        const bob = await readJson<{ request: { id: string } }>(await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' }));
        const carol = await readJson<{ request: { id: string } }>(await ctx.call('carol', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Carol' }));

        const cancel = await ctx.call('bob', 'POST', `/api/v1/groups/${groupId}/requests/${bob.request.id}/cancel`);
        expect(await cancel.json()).toMatchObject({ status: 'cancelled' });

        const denyByMember = await ctx.call('carol', 'POST', `/api/v1/groups/${groupId}/requests/${carol.request.id}/deny`);
        expect(denyByMember.status).toBe(403);

        const deny = await ctx.call('alice', 'POST', `/api/v1/groups/${groupId}/requests/${carol.request.id}/deny`);
        expect(await deny.json()).toMatchObject({ status: 'denied', resolvedBy: 'alice' });
    });

    it('refuses an early promotion and allows it after 30 days', async () => {
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });

        const early = await ctx.call('alice', 'POST', `/api/v1/groups/${groupId}/members/bob/promote`);
        expect(early.status).toBe(403);
        expect(await early.json()).toMatchObject({ code: 'UNAUTHORIZED' });

        ctx.clock.advance(30 * DAY);
        const res = await ctx.call('alice', 'POST', `/api/v1/groups/${groupId}/members/bob/promote`);
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ userId: 'bob', role: 'admin', permission: 'write' });
    });

    it('toggles access and renames members', async () => {
        ctx.clock.advance(1000);
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });

        const disable = await ctx.call('alice', 'PATCH', `/api/v1/groups/${groupId}/members/bob`, { isAccessEnabled: false });
        expect(await disable.json()).toMatchObject({ isAccessEnabled: false });

        const decision = await ctx.call('bob', 'POST', `/api/v1/groups/${groupId}/authorize`, { operation: 'ReadContent' });
        expect(await decision.json()).toEqual({ allowed: false, reason: 'access-disabled' });

        const rename = await ctx.call('bob', 'PATCH', `/api/v1/groups/${groupId}/members/bob`, { displayName: 'Bobby' });
        expect(await rename.json()).toMatchObject({ displayName: 'Bobby' });

        const members = await ctx.call('alice', 'GET', `/api/v1/groups/${groupId}/members`);
        const list = await readJson<{ userId: string; displayName: string }[]>(members);
        expect(list.map(m => [m.userId, m.displayName])).toEqual([['alice', 'Admin'], ['bob', 'Bobby']]);
    });

    it('starts a cooldown when a member leaves', async () => {
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });

        const leave = await ctx.call('bob', 'POST', `/api/v1/groups/${groupId}/leave`);
        expect(leave.status).toBe(200);
        expect(await leave.json()).toMatchObject({ canCreateGroup: false, cooldownEndDate: '2026-04-01T09:00:00.000Z' });

        const create = await ctx.call('bob', 'POST', '/api/v1/groups', { name: 'Bob circle' });
        expect(create.status).toBe(403);
        expect(await create.json()).toMatchObject({ code: 'COOLDOWN_ACTIVE' });

        const profile = await ctx.call('bob', 'GET', '/api/v1/me/profile');
        expect(await profile.json()).toMatchObject({ canCreateGroup: false, transitionCount: 0 });
    });

    it('lets the creator remove a member but not leave', async () => {
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });

        const leave = await ctx.call('alice', 'POST', `/api/v1/groups/${groupId}/leave`);
        expect(leave.status).toBe(403);

        const remove = await ctx.call('alice', 'DELETE', `/api/v1/groups/${groupId}/members/bob`);
        expect(remove.status).toBe(204);
        const group = await readJson<{ memberIds: string[] }>(await ctx.call('alice', 'GET', `/api/v1/groups/${groupId}`));
        expect(group.memberIds).toEqual(['alice']);
    });

    it('lets a member start an own group once the cooldown is over', async () => {
        await ctx.call('bob', 'POST', '/api/v1/invites/X7K2QP/join', { displayName: 'Bob' });
        await ctx.call('bob', 'POST', `/api/v1/groups/${groupId}/leave`);
        ctx.clock.advance(31 * DAY);

        const res = await ctx.call('bob', 'POST', '/api/v1/groups/own', { name: 'Bob circle' });

        expect(res.status).toBe(201);
        expect(await res.json()).toMatchObject({ name: 'Bob circle', createdBy: 'bob' });
        const profile = await ctx.call('bob', 'GET', '/api/v1/me/profile');
        expect(await profile.json()).toMatchObject({ transitionCount: 1, canCreateGroup: true });
    });
});

describe('Daily access API', () => {
    it('grants one session per device per day', async () => {
        const ctx = createTestApp();
        const headers = { 'X-Device-Id': 'device-1' };

        const before = await ctx.call('bob', 'GET', '/api/v1/access/today', undefined, headers);
        expect(await before.json()).toEqual({ available: true, accessDate: '2026-03-02', msUntilNextAccess: 0 });

        const used = await ctx.call('bob', 'POST', '/api/v1/access/today', undefined, headers);
        expect(await used.json()).toEqual({ available: false, accessDate: '2026-03-02', msUntilNextAccess: 15 * 60 * 60 * 1000 });
    });

    it('requires the device header', async () => {
        const ctx = createTestApp();

        const res = await ctx.call('bob', 'GET', '/api/v1/access/today');

        expect(res.status).toBe(400);
    });
});
