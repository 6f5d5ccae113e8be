import { describe, it, expect } from 'vitest';
import {
    AlreadyMemberError, DuplicatePendingError, GroupFullError, JoinOutcome, JoinRequest, NotFoundError,
    UnauthorizedError, ValidationError
} from '../src/index.js';
import { createTestEngine, DAY, daysAfter, expectRosterInvariants, T0 } from './helpers.js';

const MINUTE = 60 * 1000;

function pendingRequest(outcome: JoinOutcome): JoinRequest {
    if (outcome.status !== 'pending') throw new Error(`expected a pending request, got ${outcome.status}`);
    return outcome.request;
}

describe('MembershipStateMachine', () => {
    describe('direct join', () => {
        it('adds the joiner as a read-only member', async () => {
            const { engine, clock } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            clock.advance(MINUTE);

            const outcome = await engine.as('bob').requestJoin(group.inviteCode, ' Bob ');

            expect(outcome.status).toBe('joined');
            const members = await engine.as('alice').members(group.id);
            expect(members.map(m => [m.userId, m.role, m.permission, m.displayName])).toEqual([
                ['alice', 'admin', 'write', 'Admin'],
                ['bob', 'member', 'read', 'Bob'],
            ]);
            const updated = await engine.as('alice').getGroup(group.id);
            expect(updated.memberIds).toEqual(['alice', 'bob']);
            expect(updated.writePermissionIds).toEqual(['alice']);
            expectRosterInvariants(updated);
        });

        it('creates the joiner profile on first interaction', async () => {
            const { engine, store } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');

            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');

            await expect(store.get({ collection: 'userProfiles', id: 'bob' })).resolves.toEqual({
                userId: 'bob',
                canCreateGroup: true,
                cooldownEndDate: null,
                lastTransitionAt: null,
                transitionCount: 0,
                ownedGroupId: null,
            });
        });

        it('rejects members joining again', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');

            await expect(engine.as('alice').requestJoin(group.inviteCode, 'Alice')).rejects.toBeInstanceOf(AlreadyMemberError);
            await expect(engine.as('bob').requestJoin(group.inviteCode, 'Bob')).rejects.toMatchObject({ code: 'ALREADY_MEMBER' });
        });

        it('rejects a fourth member', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');
            await engine.as('carol').requestJoin(group.inviteCode, 'Carol');

            const attempt = engine.as('dave').requestJoin(group.inviteCode, 'Dave');

            await expect(attempt).rejects.toBeInstanceOf(GroupFullError);
            await expect(attempt).rejects.toThrow('This group is full (maximum 3 members).');
        });

        it('rejects unknown codes and blank display names', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');

            await expect(engine.as('bob').requestJoin('NOPE00', 'Bob')).rejects.toBeInstanceOf(NotFoundError);
            await expect(engine.as('bob').requestJoin(group.inviteCode, '  ')).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('approval flow', () => {
        async function approvalGroup() {
            const setup = createTestEngine();
            const group = await setup.engine.as('alice').createGroup('Family', { requireApproval: true });
            return { ...setup, group };
        }

        it('creates a pending request without touching the roster', async () => {
            const { engine, group } = await approvalGroup();

            const request = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));

            expect(request).toMatchObject({ groupId: group.id, userId: 'bob', userName: 'Bob', status: 'pending', requestedAt: T0 });
            expect((await engine.as('alice').getGroup(group.id)).memberIds).toEqual(['alice']);
            await expect(engine.as('bob').requestJoin(group.inviteCode, 'Bob')).rejects.toBeInstanceOf(DuplicatePendingError);
        });

        it('adds the requester when an admin approves', async () => {
            const { engine, group } = await approvalGroup();
            const alice = engine.as('alice');
            const request = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));

            const result = await alice.approve(group.id, request.id);

            expect(result.member).toMatchObject({ userId: 'bob', role: 'member', permission: 'read', displayName: 'Bob' });
            expect(result.request).toMatchObject({ status: 'approved', resolvedBy: 'alice', resolvedAt: T0 });
            expect(result.group.memberIds).toEqual(['alice', 'bob']);
            await expect(alice.pendingRequests(group.id)).resolves.toEqual([]);
        });

        it('only lets admins act on requests', async () => {
            const { engine, group } = await approvalGroup();
            const request = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));

            await expect(engine.as('bob').approve(group.id, request.id)).rejects.toBeInstanceOf(UnauthorizedError);
            await expect(engine.as('bob').pendingRequests(group.id)).rejects.toBeInstanceOf(UnauthorizedError);
        });

        it('keeps the request pending when the group filled up in the meantime', async () => {
            const { engine, group } = await approvalGroup();
            const alice = engine.as('alice');
            const bob = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));
            const carol = pendingRequest(await engine.as('carol').requestJoin(group.inviteCode, 'Carol'));
            const dave = pendingRequest(await engine.as('dave').requestJoin(group.inviteCode, 'Dave'));
            await alice.approve(group.id, bob.id);
            await alice.approve(group.id, carol.id);

            await expect(alice.approve(group.id, dave.id)).rejects.toBeInstanceOf(GroupFullError);

            const pending = await alice.pendingRequests(group.id);
            expect(pending.map(r => r.id)).toEqual([dave.id]);
        });

        it('denies a request, which can then be submitted again', async () => {
            const { engine, group } = await approvalGroup();
            const alice = engine.as('alice');
            const request = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));

            const denied = await alice.deny(group.id, request.id);

            expect(denied).toMatchObject({ status: 'denied', resolvedBy: 'alice' });
            await expect(alice.approve(group.id, request.id)).rejects.toBeInstanceOf(NotFoundError);
            await expect(engine.as('bob').requestJoin(group.inviteCode, 'Bob')).resolves.toMatchObject({ status: 'pending' });
        });

        it('lets only the requester cancel', async () => {
            const { engine, group } = await approvalGroup();
            const request = pendingRequest(await engine.as('bob').requestJoin(group.inviteCode, 'Bob'));

            await expect(engine.as('alice').cancelRequest(group.id, request.id)).rejects.toBeInstanceOf(UnauthorizedError);
            await expect(engine.as('bob').cancelRequest(group.id, request.id)).resolves.toMatchObject({ status: 'cancelled' });
            await expect(engine.as('alice').pendingRequests(group.id)).resolves.toEqual([]);
        });
    });

    describe('leave', () => {
        it('removes the member and starts a 30 day cooldown', async () => {
            const { engine, clock } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');
            const leftAt = daysAfter(T0, 2);
            clock.set(leftAt);

            const profile = await engine.as('bob').leave(group.id);

            expect(profile).toMatchObject({ canCreateGroup: false, cooldownEndDate: daysAfter(leftAt, 30), transitionCount: 0 });
            const updated = await engine.as('alice').getGroup(group.id);
            expect(updated.memberIds).toEqual(['alice']);
            await expect(engine.as('alice').members(group.id)).resolves.toHaveLength(1);
        });

        it('strips admin rights from a departing admin', async () => {
            const { engine, clock } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');
            clock.advance(30 * DAY);
            await engine.as('alice').promote(group.id, 'bob');

            await engine.as('bob').leave(group.id);

            const updated = await engine.as('alice').getGroup(group.id);
            expect(updated.adminIds).toEqual(['alice']);
            expect(updated.writePermissionIds).toEqual(['alice']);
            expectRosterInvariants(updated);
        });

        it('does not let the creator leave', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');

            await expect(engine.as('alice').leave(group.id)).rejects.toBeInstanceOf(UnauthorizedError);
        });

        it('rejects actors who are not members', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');

            await expect(engine.as('bob').leave(group.id)).rejects.toMatchObject({ resource: 'member' });
        });
    });

    describe('removeMember', () => {
        it('lets the creator remove a member, who then gets a cooldown', async () => {
            const { engine } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');

            const profile = await engine.as('alice').removeMember(group.id, 'bob');

            expect(profile.cooldownEndDate).toEqual(daysAfter(T0, 30));
            await expect(engine.as('bob').checkAccess(group.id, 'ReadContent')).resolves.toEqual({ allowed: false, reason: 'not-member' });
        });

        it('refuses other admins and the creator as a target', async () => {
            const { engine, clock } = createTestEngine();
            const group = await engine.as('alice').createGroup('Family');
            await engine.as('bob').requestJoin(group.inviteCode, 'Bob');
            await engine.as('carol').requestJoin(group.inviteCode, 'Carol');
            clock.advance(30 * DAY);
            await engine.as('alice').promote(group.id, 'bob');

            await expect(engine.as('bob').removeMember(group.id, 'carol')).rejects.toThrow('Only the group creator can perform this action.');
            await expect(engine.as('alice').removeMember(group.id, 'alice')).rejects.toBeInstanceOf(UnauthorizedError);
        });
    });
});
