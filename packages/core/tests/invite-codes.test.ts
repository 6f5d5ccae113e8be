import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    AllocationExhaustedError, generateInviteCode, InviteCodeAllocator, isWellFormedInviteCode, keyOf,
    NotFoundError, normalizeInviteCode
} from '../src/index.js';
import { createTestEngine, scriptedCodes, T0 } from './helpers.js';

describe('Invite Code Allocator', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('generates six uppercase alphanumeric characters', () => {
        for (let i = 0; i < 20; i++) {
            expect(generateInviteCode()).toMatch(/^[A-Z0-9]{6}$/);
        }
    });

    it('normalizes user input before lookup', () => {
        expect(normalizeInviteCode('  x7k2qp ')).toBe('X7K2QP');
        expect(isWellFormedInviteCode('X7K2QP')).toBe(true);
        expect(isWellFormedInviteCode('X7K2Q')).toBe(false);
        expect(isWellFormedInviteCode('X7K-QP')).toBe(false);
    });

    it('resolves a freshly allocated code to its group, in any case', async () => {
        const { engine } = createTestEngine();
        const group = await engine.as('alice').createGroup('Family');

        await expect(engine.invites.resolve(group.inviteCode)).resolves.toBe(group.id);
        await expect(engine.invites.resolve(group.inviteCode.toLowerCase())).resolves.toBe(group.id);
    });

    it('round-trips a standalone allocation for an existing group', async () => {
        const { engine, store } = createTestEngine();
        const group = await engine.as('alice').createGroup('Family');
        const allocator = new InviteCodeAllocator(store, engine.clock, scriptedCodes('QQQ111'));

        const code = await allocator.allocate(group.id);

        expect(code).toBe('QQQ111');
        await expect(allocator.resolve(code)).resolves.toBe(group.id);
        await expect(store.get(keyOf('inviteCodes', code))).resolves.toEqual({ code, groupId: group.id, createdAt: T0 });
    });

    it('reports unknown and malformed codes as not found', async () => {
        const { engine } = createTestEngine();

        await expect(engine.invites.resolve('ZZZZZZ')).rejects.toBeInstanceOf(NotFoundError);
        await expect(engine.invites.resolve('!!')).rejects.toMatchObject({ resource: 'inviteCode' });
    });

    it('stops resolving the code once the group is deleted', async () => {
        const { engine } = createTestEngine();
        const alice = engine.as('alice');
        const group = await alice.createGroup('Family');

        await alice.deleteGroup(group.id);

        await expect(engine.invites.resolve(group.inviteCode)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('draws again when a code is taken by a live group', async () => {
        const { engine } = createTestEngine({ generateInviteCode: scriptedCodes('AAAAAA', 'AAAAAA', 'BBBBBB') });

        const first = await engine.as('alice').createGroup('Family');
        const second = await engine.as('bob').createGroup('Neighbours');

        expect(first.inviteCode).toBe('AAAAAA');
        expect(second.inviteCode).toBe('BBBBBB');
    });

    it('skips generator output that is not a valid code', async () => {
        const { engine } = createTestEngine({ generateInviteCode: scriptedCodes('abc', 'cd34ef') });

        const group = await engine.as('alice').createGroup('Family');

        expect(group.inviteCode).toBe('CD34EF');
    });

    it('reuses the code of a deleted group', async () => {
        const { engine } = createTestEngine({ generateInviteCode: scriptedCodes('AAAAAA', 'AAAAAA') });
        const alice = engine.as('alice');
        const first = await alice.createGroup('Family');
        await alice.deleteGroup(first.id);

        const second = await engine.as('bob').createGroup('Neighbours');

        expect(second.inviteCode).toBe('AAAAAA');
        await expect(engine.invites.resolve('AAAAAA')).resolves.toBe(second.id);
    });

    it('fails loudly when every attempt collides', async () => {
        const alarm = vi.spyOn(console, 'error').mockImplementation(() => { });
        const { engine } = createTestEngine({ generateInviteCode: () => 'AAAAAA' });
        await engine.as('alice').createGroup('Family');

        const attempt = engine.as('bob').createGroup('Neighbours');

        await expect(attempt).rejects.toBeInstanceOf(AllocationExhaustedError);
        await expect(attempt).rejects.toMatchObject({ attempts: 10, code: 'ALLOCATION_EXHAUSTED' });
        expect(alarm).toHaveBeenCalledTimes(1);
        await expect(engine.as('bob').myGroups()).resolves.toEqual([]);
    });
});
