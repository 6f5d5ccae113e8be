import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ManualClock, systemClock } from '@carecircle/core';
import { clearSession, getSession, loadStore, openContext, parseClock, saveSession, saveStore } from '../src/state.js';

describe('CLI state', () => {
    let dir: string;
    let statePath: string;
    let sessionPath: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'carecircle-cli-'));
        statePath = path.join(dir, 'state.json');
        sessionPath = path.join(dir, 'session.json');
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('starts from an empty store when there is no state file', async () => {
        const store = await loadStore(statePath);

        expect(store.snapshot().documents).toEqual([]);
    });

    it('persists groups across invocations', async () => {
        const first = await openContext({ state: statePath, as: 'alice', at: '2026-03-02T09:00:00.000Z' }, sessionPath);
        const group = await first.client.createGroup('Family');
        await first.save();

        const second = await openContext({ state: statePath, as: 'alice', at: '2026-03-03T09:00:00.000Z' }, sessionPath);
        const reloaded = await second.client.getGroup(group.id);

        expect(reloaded).toEqual(group);
        expect((await second.client.previewInvite(group.inviteCode)).name).toBe('Family');
    });

    it('round-trips a snapshot through the state file', async () => {
        const ctx = await openContext({ state: statePath, as: 'alice' }, sessionPath);
        await ctx.client.createGroup('Family');
        await ctx.save();

        const original = await loadStore(statePath);
        const copyPath = path.join(dir, 'copy.json');
        await saveStore(copyPath, original);

        expect(await fs.readFile(copyPath, 'utf-8')).toBe(await fs.readFile(statePath, 'utf-8'));
    });

    it('keeps the device id when a different user logs in', async () => {
        const alice = await saveSession('alice', sessionPath);
        const bob = await saveSession('bob', sessionPath);

        expect(bob).toEqual({ actorId: 'bob', deviceId: alice.deviceId });
        expect(await getSession(sessionPath)).toEqual(bob);
    });

    it('acts as the logged in user unless told otherwise', async () => {
        await saveSession('alice', sessionPath);

        const asSession = await openContext({ state: statePath }, sessionPath);
        const asBob = await openContext({ state: statePath, as: 'bob' }, sessionPath);

        expect(asSession.client.actorId).toBe('alice');
        expect(asBob.client.actorId).toBe('bob');
    });

    it('refuses to run without a user', async () => {
        await clearSession(sessionPath);
        const previous = process.env.CARECIRCLE_ACTOR;
        delete process.env.CARECIRCLE_ACTOR;
        try {
            await expect(openContext({ state: statePath }, sessionPath))
                .rejects.toThrow("Not logged in. Run 'carecircle login <user-id>' first.");
        } finally {
            if (previous !== undefined) process.env.CARECIRCLE_ACTOR = previous;
        }
    });

    it('parses --at into a fixed clock', () => {
        const clock = parseClock('2026-03-02T09:00:00.000Z');

        expect(clock).toBeInstanceOf(ManualClock);
        expect(clock.now().toISOString()).toBe('2026-03-02T09:00:00.000Z');
        expect(parseClock(undefined)).toBe(systemClock);
        expect(() => parseClock('yesterday')).toThrow('Invalid --at timestamp: yesterday');
    });
});
