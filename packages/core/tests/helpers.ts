import { addDays } from 'date-fns';
import { expect } from 'vitest';
import {
    CareCircleEngine, CareCircleConfig, Group, InMemoryDocumentStore, ManualClock, MAX_GROUP_MEMBERS,
    generateInviteCode, InviteCodeGenerator
} from '../src/index.js';

export const T0 = new Date('2026-03-02T09:00:00.000Z');
export const SECOND = 1000;
export const DAY = 24 * 60 * 60 * SECOND;

/** Hands out the given codes in order, then falls back to random ones. */
export const scriptedCodes = (...codes: string[]): InviteCodeGenerator => () => codes.shift() ?? generateInviteCode();

export function createTestEngine(config: Omit<CareCircleConfig, 'clock' | 'store'> = {}) {
    const clock = new ManualClock(T0);
    const store = new InMemoryDocumentStore();
    const engine = new CareCircleEngine({ ...config, clock, store });
    return { engine, clock, store };
}

export const daysAfter = (date: Date, days: number) => addDays(date, days);

export function expectRosterInvariants(group: Group) {
    expect(group.memberIds.length).toBeLessThanOrEqual(MAX_GROUP_MEMBERS);
    expect(group.adminIds.length).toBeGreaterThanOrEqual(1);
    for (const id of group.adminIds) expect(group.memberIds).toContain(id);
    for (const id of group.writePermissionIds) expect(group.adminIds).toContain(id);
    expect(group.adminIds).toContain(group.createdBy);
    expect(group.memberIds).toContain(group.createdBy);
}
