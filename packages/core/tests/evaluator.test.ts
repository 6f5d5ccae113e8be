import { describe, it, expect } from 'vitest';
import { addDays } from 'date-fns';
import {
    authorize, canPerform, evaluate, Group, isOperationClass, Member,
    TrialExpiredError, UnauthenticatedError, UnauthorizedError
} from '../src/index.js';
import { SECOND, T0 } from './helpers.js';

const group = (overrides: Partial<Group> = {}): Group => ({
    id: 'g1',
    name: 'Family',
    inviteCode: 'ABC123',
    createdBy: 'alice',
    adminIds: ['alice', 'bob'],
    memberIds: ['alice', 'bob', 'carol'],
    writePermissionIds: ['alice', 'bob'],
    requireApproval: false,
    trialEndDate: addDays(T0, 14),
    hasActiveSubscription: false,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
});

const member = (userId: string, overrides: Partial<Member> = {}): Member => ({
    userId,
    groupId: 'g1',
    role: 'member',
    permission: 'read',
    displayName: userId,
    isAccessEnabled: true,
    joinedAt: T0,
    ...overrides,
});

describe('Role & Permission Evaluator', () => {
    const now = T0;

    it('denies every operation to an unauthenticated actor', () => {
        expect(evaluate(null, group(), 'ReadGroupMeta', { now })).toEqual({ allowed: false, reason: 'unauthenticated' });
        expect(evaluate('', group(), 'ReadContent', { now })).toEqual({ allowed: false, reason: 'unauthenticated' });
    });

    it('lets any authenticated actor read group meta', () => {
        expect(canPerform('stranger', group(), 'ReadGroupMeta', { now })).toBe(true);
        expect(canPerform('stranger', group({ trialEndDate: addDays(T0, -1) }), 'ReadGroupMeta', { now })).toBe(true);
    });

    it('restricts content reads to members', () => {
        expect(canPerform('carol', group(), 'ReadContent', { now })).toBe(true);
        expect(evaluate('stranger', group(), 'ReadContent', { now })).toEqual({ allowed: false, reason: 'not-member' });
    });

    it('restricts content writes to write-permitted members', () => {
        expect(canPerform('bob', group(), 'WriteContent', { now })).toBe(true);
        expect(evaluate('carol', group(), 'WriteContent', { now })).toEqual({ allowed: false, reason: 'no-write-permission' });
        expect(evaluate('stranger', group(), 'WriteContent', { now })).toEqual({ allowed: false, reason: 'not-member' });
    });

    it('denies content to a member whose access is disabled', () => {
        const disabled = member('carol', { isAccessEnabled: false });
        expect(evaluate('carol', group(), 'ReadContent', { now, member: disabled })).toEqual({ allowed: false, reason: 'access-disabled' });
        expect(canPerform('carol', group(), 'ReadContent', { now, member: member('carol') })).toBe(true);
    });

    it('only sees a disabled member when the member entry is supplied', () => {
        const disabled = member('carol', { isAccessEnabled: false });
        expect(canPerform('carol', group(), 'ReadContent', { now })).toBe(true);
        expect(canPerform('carol', group(), 'ReadContent', { now, member: disabled })).toBe(false);
    });

    it('ignores a member record that belongs to someone else', () => {
        const disabledBob = member('bob', { isAccessEnabled: false });
        expect(canPerform('carol', group(), 'ReadContent', { now, member: disabledBob })).toBe(true);
    });

    describe('trial boundary', () => {
        const trialEnd = addDays(T0, 14);
        const before = new Date(trialEnd.getTime() - SECOND);
        const after = new Date(trialEnd.getTime() + SECOND);

        it('allows content one second before the trial ends and denies it one second after', () => {
            expect(canPerform('carol', group(), 'ReadContent', { now: before })).toBe(true);
            expect(evaluate('carol', group(), 'ReadContent', { now: after })).toEqual({ allowed: false, reason: 'trial-expired' });
            expect(evaluate('bob', group(), 'WriteContent', { now: after })).toEqual({ allowed: false, reason: 'trial-expired' });
        });

        it('treats the exact end instant as expired', () => {
            expect(canPerform('carol', group(), 'ReadContent', { now: trialEnd })).toBe(false);
        });

        it('keeps content open on both sides when the group is subscribed', () => {
            const subscribed = group({ hasActiveSubscription: true });
            expect(canPerform('carol', subscribed, 'ReadContent', { now: before })).toBe(true);
            expect(canPerform('carol', subscribed, 'ReadContent', { now: after })).toBe(true);
        });
    });

    it('separates ordinary roster management from creator-only operations', () => {
        expect(canPerform('bob', group(), 'ManageRoster', { now })).toBe(true);
        expect(evaluate('carol', group(), 'ManageRoster', { now })).toEqual({ allowed: false, reason: 'not-admin' });
        expect(evaluate('bob', group(), 'ManageRoster', { now, rosterScope: 'privileged' })).toEqual({ allowed: false, reason: 'not-owner' });
        expect(canPerform('alice', group(), 'ManageRoster', { now, rosterScope: 'privileged' })).toBe(true);
    });

    it('limits group meta changes to admins, regardless of the trial', () => {
        const expired = group({ trialEndDate: addDays(T0, -1) });
        expect(canPerform('bob', expired, 'ManageGroupMeta', { now })).toBe(true);
        expect(canPerform('carol', expired, 'ManageGroupMeta', { now })).toBe(false);
    });

    it('throws the matching error from authorize', () => {
        const expired = group({ trialEndDate: addDays(T0, -1) });
        expect(() => authorize(undefined, group(), 'ReadContent', { now })).toThrow(UnauthenticatedError);
        expect(() => authorize('carol', expired, 'ReadContent', { now })).toThrow(TrialExpiredError);
        expect(() => authorize('carol', group(), 'ManageGroupMeta', { now })).toThrow('Only admins can perform this action.');
        expect(() => authorize('carol', group(), 'WriteContent', { now })).toThrow(UnauthorizedError);
        expect(() => authorize('alice', group(), 'WriteContent', { now })).not.toThrow();
    });

    it('recognizes operation class names', () => {
        expect(isOperationClass('WriteContent')).toBe(true);
        expect(isOperationClass('DeleteEverything')).toBe(false);
    });
});
