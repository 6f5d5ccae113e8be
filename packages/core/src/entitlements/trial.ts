import { addDays, differenceInCalendarDays, isAfter, isBefore, subDays } from "date-fns";
import type { Group, Member, TrialStatus, UserProfile } from "../domain/models.js";
import { ADMIN_TENURE_DAYS, COOLDOWN_DAYS, TRIAL_LENGTH_DAYS } from "../domain/policy.js";

export const trialEndFor = (createdAt: Date): Date => addDays(createdAt, TRIAL_LENGTH_DAYS);

export const cooldownEndFor = (leftAt: Date): Date => addDays(leftAt, COOLDOWN_DAYS);

export function isTrialValid(group: Pick<Group, "hasActiveSubscription" | "trialEndDate">, now: Date): boolean {
    return group.hasActiveSubscription || isBefore(now, group.trialEndDate);
}

export function getTrialStatus(group: Pick<Group, "hasActiveSubscription" | "trialEndDate">, now: Date): TrialStatus {
    return {
        valid: isTrialValid(group, now),
        subscribed: group.hasActiveSubscription,
        endsAt: group.trialEndDate,
        daysRemaining: Math.max(0, differenceInCalendarDays(group.trialEndDate, now)),
    };
}

export function isCooldownActive(profile: Pick<UserProfile, "cooldownEndDate">, now: Date): boolean {
    return profile.cooldownEndDate !== null && !isAfter(now, profile.cooldownEndDate);
}

/**
 * The stored `canCreateGroup` flag is only cleared by a departure and only
 * restored on the next interaction; this is the value it should have at `now`.
 */
export function refreshProfile(profile: UserProfile, now: Date): UserProfile {
    const canCreateGroup = !isCooldownActive(profile, now);
    return canCreateGroup === profile.canCreateGroup ? profile : { ...profile, canCreateGroup };
}

/**
 * A departure recorded after the last transition makes the next group the
 * actor creates a member to own-admin transition. Re-creating an own group
 * with no departure in between is not one.
 */
export function hasDepartedSinceLastTransition(profile: Pick<UserProfile, "cooldownEndDate" | "lastTransitionAt">): boolean {
    if (profile.cooldownEndDate === null) return false;
    const departedAt = subDays(profile.cooldownEndDate, COOLDOWN_DAYS);
    return profile.lastTransitionAt === null || !isBefore(departedAt, profile.lastTransitionAt);
}

export function canBecomeAdmin(member: Pick<Member, "joinedAt">, now: Date): boolean {
    return !isAfter(member.joinedAt, subDays(now, ADMIN_TENURE_DAYS));
}
