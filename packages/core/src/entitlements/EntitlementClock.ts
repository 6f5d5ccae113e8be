import type { Group, Member, TrialStatus, UserProfile } from "../domain/models.js";
import type { Clock } from "./clock.js";
import { canBecomeAdmin, getTrialStatus, isCooldownActive, isTrialValid, refreshProfile } from "./trial.js";

/**
 * Server-clock view of trial windows, cooldowns and admin tenure. Nothing here
 * takes a caller-supplied timestamp.
 */
export class EntitlementClock {
    constructor(private clock: Clock) { }

    now(): Date {
        return this.clock.now();
    }

    isTrialValid(group: Group): boolean {
        return isTrialValid(group, this.clock.now());
    }

    trialStatus(group: Group): TrialStatus {
        return getTrialStatus(group, this.clock.now());
    }

    isCooldownActive(profile: UserProfile): boolean {
        return isCooldownActive(profile, this.clock.now());
    }

    effectiveProfile(profile: UserProfile): UserProfile {
        return refreshProfile(profile, this.clock.now());
    }

    canBecomeAdmin(member: Pick<Member, "joinedAt">): boolean {
        return canBecomeAdmin(member, this.clock.now());
    }
}
