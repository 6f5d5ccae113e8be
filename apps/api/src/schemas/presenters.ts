import type { Group, GroupSummary, JoinRequest, Member, TrialStatus, UserProfile } from '@carecircle/core';

// Domain objects hold Dates; responses carry ISO strings.
const iso = (date: Date) => date.toISOString();
const isoOrNull = (date: Date | null) => (date ? date.toISOString() : null);

export const presentGroup = (g: Group) => ({
    ...g,
    trialEndDate: iso(g.trialEndDate),
    createdAt: iso(g.createdAt),
    updatedAt: iso(g.updatedAt),
});

export const presentSummary = (s: GroupSummary) => ({ ...s, trialEndDate: iso(s.trialEndDate) });

export const presentMember = (m: Member) => ({ ...m, joinedAt: iso(m.joinedAt) });

export const presentJoinRequest = (r: JoinRequest) => ({
    ...r,
    requestedAt: iso(r.requestedAt),
    resolvedAt: isoOrNull(r.resolvedAt),
});

export const presentProfile = (p: UserProfile) => ({
    ...p,
    cooldownEndDate: isoOrNull(p.cooldownEndDate),
    lastTransitionAt: isoOrNull(p.lastTransitionAt),
});

export const presentTrialStatus = (t: TrialStatus) => ({ ...t, endsAt: iso(t.endsAt) });
