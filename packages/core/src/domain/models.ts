export type MemberRole = "admin" | "member";
export type MemberPermission = "write" | "read";
export type JoinRequestStatus = "pending" | "approved" | "denied" | "cancelled";

export interface Group {
    id: string;
    name: string;
    inviteCode: string;
    createdBy: string;
    adminIds: string[];
    memberIds: string[];
    writePermissionIds: string[];
    requireApproval: boolean;
    trialEndDate: Date;
    hasActiveSubscription: boolean;
    createdAt: Date;
    updatedAt: Date;
}

export interface Member {
    userId: string;
    groupId: string;
    role: MemberRole;
    permission: MemberPermission;
    displayName: string;
    isAccessEnabled: boolean;
    joinedAt: Date;
}

export interface JoinRequest {
    id: string;
    groupId: string;
    userId: string;
    userName: string;
    status: JoinRequestStatus;
    requestedAt: Date;
    resolvedAt: Date | null;
    resolvedBy: string | null;
}

export interface UserProfile {
    userId: string;
    canCreateGroup: boolean;
    cooldownEndDate: Date | null;
    lastTransitionAt: Date | null;
    transitionCount: number;
    ownedGroupId: string | null;
}

export interface InviteCode {
    code: string;
    groupId: string;
    createdAt: Date;
}

export interface AccessSession {
    deviceId: string;
    accessDate: string; // yyyy-MM-dd, server calendar day
    used: boolean;
    updatedAt: Date;
}

/** What any authenticated actor may see about a group before joining it. */
export interface GroupSummary {
    id: string;
    name: string;
    memberCount: number;
    isFull: boolean;
    requireApproval: boolean;
    trialEndDate: Date;
    hasActiveSubscription: boolean;
}

export interface TrialStatus {
    valid: boolean;
    subscribed: boolean;
    endsAt: Date;
    daysRemaining: number;
}
