import type { Group, JoinRequest, Member } from "./models.js";

export interface CreateGroupOptions {
    requireApproval?: boolean;
    /** The creator's display name in the new group. Defaults to "Admin". */
    displayName?: string;
    /** Delete the actor's current group first instead of failing with AlreadyOwnsGroup. */
    replaceExisting?: boolean;
}

export interface UpdateGroupMetaDTO {
    name?: string;
    requireApproval?: boolean;
}

export interface UpdateMemberDTO {
    displayName?: string;
    isAccessEnabled?: boolean;
}

export type JoinOutcome =
    | { status: "joined"; group: Group; member: Member }
    | { status: "pending"; request: JoinRequest };
