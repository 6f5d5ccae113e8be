import type { Group, GroupSummary, JoinRequest, Member, TrialStatus, UserProfile } from "./domain/models.js";
import type { CreateGroupOptions, JoinOutcome, UpdateGroupMetaDTO, UpdateMemberDTO } from "./domain/dtos.js";
import type { Decision, OperationClass } from "./access/evaluator.js";
import type { ApprovalResult } from "./membership/MembershipStateMachine.js";
import type { CareCircleEngine } from "./CareCircleEngine.js";

/** The invite-code surface for one actor. */
export class CareCircleClient {
    constructor(private engine: CareCircleEngine, public readonly actorId: string) { }

    createGroup(name: string, options?: CreateGroupOptions): Promise<Group> {
        return this.engine.groups.createGroup(this.actorId, name, options);
    }

    requestJoin(code: string, displayName: string): Promise<JoinOutcome> {
        return this.engine.membership.requestJoin(this.actorId, code, displayName);
    }

    approve(groupId: string, requestId: string): Promise<ApprovalResult> {
        return this.engine.membership.approve(this.actorId, groupId, requestId);
    }

    deny(groupId: string, requestId: string): Promise<JoinRequest> {
        return this.engine.membership.deny(this.actorId, groupId, requestId);
    }

    cancelRequest(groupId: string, requestId: string): Promise<JoinRequest> {
        return this.engine.membership.cancel(this.actorId, groupId, requestId);
    }

    pendingRequests(groupId: string): Promise<JoinRequest[]> {
        return this.engine.membership.listPendingRequests(this.actorId, groupId);
    }

    leave(groupId: string): Promise<UserProfile> {
        return this.engine.membership.leave(this.actorId, groupId);
    }

    removeMember(groupId: string, memberId: string): Promise<UserProfile> {
        return this.engine.membership.removeMember(this.actorId, groupId, memberId);
    }

    startOwnGroupAfterLeaving(name: string, options?: CreateGroupOptions): Promise<Group> {
        return this.engine.membership.startOwnGroupAfterLeaving(this.actorId, name, options);
    }

    promote(groupId: string, memberId: string): Promise<Member> {
        return this.engine.groups.promoteToAdmin(this.actorId, groupId, memberId);
    }

    toggleAccess(groupId: string, memberId: string, enabled: boolean): Promise<Member> {
        return this.engine.groups.toggleAccess(this.actorId, groupId, memberId, enabled);
    }

    updateMember(groupId: string, memberId: string, dto: UpdateMemberDTO): Promise<Member> {
        return this.engine.groups.updateMember(this.actorId, groupId, memberId, dto);
    }

    updateGroupMeta(groupId: string, dto: UpdateGroupMetaDTO): Promise<Group> {
        return this.engine.groups.updateGroupMeta(this.actorId, groupId, dto);
    }

    deleteGroup(groupId: string): Promise<void> {
        return this.engine.groups.deleteGroup(this.actorId, groupId);
    }

    getGroup(groupId: string): Promise<Group> {
        return this.engine.groups.getGroup(this.actorId, groupId);
    }

    summary(groupId: string): Promise<GroupSummary> {
        return this.engine.groups.getSummary(this.actorId, groupId);
    }

    previewInvite(code: string): Promise<GroupSummary> {
        return this.engine.groups.previewInvite(this.actorId, code);
    }

    members(groupId: string): Promise<Member[]> {
        return this.engine.groups.listMembers(this.actorId, groupId);
    }

    myGroups(): Promise<Group[]> {
        return this.engine.groups.listGroupsForActor(this.actorId);
    }

    profile(): Promise<UserProfile> {
        return this.engine.groups.getProfile(this.actorId);
    }

    trialStatus(groupId: string): Promise<TrialStatus> {
        return this.engine.groups.trialStatus(this.actorId, groupId);
    }

    checkAccess(groupId: string, op: OperationClass): Promise<Decision> {
        return this.engine.groups.checkAccess(this.actorId, groupId, op);
    }
}
