import { randomUUID } from "node:crypto";
import type { Group, JoinRequest, JoinRequestStatus, Member, UserProfile } from "../domain/models.js";
import type { CreateGroupOptions, JoinOutcome } from "../domain/dtos.js";
import { MAX_GROUP_MEMBERS } from "../domain/policy.js";
import {
    AlreadyMemberError, DuplicatePendingError, GroupFullError, NotFoundError, UnauthorizedError
} from "../errors.js";
import type { ITransaction } from "../infrastructure/IDocumentStore.js";
import { GroupRepository } from "../infrastructure/GroupRepository.js";
import { runInTransaction } from "../infrastructure/transactions.js";
import { authorize } from "../access/evaluator.js";
import { cooldownEndFor, refreshProfile } from "../entitlements/trial.js";
import type { GroupService, MembershipServiceDeps } from "./GroupService.js";
import { validateDisplayName } from "./validation.js";

export interface ApprovalResult {
    group: Group;
    member: Member;
    request: JoinRequest;
}

/**
 * NotMember -> Pending -> Member -> (Left | Removed), with NotMember -> Member
 * directly for groups that don't require approval. Every edge that touches the
 * roster writes the group document, so two racing edges on one group can never
 * both commit.
 */
export class MembershipStateMachine {
    constructor(private deps: MembershipServiceDeps, private groups: GroupService) { }

    private transaction<R>(label: string, fn: (repo: GroupRepository, tx: ITransaction) => Promise<R>): Promise<R> {
        return runInTransaction(this.deps.store, tx => fn(new GroupRepository(tx), tx), {
            label,
            maxAttempts: this.deps.transactionAttempts,
        });
    }

    async requestJoin(actorId: string, code: string, rawDisplayName: string): Promise<JoinOutcome> {
        const displayName = validateDisplayName(rawDisplayName);

        const outcome = await this.transaction("requestJoin", async (repo, tx): Promise<JoinOutcome> => {
            const now = this.deps.clock.now();
            const group = await this.deps.allocator.resolveGroup(tx, code);

            if (group.memberIds.includes(actorId)) throw new AlreadyMemberError();
            if (group.memberIds.length >= MAX_GROUP_MEMBERS) throw new GroupFullError();
            if (await repo.findPendingRequest(group.id, actorId)) throw new DuplicatePendingError();

            if (!(await repo.findProfile(actorId))) {
                repo.saveProfile(refreshProfile(await repo.loadProfile(actorId), now));
            }

            if (group.requireApproval) {
                const request: JoinRequest = {
                    id: randomUUID(),
                    groupId: group.id,
                    userId: actorId,
                    userName: displayName,
                    status: "pending",
                    requestedAt: now,
                    resolvedAt: null,
                    resolvedBy: null,
                };
                repo.saveJoinRequest(request);
                // Touching the group serializes concurrent requests from the same actor.
                repo.saveGroup({ ...group, updatedAt: now });
                return { status: "pending", request };
            }

            const member = this.newMember(group.id, actorId, displayName, now);
            const joined: Group = { ...group, memberIds: [...group.memberIds, actorId], updatedAt: now };
            repo.saveMember(member);
            repo.saveGroup(joined);
            return { status: "joined", group: joined, member };
        });

        console.log(`[MembershipStateMachine] ${actorId} ${outcome.status === "joined" ? "joined" : "requested to join"} via invite code`);
        return outcome;
    }

    /** The roster may have filled since the request was made; a failed approval leaves it pending. */
    async approve(adminId: string, groupId: string, requestId: string): Promise<ApprovalResult> {
        const result = await this.transaction("approve", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);
            authorize(adminId, group, "ManageRoster", { now, rosterScope: "ordinary" });

            const pending = await repo.requirePendingRequest(groupId, requestId);
            if (group.memberIds.includes(pending.userId)) throw new AlreadyMemberError("The requester is already a member of this group.");
            if (group.memberIds.length >= MAX_GROUP_MEMBERS) throw new GroupFullError();

            const member = this.newMember(groupId, pending.userId, pending.userName, now);
            const request = this.resolved(pending, "approved", adminId, now);
            const updated: Group = { ...group, memberIds: [...group.memberIds, pending.userId], updatedAt: now };

            repo.saveMember(member);
            repo.saveJoinRequest(request);
            repo.saveGroup(updated);
            return { group: updated, member, request };
        });

        console.log(`[MembershipStateMachine] ${adminId} approved ${result.member.userId} into ${groupId}`);
        return result;
    }

    async deny(adminId: string, groupId: string, requestId: string): Promise<JoinRequest> {
        return this.transaction("deny", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);
            authorize(adminId, group, "ManageRoster", { now, rosterScope: "ordinary" });

            const request = this.resolved(await repo.requirePendingRequest(groupId, requestId), "denied", adminId, now);
            repo.saveJoinRequest(request);
            return request;
        });
    }

    async cancel(actorId: string, groupId: string, requestId: string): Promise<JoinRequest> {
        return this.transaction("cancel", async repo => {
            const pending = await repo.requirePendingRequest(groupId, requestId);
            if (pending.userId !== actorId) throw new UnauthorizedError("Only the requester can cancel a join request.");

            const request = this.resolved(pending, "cancelled", actorId, this.deps.clock.now());
            repo.saveJoinRequest(request);
            return request;
        });
    }

    async listPendingRequests(adminId: string, groupId: string): Promise<JoinRequest[]> {
        return this.transaction("listPendingRequests", async repo => {
            const group = await repo.requireGroup(groupId);
            authorize(adminId, group, "ManageRoster", { now: this.deps.clock.now(), rosterScope: "ordinary" });
            return repo.listJoinRequests(groupId, "pending");
        });
    }

    /** Voluntary departure. Starts the actor's cooldown. */
    async leave(actorId: string, groupId: string): Promise<UserProfile> {
        const profile = await this.transaction("leave", async repo => {
            const group = await repo.requireGroup(groupId);
            if (!group.memberIds.includes(actorId)) throw new NotFoundError("member", "You are not a member of this group.");
            if (actorId === group.createdBy) {
                throw new UnauthorizedError("The group creator cannot leave. Delete the group instead.");
            }
            return this.removeFromRoster(repo, group, actorId);
        });

        console.log(`[MembershipStateMachine] ${actorId} left ${groupId}, cooldown until ${profile.cooldownEndDate?.toISOString()}`);
        return profile;
    }

    /** Forced removal by the creator. The target gets the same cooldown as a voluntary leave. */
    async removeMember(adminId: string, groupId: string, targetId: string): Promise<UserProfile> {
        const profile = await this.transaction("removeMember", async repo => {
            const group = await repo.requireGroup(groupId);
            authorize(adminId, group, "ManageRoster", { now: this.deps.clock.now(), rosterScope: "privileged" });
            if (targetId === group.createdBy) throw new UnauthorizedError("The group creator cannot be removed.");

            await repo.requireMember(groupId, targetId);
            return this.removeFromRoster(repo, group, targetId);
        });

        console.log(`[MembershipStateMachine] ${adminId} removed ${targetId} from ${groupId}`);
        return profile;
    }

    /** Member to own-admin transition: capped per lifetime, gated by the cooldown. */
    async startOwnGroupAfterLeaving(actorId: string, name: string, options: CreateGroupOptions = {}): Promise<Group> {
        const created = await this.transaction("startOwnGroupAfterLeaving", (repo, tx) =>
            this.groups.createGroupWithin(tx, repo, actorId, name, options, true));

        if (created.replaced) await this.groups.runDeletionHooks(created.replaced);
        console.log(`[MembershipStateMachine] ${actorId} started own group ${created.group.id}`);
        return created.group;
    }

    private async removeFromRoster(repo: GroupRepository, group: Group, userId: string): Promise<UserProfile> {
        const now = this.deps.clock.now();
        const drop = (ids: string[]) => ids.filter(id => id !== userId);

        repo.deleteMember(group.id, userId);
        repo.saveGroup({
            ...group,
            memberIds: drop(group.memberIds),
            adminIds: drop(group.adminIds),
            writePermissionIds: drop(group.writePermissionIds),
            updatedAt: now,
        });

        const profile: UserProfile = {
            ...(await repo.loadProfile(userId)),
            canCreateGroup: false,
            cooldownEndDate: cooldownEndFor(now),
        };
        repo.saveProfile(profile);
        return profile;
    }

    private newMember(groupId: string, userId: string, displayName: string, joinedAt: Date): Member {
        return {
            userId,
            groupId,
            role: "member",
            permission: "read",
            displayName,
            isAccessEnabled: true,
            joinedAt,
        };
    }

    private resolved(request: JoinRequest, status: JoinRequestStatus, resolvedBy: string, resolvedAt: Date): JoinRequest {
        return { ...request, status, resolvedBy, resolvedAt };
    }
}
