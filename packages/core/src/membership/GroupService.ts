import { randomUUID } from "node:crypto";
import type { Group, GroupSummary, Member, TrialStatus, UserProfile } from "../domain/models.js";
import type { CreateGroupOptions, UpdateGroupMetaDTO, UpdateMemberDTO } from "../domain/dtos.js";
import { MAX_GROUP_MEMBERS, MAX_LIFETIME_TRANSITIONS } from "../domain/policy.js";
import {
    AlreadyOwnsGroupError, CooldownActiveError, TransitionLimitReachedError, UnauthorizedError, ValidationError
} from "../errors.js";
import type { IDocumentStore, ITransaction } from "../infrastructure/IDocumentStore.js";
import { GroupRepository } from "../infrastructure/GroupRepository.js";
import { runInTransaction } from "../infrastructure/transactions.js";
import { authorize, evaluate, Decision, OperationClass } from "../access/evaluator.js";
import type { Clock } from "../entitlements/clock.js";
import {
    canBecomeAdmin, getTrialStatus, hasDepartedSinceLastTransition, isCooldownActive, refreshProfile, trialEndFor
} from "../entitlements/trial.js";
import type { InviteCodeAllocator } from "../invites/InviteCodeAllocator.js";
import { validateDisplayName, validateGroupName } from "./validation.js";

/** Called after a group deletion commits; the content layer removes what it stored for the group. */
export type GroupDeletionHook = (group: Group) => Promise<void>;

export interface MembershipServiceDeps {
    store: IDocumentStore;
    clock: Clock;
    allocator: InviteCodeAllocator;
    transactionAttempts?: number;
    deletionHooks?: GroupDeletionHook[];
}

export interface CreatedGroup {
    group: Group;
    member: Member;
    replaced: Group | null;
}

export const DEFAULT_ADMIN_DISPLAY_NAME = "Admin";

export const toGroupSummary = (group: Group): GroupSummary => ({
    id: group.id,
    name: group.name,
    memberCount: group.memberIds.length,
    isFull: group.memberIds.length >= MAX_GROUP_MEMBERS,
    requireApproval: group.requireApproval,
    trialEndDate: group.trialEndDate,
    hasActiveSubscription: group.hasActiveSubscription,
});

const without = (ids: string[], id: string) => ids.filter(existing => existing !== id);
const withId = (ids: string[], id: string) => (ids.includes(id) ? ids : [...ids, id]);

/**
 * Group & membership model: creation, promotion, meta edits, access toggles,
 * deletion and read queries. Roster joins and departures live in
 * MembershipStateMachine.
 */
export class GroupService {
    constructor(private deps: MembershipServiceDeps) { }

    private transaction<R>(label: string, fn: (repo: GroupRepository, tx: ITransaction) => Promise<R>): Promise<R> {
        return runInTransaction(this.deps.store, tx => fn(new GroupRepository(tx), tx), {
            label,
            maxAttempts: this.deps.transactionAttempts,
        });
    }

    async createGroup(actorId: string, name: string, options: CreateGroupOptions = {}): Promise<Group> {
        const created = await this.transaction("createGroup", (repo, tx) =>
            this.createGroupWithin(tx, repo, actorId, name, options, false));
        if (created.replaced) await this.runDeletionHooks(created.replaced);
        console.log(`[GroupService] ${actorId} created group ${created.group.id}`);
        return created.group;
    }

    /**
     * Shared by createGroup and the member-to-own-admin transition. An actor
     * who left a group since their last transition goes through the transition cap.
     */
    async createGroupWithin(
        tx: ITransaction,
        repo: GroupRepository,
        actorId: string,
        rawName: string,
        options: CreateGroupOptions,
        isTransition: boolean
    ): Promise<CreatedGroup> {
        const name = validateGroupName(rawName);
        const displayName = validateDisplayName(options.displayName ?? DEFAULT_ADMIN_DISPLAY_NAME);
        const now = this.deps.clock.now();
        const profile = refreshProfile(await repo.loadProfile(actorId), now);
        const countsAsTransition = isTransition || hasDepartedSinceLastTransition(profile);

        if (countsAsTransition && profile.transitionCount >= MAX_LIFETIME_TRANSITIONS) {
            throw new TransitionLimitReachedError();
        }
        if (profile.cooldownEndDate && isCooldownActive(profile, now)) {
            throw new CooldownActiveError(profile.cooldownEndDate);
        }

        let replaced: Group | null = null;
        if (profile.ownedGroupId) {
            const existing = await repo.findGroup(profile.ownedGroupId);
            if (existing && existing.createdBy === actorId) {
                if (!options.replaceExisting) throw new AlreadyOwnsGroupError(existing.id);
                await repo.deleteGroupTree(existing);
                replaced = existing;
            }
        }

        const groupId = randomUUID();
        const inviteCode = await this.deps.allocator.allocateWithin(tx, groupId);
        const group: Group = {
            id: groupId,
            name,
            inviteCode,
            createdBy: actorId,
            adminIds: [actorId],
            memberIds: [actorId],
            writePermissionIds: [actorId],
            requireApproval: options.requireApproval ?? false,
            trialEndDate: trialEndFor(now),
            hasActiveSubscription: false,
            createdAt: now,
            updatedAt: now,
        };
        const member: Member = {
            userId: actorId,
            groupId,
            role: "admin",
            permission: "write",
            displayName,
            isAccessEnabled: true,
            joinedAt: now,
        };
        const nextProfile: UserProfile = countsAsTransition
            ? { ...profile, ownedGroupId: groupId, transitionCount: profile.transitionCount + 1, lastTransitionAt: now }
            : { ...profile, ownedGroupId: groupId };

        repo.saveGroup(group);
        repo.saveMember(member);
        repo.saveProfile(nextProfile);
        return { group, member, replaced };
    }

    async promoteToAdmin(actorId: string, groupId: string, targetUserId: string): Promise<Member> {
        return this.transaction("promoteToAdmin", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);
            authorize(actorId, group, "ManageRoster", { now, rosterScope: "privileged" });

            const target = await repo.requireMember(groupId, targetUserId);
            if (group.adminIds.includes(targetUserId)) return target;
            if (!canBecomeAdmin(target, now)) {
                throw new UnauthorizedError("Members must belong to the group for 30 days before becoming an admin.");
            }

            const promoted: Member = { ...target, role: "admin", permission: "write" };
            repo.saveMember(promoted);
            repo.saveGroup({
                ...group,
                adminIds: withId(group.adminIds, targetUserId),
                writePermissionIds: promoted.isAccessEnabled
                    ? withId(group.writePermissionIds, targetUserId)
                    : group.writePermissionIds,
                updatedAt: now,
            });
            return promoted;
        });
    }

    /** Name and settings only; roster fields are never accepted here. */
    async updateGroupMeta(actorId: string, groupId: string, dto: UpdateGroupMetaDTO): Promise<Group> {
        const name = dto.name === undefined ? undefined : validateGroupName(dto.name);
        return this.transaction("updateGroupMeta", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);
            authorize(actorId, group, "ManageGroupMeta", { now });

            const updated: Group = {
                ...group,
                name: name ?? group.name,
                requireApproval: dto.requireApproval ?? group.requireApproval,
                updatedAt: now,
            };
            repo.saveGroup(updated);
            return updated;
        });
    }

    async renameGroup(actorId: string, groupId: string, name: string): Promise<Group> {
        return this.updateGroupMeta(actorId, groupId, { name });
    }

    /**
     * Temporary revocation without removal. Disabling also drops write
     * permission; enabling restores it for admins only.
     */
    async toggleAccess(actorId: string, groupId: string, memberId: string, enabled: boolean): Promise<Member> {
        return this.updateMember(actorId, groupId, memberId, { isAccessEnabled: enabled });
    }

    /** Members may rename themselves; admins may rename anyone. */
    async updateDisplayName(actorId: string, groupId: string, memberId: string, displayName: string): Promise<Member> {
        return this.updateMember(actorId, groupId, memberId, { displayName });
    }

    /** Both changes are authorized before either is written, and commit together. */
    async updateMember(actorId: string, groupId: string, memberId: string, dto: UpdateMemberDTO): Promise<Member> {
        if (dto.displayName === undefined && dto.isAccessEnabled === undefined) {
            throw new ValidationError("Nothing to update.");
        }
        const displayName = dto.displayName === undefined ? undefined : validateDisplayName(dto.displayName);
        const enabled = dto.isAccessEnabled;

        return this.transaction("updateMember", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);

            if (displayName !== undefined && (actorId !== memberId || !group.memberIds.includes(actorId))) {
                authorize(actorId, group, "ManageRoster", { now });
            }
            if (enabled !== undefined) {
                authorize(actorId, group, "ManageRoster", { now });
                if (memberId === group.createdBy) {
                    throw new UnauthorizedError("The group creator's access cannot be disabled.");
                }
            }

            const member = await repo.requireMember(groupId, memberId);
            const updated: Member = {
                ...member,
                displayName: displayName ?? member.displayName,
                isAccessEnabled: enabled ?? member.isAccessEnabled,
            };
            repo.saveMember(updated);

            if (enabled !== undefined) {
                const writePermissionIds = enabled
                    ? (group.adminIds.includes(memberId) ? withId(group.writePermissionIds, memberId) : group.writePermissionIds)
                    : without(group.writePermissionIds, memberId);
                repo.saveGroup({ ...group, writePermissionIds, updatedAt: now });
            }
            return updated;
        });
    }

    /** Only the creator may delete. Members lose their roster entries without a cooldown. */
    async deleteGroup(actorId: string, groupId: string): Promise<void> {
        const deleted = await this.transaction("deleteGroup", async repo => {
            const group = await repo.requireGroup(groupId);
            if (actorId !== group.createdBy) {
                throw new UnauthorizedError("Only the group creator can delete the group.");
            }
            const profile = await repo.loadProfile(actorId);
            await repo.deleteGroupTree(group);
            if (profile.ownedGroupId === groupId) repo.saveProfile({ ...profile, ownedGroupId: null });
            return group;
        });
        await this.runDeletionHooks(deleted);
        console.log(`[GroupService] ${actorId} deleted group ${groupId}`);
    }

    /** System operation for the billing integration; not reachable by actors. */
    async setSubscription(groupId: string, active: boolean): Promise<Group> {
        return this.transaction("setSubscription", async repo => {
            const group = await repo.requireGroup(groupId);
            const updated: Group = { ...group, hasActiveSubscription: active, updatedAt: this.deps.clock.now() };
            repo.saveGroup(updated);
            return updated;
        });
    }

    // --- Queries ---

    async getGroup(actorId: string, groupId: string): Promise<Group> {
        return this.transaction("getGroup", async repo => {
            const group = await repo.requireGroup(groupId);
            if (!group.memberIds.includes(actorId)) throw new UnauthorizedError("You are not a member of this group.");
            return group;
        });
    }

    async getSummary(actorId: string, groupId: string): Promise<GroupSummary> {
        return this.transaction("getSummary", async repo => {
            const group = await repo.requireGroup(groupId);
            authorize(actorId, group, "ReadGroupMeta", { now: this.deps.clock.now() });
            return toGroupSummary(group);
        });
    }

    async previewInvite(actorId: string, code: string): Promise<GroupSummary> {
        return this.transaction("previewInvite", async (_repo, tx) => {
            const group = await this.deps.allocator.resolveGroup(tx, code);
            authorize(actorId, group, "ReadGroupMeta", { now: this.deps.clock.now() });
            return toGroupSummary(group);
        });
    }

    async trialStatus(actorId: string, groupId: string): Promise<TrialStatus> {
        return this.transaction("trialStatus", async repo => {
            const now = this.deps.clock.now();
            const group = await repo.requireGroup(groupId);
            authorize(actorId, group, "ReadGroupMeta", { now });
            return getTrialStatus(group, now);
        });
    }

    async listMembers(actorId: string, groupId: string): Promise<Member[]> {
        return this.transaction("listMembers", async repo => {
            const group = await repo.requireGroup(groupId);
            if (!group.memberIds.includes(actorId)) throw new UnauthorizedError("You are not a member of this group.");
            return repo.listMembers(groupId);
        });
    }

    async listGroupsForActor(actorId: string): Promise<Group[]> {
        const groups = await this.deps.store.list("groups", { where: g => g.memberIds.includes(actorId) });
        return groups.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    }

    async getProfile(actorId: string): Promise<UserProfile> {
        return this.transaction("getProfile", async repo =>
            refreshProfile(await repo.loadProfile(actorId), this.deps.clock.now()));
    }

    /** The content layer's entry point: may `actorId` perform `op` on this group right now? */
    async checkAccess(actorId: string | null, groupId: string, op: OperationClass): Promise<Decision> {
        return this.transaction("checkAccess", async repo => {
            const group = await repo.requireGroup(groupId);
            const member = actorId ? await repo.findMember(groupId, actorId) : null;
            return evaluate(actorId, group, op, { now: this.deps.clock.now(), member });
        });
    }

    async runDeletionHooks(group: Group): Promise<void> {
        for (const hook of this.deps.deletionHooks ?? []) {
            await hook(group);
        }
    }
}
