import type { Group, JoinRequest, Member, UserProfile } from "../domain/models.js";
import { NotFoundError } from "../errors.js";
import type { ITransaction } from "./IDocumentStore.js";
import { keyOf } from "./IDocumentStore.js";

export const newUserProfile = (userId: string): UserProfile => ({
    userId,
    canCreateGroup: true,
    cooldownEndDate: null,
    lastTransitionAt: null,
    transitionCount: 0,
    ownedGroupId: null,
});

/**
 * Typed access to the group documents inside one transaction. Reads go
 * through the transaction so they are validated at commit.
 */
export class GroupRepository {
    constructor(private tx: ITransaction) { }

    async findGroup(groupId: string): Promise<Group | null> {
        return this.tx.get(keyOf("groups", groupId));
    }

    async requireGroup(groupId: string): Promise<Group> {
        const group = await this.findGroup(groupId);
        if (!group) throw new NotFoundError("group", "Group not found.");
        return group;
    }

    async findMember(groupId: string, userId: string): Promise<Member | null> {
        return this.tx.get(keyOf("members", userId, groupId));
    }

    async requireMember(groupId: string, userId: string): Promise<Member> {
        const member = await this.findMember(groupId, userId);
        if (!member) throw new NotFoundError("member", "Member not found in this group.");
        return member;
    }

    async listMembers(groupId: string): Promise<Member[]> {
        const members = await this.tx.list("members", { parentId: groupId });
        return members.sort((a, b) => a.joinedAt.getTime() - b.joinedAt.getTime());
    }

    async listJoinRequests(groupId: string, status?: JoinRequest["status"]): Promise<JoinRequest[]> {
        const requests = await this.tx.list("joinRequests", {
            parentId: groupId,
            where: r => status === undefined || r.status === status,
        });
        return requests.sort((a, b) => a.requestedAt.getTime() - b.requestedAt.getTime());
    }

    async findPendingRequest(groupId: string, userId: string): Promise<JoinRequest | null> {
        const pending = await this.tx.list("joinRequests", {
            parentId: groupId,
            where: r => r.userId === userId && r.status === "pending",
        });
        return pending[0] ?? null;
    }

    async requirePendingRequest(groupId: string, requestId: string): Promise<JoinRequest> {
        const request = await this.tx.get(keyOf("joinRequests", requestId, groupId));
        if (!request || request.status !== "pending") {
            throw new NotFoundError("joinRequest", "No pending join request with this id.");
        }
        return request;
    }

    async findProfile(userId: string): Promise<UserProfile | null> {
        return this.tx.get(keyOf("userProfiles", userId));
    }

    /** The stored profile, or a fresh default one for a first interaction (not yet saved). */
    async loadProfile(userId: string): Promise<UserProfile> {
        return (await this.findProfile(userId)) ?? newUserProfile(userId);
    }

    saveGroup(group: Group): void {
        this.tx.set(keyOf("groups", group.id), group);
    }

    saveMember(member: Member): void {
        this.tx.set(keyOf("members", member.userId, member.groupId), member);
    }

    deleteMember(groupId: string, userId: string): void {
        this.tx.delete(keyOf("members", userId, groupId));
    }

    saveJoinRequest(request: JoinRequest): void {
        this.tx.set(keyOf("joinRequests", request.id, request.groupId), request);
    }

    saveProfile(profile: UserProfile): void {
        this.tx.set(keyOf("userProfiles", profile.userId), profile);
    }

    /** Removes the group, its roster entries, its join requests and its invite code mapping. */
    async deleteGroupTree(group: Group): Promise<void> {
        const members = await this.tx.list("members", { parentId: group.id });
        const requests = await this.tx.list("joinRequests", { parentId: group.id });
        const mapping = await this.tx.get(keyOf("inviteCodes", group.inviteCode));

        for (const member of members) this.deleteMember(group.id, member.userId);
        for (const request of requests) this.tx.delete(keyOf("joinRequests", request.id, group.id));
        if (mapping?.groupId === group.id) this.tx.delete(keyOf("inviteCodes", group.inviteCode));
        this.tx.delete(keyOf("groups", group.id));
    }
}
