import { z } from "zod";
import type { AccessSession, Group, InviteCode, JoinRequest, Member, UserProfile } from "../domain/models.js";

// Persisted documents come back from JSON with ISO strings where the domain holds Dates.
const timestamp = z.coerce.date();

export const GroupDocumentSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    inviteCode: z.string(),
    createdBy: z.string().min(1),
    adminIds: z.array(z.string()),
    memberIds: z.array(z.string()),
    writePermissionIds: z.array(z.string()),
    requireApproval: z.boolean().default(false),
    trialEndDate: timestamp,
    hasActiveSubscription: z.boolean(),
    createdAt: timestamp,
    updatedAt: timestamp,
}) satisfies z.ZodType<Group, z.ZodTypeDef, unknown>;

export const MemberDocumentSchema = z.object({
    userId: z.string().min(1),
    groupId: z.string().min(1),
    role: z.enum(["admin", "member"]),
    permission: z.enum(["write", "read"]),
    displayName: z.string(),
    isAccessEnabled: z.boolean().default(true),
    joinedAt: timestamp,
}) satisfies z.ZodType<Member, z.ZodTypeDef, unknown>;

export const JoinRequestDocumentSchema = z.object({
    id: z.string().min(1),
    groupId: z.string().min(1),
    userId: z.string().min(1),
    userName: z.string(),
    status: z.enum(["pending", "approved", "denied", "cancelled"]),
    requestedAt: timestamp,
    resolvedAt: timestamp.nullable().default(null),
    resolvedBy: z.string().nullable().default(null),
}) satisfies z.ZodType<JoinRequest, z.ZodTypeDef, unknown>;

export const UserProfileDocumentSchema = z.object({
    userId: z.string().min(1),
    canCreateGroup: z.boolean(),
    cooldownEndDate: timestamp.nullable(),
    lastTransitionAt: timestamp.nullable(),
    transitionCount: z.number().int().nonnegative(),
    ownedGroupId: z.string().nullable().default(null),
}) satisfies z.ZodType<UserProfile, z.ZodTypeDef, unknown>;

export const InviteCodeDocumentSchema = z.object({
    code: z.string().min(1),
    groupId: z.string().min(1),
    createdAt: timestamp,
}) satisfies z.ZodType<InviteCode, z.ZodTypeDef, unknown>;

export const AccessSessionDocumentSchema = z.object({
    deviceId: z.string().min(1),
    accessDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    used: z.boolean(),
    updatedAt: timestamp,
}) satisfies z.ZodType<AccessSession, z.ZodTypeDef, unknown>;

const entry = <C extends string, S extends z.ZodTypeAny>(collection: C, data: S) =>
    z.object({
        collection: z.literal(collection),
        id: z.string().min(1),
        parentId: z.string().optional(),
        version: z.number().int().positive(),
        data,
    });

export const SnapshotEntrySchema = z.discriminatedUnion("collection", [
    entry("groups", GroupDocumentSchema),
    entry("members", MemberDocumentSchema),
    entry("joinRequests", JoinRequestDocumentSchema),
    entry("userProfiles", UserProfileDocumentSchema),
    entry("inviteCodes", InviteCodeDocumentSchema),
    entry("accessSessions", AccessSessionDocumentSchema),
]);

export const StoreSnapshotSchema = z.object({
    format: z.literal(1),
    sequence: z.number().int().nonnegative(),
    documents: z.array(SnapshotEntrySchema),
});

export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;
export type StoreSnapshot = z.infer<typeof StoreSnapshotSchema>;

export class DocumentMapper {
    static parseSnapshot(raw: unknown): StoreSnapshot {
        return StoreSnapshotSchema.parse(raw);
    }

    /** JSON form of a snapshot; Dates become ISO strings and are revived by parseSnapshot. */
    static serializeSnapshot(snapshot: StoreSnapshot): string {
        return JSON.stringify(snapshot, null, 2);
    }
}
