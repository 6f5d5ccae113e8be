import { z } from '@hono/zod-openapi';
import { OPERATION_CLASSES } from '@carecircle/core';

const timestamp = z.string().datetime().openapi({ example: '2026-03-02T09:00:00.000Z' });
const userId = z.string().openapi({ example: 'user-7f3a' });

export const IdParamsSchema = z.object({
    id: z.string().min(1).openapi({ param: { name: 'id', in: 'path' }, example: '123e4567-e89b-12d3-a456-426614174000' }),
});

export const MemberParamsSchema = IdParamsSchema.extend({
    memberId: z.string().min(1).openapi({ param: { name: 'memberId', in: 'path' }, example: 'user-7f3a' }),
});

export const RequestParamsSchema = IdParamsSchema.extend({
    requestId: z.string().min(1).openapi({ param: { name: 'requestId', in: 'path' } }),
});

export const CodeParamsSchema = z.object({
    code: z.string().min(1).openapi({ param: { name: 'code', in: 'path' }, example: 'X7K2QP' }),
});

export const CreateGroupDTOSchema = z.object({
    name: z.string().describe('The name of the care circle (at most 50 characters)').openapi({ example: 'Family' }),
    displayName: z.string().optional().describe('Your display name inside the group').openapi({ example: 'Alice' }),
    requireApproval: z.boolean().optional().describe('When true, joiners create a pending request an admin must approve'),
    replaceExisting: z.boolean().optional().describe('Delete the group you already own before creating this one'),
}).openapi('CreateGroupRequest');

export const UpdateGroupDTOSchema = z.object({
    name: z.string().optional().openapi({ example: 'The Smiths' }),
    requireApproval: z.boolean().optional(),
}).openapi('UpdateGroupRequest');

export const UpdateMemberDTOSchema = z.object({
    displayName: z.string().optional().openapi({ example: 'Grandma' }),
    isAccessEnabled: z.boolean().optional().describe('Temporarily revoke or restore access without removing the member'),
}).openapi('UpdateMemberRequest');

export const JoinDTOSchema = z.object({
    displayName: z.string().describe('How the other members will see you').openapi({ example: 'Bob' }),
}).openapi('JoinRequestBody');

export const AuthorizeDTOSchema = z.object({
    operation: z.enum(OPERATION_CLASSES).describe('The class of operation the content layer is about to perform'),
}).openapi('AuthorizeRequest');

export const SubscriptionDTOSchema = z.object({
    active: z.boolean(),
}).openapi('SubscriptionUpdate');

export const GroupSchema = z.object({
    id: z.string(),
    name: z.string().openapi({ example: 'Family' }),
    inviteCode: z.string().openapi({ example: 'X7K2QP' }),
    createdBy: userId,
    adminIds: z.array(z.string()),
    memberIds: z.array(z.string()),
    writePermissionIds: z.array(z.string()),
    requireApproval: z.boolean(),
    trialEndDate: timestamp,
    hasActiveSubscription: z.boolean(),
    createdAt: timestamp,
    updatedAt: timestamp,
}).openapi('Group');

export const GroupSummarySchema = z.object({
    id: z.string(),
    name: z.string(),
    memberCount: z.number().int(),
    isFull: z.boolean(),
    requireApproval: z.boolean(),
    trialEndDate: timestamp,
    hasActiveSubscription: z.boolean(),
}).openapi('GroupSummary');

export const MemberSchema = z.object({
    userId,
    groupId: z.string(),
    role: z.enum(['admin', 'member']),
    permission: z.enum(['write', 'read']),
    displayName: z.string().openapi({ example: 'Bob' }),
    isAccessEnabled: z.boolean(),
    joinedAt: timestamp,
}).openapi('Member');

export const JoinRequestSchema = z.object({
    id: z.string(),
    groupId: z.string(),
    userId,
    userName: z.string(),
    status: z.enum(['pending', 'approved', 'denied', 'cancelled']),
    requestedAt: timestamp,
    resolvedAt: timestamp.nullable(),
    resolvedBy: z.string().nullable(),
}).openapi('JoinRequest');

export const UserProfileSchema = z.object({
    userId,
    canCreateGroup: z.boolean(),
    cooldownEndDate: timestamp.nullable(),
    lastTransitionAt: timestamp.nullable(),
    transitionCount: z.number().int(),
    ownedGroupId: z.string().nullable(),
}).openapi('UserProfile');

export const TrialStatusSchema = z.object({
    valid: z.boolean(),
    subscribed: z.boolean(),
    endsAt: timestamp,
    daysRemaining: z.number().int(),
}).openapi('TrialStatus');

export const JoinedSchema = z.object({
    status: z.literal('joined'),
    group: GroupSchema,
    member: MemberSchema,
}).openapi('JoinedGroup');

export const PendingSchema = z.object({
    status: z.literal('pending'),
    request: JoinRequestSchema,
}).openapi('PendingJoin');

export const ApprovalSchema = z.object({
    group: GroupSchema,
    member: MemberSchema,
    request: JoinRequestSchema,
}).openapi('Approval');

export const DecisionSchema = z.object({
    allowed: z.boolean(),
    reason: z.string().optional().openapi({ example: 'trial-expired' }),
}).openapi('AuthorizationDecision');

export const DailyAccessSchema = z.object({
    available: z.boolean(),
    accessDate: z.string().openapi({ example: '2026-03-02' }),
    msUntilNextAccess: z.number().int(),
}).openapi('DailyAccess');

export const DeviceHeadersSchema = z.object({
    'x-device-id': z.string().min(1).openapi({ param: { name: 'X-Device-Id', in: 'header' }, example: 'device-1' }),
});

export const ErrorSchema = z.object({
    error: z.string(),
    code: z.string(),
    message: z.string(),
}).openapi('ErrorResponse');

export const errorResponses = {
    401: { content: { 'application/json': { schema: ErrorSchema } }, description: 'Unauthenticated' },
    403: { content: { 'application/json': { schema: ErrorSchema } }, description: 'Not allowed' },
    404: { content: { 'application/json': { schema: ErrorSchema } }, description: 'Not Found' },
    409: { content: { 'application/json': { schema: ErrorSchema } }, description: 'Roster invariant violated or conflict' },
} as const;
