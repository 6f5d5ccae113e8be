import { createRoute, z } from '@hono/zod-openapi';
import { createRouter } from '../lib/router.js';
import {
    GroupSchema, GroupSummarySchema, CreateGroupDTOSchema, UpdateGroupDTOSchema, UpdateMemberDTOSchema,
    MemberSchema, JoinRequestSchema, ApprovalSchema, UserProfileSchema, TrialStatusSchema, DecisionSchema,
    AuthorizeDTOSchema, IdParamsSchema, MemberParamsSchema, RequestParamsSchema, ErrorSchema, errorResponses
} from '../schemas/index.js';
import {
    presentGroup, presentJoinRequest, presentMember, presentProfile, presentSummary, presentTrialStatus
} from '../schemas/presenters.js';

export const groupsRouter = createRouter();

const listGroupsRoute = createRoute({
    method: 'get',
    path: '/',
    operationId: 'listMyGroups',
    tags: ['Groups'],
    summary: 'List my groups',
    description: 'Retrieves every care circle the authenticated actor is a member of.',
    responses: {
        200: { content: { 'application/json': { schema: z.array(GroupSchema) } }, description: 'A list of groups' },
        401: errorResponses[401],
    },
});

groupsRouter.openapi(listGroupsRoute, async (c) => {
    const groups = await c.get('client').myGroups();
    return c.json(groups.map(presentGroup), 200);
});

const createGroupRoute = createRoute({
    method: 'post',
    path: '/',
    operationId: 'createGroup',
    tags: ['Groups'],
    summary: 'Create a new group',
    description: 'Creates a care circle owned by the actor, with a fresh invite code and a 14-day trial. Fails with 409 if the actor already owns a group (unless `replaceExisting`), and with 403 during a cooldown.',
    request: {
        body: { content: { 'application/json': { schema: CreateGroupDTOSchema } } },
    },
    responses: {
        201: { content: { 'application/json': { schema: GroupSchema } }, description: 'The created group' },
        403: errorResponses[403],
        409: errorResponses[409],
        503: { content: { 'application/json': { schema: ErrorSchema } }, description: 'No invite code could be allocated' },
    },
});

groupsRouter.openapi(createGroupRoute, async (c) => {
    const { name, ...options } = c.req.valid('json');
    const group = await c.get('client').createGroup(name, options);
    return c.json(presentGroup(group), 201);
});

const startOwnGroupRoute = createRoute({
    method: 'post',
    path: '/own',
    operationId: 'startOwnGroupAfterLeaving',
    tags: ['Groups'],
    summary: 'Start an own group after leaving one',
    description: 'Member to own-admin transition. Allowed at most 3 times per actor and only once the cooldown from the last departure has passed.',
    request: {
        body: { content: { 'application/json': { schema: CreateGroupDTOSchema } } },
    },
    responses: {
        201: { content: { 'application/json': { schema: GroupSchema } }, description: 'The created group' },
        403: errorResponses[403],
        409: errorResponses[409],
    },
});

groupsRouter.openapi(startOwnGroupRoute, async (c) => {
    const { name, ...options } = c.req.valid('json');
    const group = await c.get('client').startOwnGroupAfterLeaving(name, options);
    return c.json(presentGroup(group), 201);
});

const getGroupRoute = createRoute({
    method: 'get',
    path: '/{id}',
    operationId: 'getGroup',
    tags: ['Groups'],
    summary: 'Get a group',
    description: 'Full group document, members only.',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: GroupSchema } }, description: 'The group' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(getGroupRoute, async (c) => {
    const { id } = c.req.valid('param');
    const group = await c.get('client').getGroup(id);
    return c.json(presentGroup(group), 200);
});

const getSummaryRoute = createRoute({
    method: 'get',
    path: '/{id}/summary',
    operationId: 'getGroupSummary',
    tags: ['Groups'],
    summary: 'Get the public group summary',
    description: 'Name, size and trial state. Readable by any authenticated actor.',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: GroupSummarySchema } }, description: 'The summary' },
        404: errorResponses[404],
    },
});

groupsRouter.openapi(getSummaryRoute, async (c) => {
    const { id } = c.req.valid('param');
    const summary = await c.get('client').summary(id);
    return c.json(presentSummary(summary), 200);
});

const updateGroupRoute = createRoute({
    method: 'patch',
    path: '/{id}',
    operationId: 'updateGroup',
    tags: ['Groups'],
    summary: 'Update group settings',
    description: 'Rename the group or change whether joining requires approval. Admins only. Roster fields cannot be changed here.',
    request: {
        params: IdParamsSchema,
        body: { content: { 'application/json': { schema: UpdateGroupDTOSchema } } },
    },
    responses: {
        200: { content: { 'application/json': { schema: GroupSchema } }, description: 'Group updated' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(updateGroupRoute, async (c) => {
    const { id } = c.req.valid('param');
    const group = await c.get('client').updateGroupMeta(id, c.req.valid('json'));
    return c.json(presentGroup(group), 200);
});

const deleteGroupRoute = createRoute({
    method: 'delete',
    path: '/{id}',
    operationId: 'deleteGroup',
    tags: ['Groups'],
    summary: 'Delete a group',
    description: 'Permanently deletes a group with its roster, join requests and invite code. Can only be performed by the group creator.',
    request: { params: IdParamsSchema },
    responses: {
        204: { description: 'Group deleted successfully' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(deleteGroupRoute, async (c) => {
    const { id } = c.req.valid('param');
    await c.get('client').deleteGroup(id);
    return c.body(null, 204);
});

const trialRoute = createRoute({
    method: 'get',
    path: '/{id}/trial',
    operationId: 'getTrialStatus',
    tags: ['Entitlements'],
    summary: 'Get the trial status',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: TrialStatusSchema } }, description: 'Trial window and subscription state' },
        404: errorResponses[404],
    },
});

groupsRouter.openapi(trialRoute, async (c) => {
    const { id } = c.req.valid('param');
    const status = await c.get('client').trialStatus(id);
    return c.json(presentTrialStatus(status), 200);
});

const authorizeRoute = createRoute({
    method: 'post',
    path: '/{id}/authorize',
    operationId: 'authorizeOperation',
    tags: ['Entitlements'],
    summary: 'Check an operation for the content layer',
    description: 'Evaluates whether the actor may perform an operation class on this group right now. Always answers 200 with a decision; denials carry a reason.',
    request: {
        params: IdParamsSchema,
        body: { content: { 'application/json': { schema: AuthorizeDTOSchema } } },
    },
    responses: {
        200: { content: { 'application/json': { schema: DecisionSchema } }, description: 'The decision' },
        404: errorResponses[404],
    },
});

groupsRouter.openapi(authorizeRoute, async (c) => {
    const { id } = c.req.valid('param');
    const { operation } = c.req.valid('json');
    const decision = await c.get('client').checkAccess(id, operation);
    return c.json(decision, 200);
});

// ==========================================
// Roster
// ==========================================

const listMembersRoute = createRoute({
    method: 'get',
    path: '/{id}/members',
    operationId: 'listMembers',
    tags: ['Members'],
    summary: 'List members',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: z.array(MemberSchema) } }, description: 'Members in join order' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(listMembersRoute, async (c) => {
    const { id } = c.req.valid('param');
    const members = await c.get('client').members(id);
    return c.json(members.map(presentMember), 200);
});

const updateMemberRoute = createRoute({
    method: 'patch',
    path: '/{id}/members/{memberId}',
    operationId: 'updateMember',
    tags: ['Members'],
    summary: 'Rename a member or toggle their access',
    description: 'Members may change their own display name. Admins may rename anyone and enable or disable access for anyone but the creator.',
    request: {
        params: MemberParamsSchema,
        body: { content: { 'application/json': { schema: UpdateMemberDTOSchema } } },
    },
    responses: {
        200: { content: { 'application/json': { schema: MemberSchema } }, description: 'The updated member' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(updateMemberRoute, async (c) => {
    const { id, memberId } = c.req.valid('param');
    const member = await c.get('client').updateMember(id, memberId, c.req.valid('json'));
    return c.json(presentMember(member), 200);
});

const promoteRoute = createRoute({
    method: 'post',
    path: '/{id}/members/{memberId}/promote',
    operationId: 'promoteMember',
    tags: ['Members'],
    summary: 'Promote a member to admin',
    description: 'Creator only. The member must have joined at least 30 days ago.',
    request: { params: MemberParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: MemberSchema } }, description: 'The promoted member' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(promoteRoute, async (c) => {
    const { id, memberId } = c.req.valid('param');
    const member = await c.get('client').promote(id, memberId);
    return c.json(presentMember(member), 200);
});

const removeMemberRoute = createRoute({
    method: 'delete',
    path: '/{id}/members/{memberId}',
    operationId: 'removeMember',
    tags: ['Members'],
    summary: 'Remove a member',
    description: 'Creator only. The removed member enters the 30-day cooldown.',
    request: { params: MemberParamsSchema },
    responses: {
        204: { description: 'Member removed' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(removeMemberRoute, async (c) => {
    const { id, memberId } = c.req.valid('param');
    await c.get('client').removeMember(id, memberId);
    return c.body(null, 204);
});

const leaveRoute = createRoute({
    method: 'post',
    path: '/{id}/leave',
    operationId: 'leaveGroup',
    tags: ['Members'],
    summary: 'Leave a group',
    description: 'Removes the actor from the roster and starts a 30-day cooldown on creating groups. The creator cannot leave.',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: UserProfileSchema } }, description: 'The actor profile after leaving' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(leaveRoute, async (c) => {
    const { id } = c.req.valid('param');
    const profile = await c.get('client').leave(id);
    return c.json(presentProfile(profile), 200);
});

// ==========================================
// Join requests
// ==========================================

const listRequestsRoute = createRoute({
    method: 'get',
    path: '/{id}/requests',
    operationId: 'listPendingRequests',
    tags: ['Join Requests'],
    summary: 'List pending join requests',
    request: { params: IdParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: z.array(JoinRequestSchema) } }, description: 'Pending requests, oldest first' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(listRequestsRoute, async (c) => {
    const { id } = c.req.valid('param');
    const requests = await c.get('client').pendingRequests(id);
    return c.json(requests.map(presentJoinRequest), 200);
});

const approveRoute = createRoute({
    method: 'post',
    path: '/{id}/requests/{requestId}/approve',
    operationId: 'approveJoinRequest',
    tags: ['Join Requests'],
    summary: 'Approve a join request',
    description: 'Admins only. Fails with 409 if the group filled up since the request was made; the request then stays pending.',
    request: { params: RequestParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: ApprovalSchema } }, description: 'The new member' },
        403: errorResponses[403],
        404: errorResponses[404],
        409: errorResponses[409],
    },
});

groupsRouter.openapi(approveRoute, async (c) => {
    const { id, requestId } = c.req.valid('param');
    const result = await c.get('client').approve(id, requestId);
    return c.json({
        group: presentGroup(result.group),
        member: presentMember(result.member),
        request: presentJoinRequest(result.request),
    }, 200);
});

const denyRoute = createRoute({
    method: 'post',
    path: '/{id}/requests/{requestId}/deny',
    operationId: 'denyJoinRequest',
    tags: ['Join Requests'],
    summary: 'Deny a join request',
    request: { params: RequestParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: JoinRequestSchema } }, description: 'The denied request' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(denyRoute, async (c) => {
    const { id, requestId } = c.req.valid('param');
    const request = await c.get('client').deny(id, requestId);
    return c.json(presentJoinRequest(request), 200);
});

const cancelRoute = createRoute({
    method: 'post',
    path: '/{id}/requests/{requestId}/cancel',
    operationId: 'cancelJoinRequest',
    tags: ['Join Requests'],
    summary: 'Cancel my join request',
    request: { params: RequestParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: JoinRequestSchema } }, description: 'The cancelled request' },
        403: errorResponses[403],
        404: errorResponses[404],
    },
});

groupsRouter.openapi(cancelRoute, async (c) => {
    const { id, requestId } = c.req.valid('param');
    const request = await c.get('client').cancelRequest(id, requestId);
    return c.json(presentJoinRequest(request), 200);
});
