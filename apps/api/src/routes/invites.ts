import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../lib/router.js';
import {
    CodeParamsSchema, GroupSummarySchema, JoinDTOSchema, JoinedSchema, PendingSchema, errorResponses
} from '../schemas/index.js';
import { presentGroup, presentJoinRequest, presentMember, presentSummary } from '../schemas/presenters.js';

export const invitesRouter = createRouter();

const previewRoute = createRoute({
    method: 'get',
    path: '/{code}',
    operationId: 'previewInvite',
    tags: ['Invites'],
    summary: 'Look up an invite code',
    description: 'Resolves a 6-character invite code (case-insensitive) to the public summary of its group, so the actor can decide whether to join.',
    request: { params: CodeParamsSchema },
    responses: {
        200: { content: { 'application/json': { schema: GroupSummarySchema } }, description: 'The group behind the code' },
        404: errorResponses[404],
    },
});

invitesRouter.openapi(previewRoute, async (c) => {
    const { code } = c.req.valid('param');
    const summary = await c.get('client').previewInvite(code);
    return c.json(presentSummary(summary), 200);
});

const joinRoute = createRoute({
    method: 'post',
    path: '/{code}/join',
    operationId: 'requestJoin',
    tags: ['Invites'],
    summary: 'Join a group by invite code',
    description: 'Joins directly (201) or, for groups that require approval, files a pending request (202). Fails with 409 when the group is full, the actor is already a member, or a request is already pending.',
    request: {
        params: CodeParamsSchema,
        body: { content: { 'application/json': { schema: JoinDTOSchema } } },
    },
    responses: {
        201: { content: { 'application/json': { schema: JoinedSchema } }, description: 'Joined the group' },
        202: { content: { 'application/json': { schema: PendingSchema } }, description: 'Join request awaiting approval' },
        404: errorResponses[404],
        409: errorResponses[409],
    },
});

invitesRouter.openapi(joinRoute, async (c) => {
    const { code } = c.req.valid('param');
    const { displayName } = c.req.valid('json');
    const outcome = await c.get('client').requestJoin(code, displayName);

    if (outcome.status === 'pending') {
        return c.json({ status: 'pending' as const, request: presentJoinRequest(outcome.request) }, 202);
    }
    return c.json({
        status: 'joined' as const,
        group: presentGroup(outcome.group),
        member: presentMember(outcome.member),
    }, 201);
});
