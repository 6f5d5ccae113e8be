import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../lib/router.js';
import { UserProfileSchema, errorResponses } from '../schemas/index.js';
import { presentProfile } from '../schemas/presenters.js';

export const meRouter = createRouter();

const profileRoute = createRoute({
    method: 'get',
    path: '/profile',
    operationId: 'getMyProfile',
    tags: ['Entitlements'],
    summary: 'Get my profile',
    description: 'Cooldown and transition history, with `canCreateGroup` evaluated against the server clock.',
    responses: {
        200: { content: { 'application/json': { schema: UserProfileSchema } }, description: 'The actor profile' },
        401: errorResponses[401],
    },
});

meRouter.openapi(profileRoute, async (c) => {
    const profile = await c.get('client').profile();
    return c.json(presentProfile(profile), 200);
});
