import { createRoute } from '@hono/zod-openapi';
import { timingSafeEqual } from 'hono/utils/buffer';
import { UnauthenticatedError } from '@carecircle/core';
import { createRouter } from '../lib/router.js';
import { GroupSchema, IdParamsSchema, SubscriptionDTOSchema, errorResponses } from '../schemas/index.js';
import { presentGroup } from '../schemas/presenters.js';

/** Billing webhook. Authenticated by a shared secret rather than an actor token. */
export const createBillingRouter = (webhookSecret: string) => {
    const router = createRouter();

    router.use('*', async (c, next) => {
        const provided = c.req.header('X-Webhook-Secret') ?? '';
        if (!(await timingSafeEqual(provided, webhookSecret))) {
            throw new UnauthenticatedError('Invalid webhook secret');
        }
        await next();
    });

    const subscriptionRoute = createRoute({
        method: 'put',
        path: '/groups/{id}/subscription',
        operationId: 'setGroupSubscription',
        tags: ['Billing'],
        summary: 'Set the subscription state of a group',
        description: 'Called by the payment provider integration. An active subscription overrides trial expiry.',
        request: {
            params: IdParamsSchema,
            body: { content: { 'application/json': { schema: SubscriptionDTOSchema } } },
        },
        security: [],
        responses: {
            200: { content: { 'application/json': { schema: GroupSchema } }, description: 'The updated group' },
            401: errorResponses[401],
            404: errorResponses[404],
        },
    });

    router.openapi(subscriptionRoute, async (c) => {
        const { id } = c.req.valid('param');
        const { active } = c.req.valid('json');
        const group = await c.get('engine').groups.setSubscription(id, active);
        console.log(`[Billing] group ${id} subscription ${active ? 'activated' : 'cancelled'}`);
        return c.json(presentGroup(group), 200);
    });

    return router;
};
