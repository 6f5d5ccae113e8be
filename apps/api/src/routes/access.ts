import { createRoute } from '@hono/zod-openapi';
import { createRouter } from '../lib/router.js';
import { DailyAccessSchema, DeviceHeadersSchema, errorResponses } from '../schemas/index.js';

export const accessRouter = createRouter();

const statusRoute = createRoute({
    method: 'get',
    path: '/today',
    operationId: 'getDailyAccess',
    tags: ['Entitlements'],
    summary: 'Check the free-tier daily session',
    description: 'One session per device per server calendar day. The device is identified by the X-Device-Id header.',
    request: { headers: DeviceHeadersSchema },
    responses: {
        200: { content: { 'application/json': { schema: DailyAccessSchema } }, description: 'Quota state for today' },
        401: errorResponses[401],
    },
});

accessRouter.openapi(statusRoute, async (c) => {
    const deviceId = c.req.valid('header')['x-device-id'];
    const status = await c.get('engine').dailyAccess.status(deviceId);
    return c.json(status, 200);
});

const consumeRoute = createRoute({
    method: 'post',
    path: '/today',
    operationId: 'useDailyAccess',
    tags: ['Entitlements'],
    summary: "Use today's free-tier session",
    description: 'Idempotent within a day.',
    request: { headers: DeviceHeadersSchema },
    responses: {
        200: { content: { 'application/json': { schema: DailyAccessSchema } }, description: 'Quota state after use' },
        401: errorResponses[401],
    },
});

accessRouter.openapi(consumeRoute, async (c) => {
    const deviceId = c.req.valid('header')['x-device-id'];
    const gate = c.get('engine').dailyAccess;
    await gate.markUsed(deviceId);
    return c.json(await gate.status(deviceId), 200);
});
