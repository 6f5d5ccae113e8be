import { OpenAPIHono } from '@hono/zod-openapi';
import { swaggerUI } from '@hono/swagger-ui';
import { logger } from 'hono/logger';
import type { CareCircleEngine } from '@carecircle/core';
import type { ApiConfig } from './config.js';
import { AppEnv, createAuthMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/errors.js';
import { groupsRouter } from './routes/groups.js';
import { invitesRouter } from './routes/invites.js';
import { meRouter } from './routes/me.js';
import { accessRouter } from './routes/access.js';
import { createBillingRouter } from './routes/billing.js';

export interface AppDeps {
    engine: CareCircleEngine;
    config: Pick<ApiConfig, 'jwtSecret' | 'billingWebhookSecret' | 'requestLogging'>;
}

export function createApp({ engine, config }: AppDeps) {
    const app = new OpenAPIHono<AppEnv>();

    if (config.requestLogging) app.use('*', logger());
    app.use('*', async (c, next) => {
        c.set('engine', engine);
        await next();
    });
    app.onError(errorHandler);

    // Register Security Scheme for Bearer Auth
    app.openAPIRegistry.registerComponent('securitySchemes', 'Bearer', {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
    });

    // OpenAPI document endpoint
    app.doc('/api/openapi.json', {
        openapi: '3.0.0',
        info: {
            version: '1.0.0',
            title: 'CareCircle API',
            description: 'Group authorization and entitlement engine for family medication-tracking circles',
        },
        security: [{ Bearer: [] }],
    });

    // Swagger UI endpoint
    app.get('/api/docs', swaggerUI({ url: '/api/openapi.json' }));

    // Actor-authenticated routers
    const auth = createAuthMiddleware(config.jwtSecret);
    for (const prefix of ['/api/v1/groups', '/api/v1/invites', '/api/v1/me', '/api/v1/access']) {
        app.use(prefix, auth);
        app.use(`${prefix}/*`, auth);
    }
    app.route('/api/v1/groups', groupsRouter);
    app.route('/api/v1/invites', invitesRouter);
    app.route('/api/v1/me', meRouter);
    app.route('/api/v1/access', accessRouter);

    if (config.billingWebhookSecret) {
        app.route('/api/v1/billing', createBillingRouter(config.billingWebhookSecret));
    }

    return app;
}

export { loadConfig } from './config.js';
export type { ApiConfig } from './config.js';
export type { AppEnv } from './middleware/auth.js';
