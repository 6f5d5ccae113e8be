import { OpenAPIHono } from '@hono/zod-openapi';
import type { AppEnv } from '../middleware/auth.js';
import { validationErrorBody } from '../middleware/errors.js';

/** An OpenAPIHono router whose request validation failures use the API's error body. */
export const createRouter = () =>
    new OpenAPIHono<AppEnv>({
        defaultHook: (result, c) => {
            if (!result.success) {
                return c.json(validationErrorBody(result.error), 400);
            }
        },
    });
