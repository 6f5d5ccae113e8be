import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import { CareCircleError, ErrorCode, isCareCircleError } from '@carecircle/core';

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 503;

const STATUS_BY_CODE: Record<ErrorCode, ErrorStatus> = {
    UNAUTHENTICATED: 401,
    NOT_FOUND: 404,
    GROUP_FULL: 409,
    ALREADY_MEMBER: 409,
    ALREADY_OWNS_GROUP: 409,
    DUPLICATE_PENDING: 409,
    CONFLICT: 409,
    UNAUTHORIZED: 403,
    COOLDOWN_ACTIVE: 403,
    TRANSITION_LIMIT_REACHED: 403,
    TRIAL_EXPIRED: 403,
    VALIDATION_FAILED: 400,
    ALLOCATION_EXHAUSTED: 503,
};

const REASON: Record<ErrorStatus, string> = {
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    409: 'Conflict',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
};

export const statusFor = (err: CareCircleError): ErrorStatus => STATUS_BY_CODE[err.code];

export const errorHandler = (err: Error, c: Context) => {
    if (isCareCircleError(err)) {
        const status = statusFor(err);
        return c.json({ error: REASON[status], code: err.code, message: err.message }, status);
    }
    if (err instanceof HTTPException) {
        return err.getResponse();
    }

    console.error('[API] Unhandled error:', err);
    return c.json({ error: REASON[500], code: 'INTERNAL', message: 'Unexpected server error' }, 500);
};

export const validationErrorBody = (error: ZodError) => ({
    error: REASON[400],
    code: 'VALIDATION_FAILED',
    message: error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; '),
});
