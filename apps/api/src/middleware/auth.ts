import type { Context, Next } from 'hono';
import { verify } from 'hono/jwt';
import { CareCircleClient, CareCircleEngine, UnauthenticatedError } from '@carecircle/core';

// Strongly type our Hono Context so handlers know about injected variables
export type AppEnv = {
    Variables: {
        engine: CareCircleEngine;
        actorId: string;
        client: CareCircleClient;
    };
};

/**
 * Verifies the bearer JWT (HS256) and binds its `sub` claim as the actor.
 * The actor id is the only thing taken from the token.
 */
export const createAuthMiddleware = (jwtSecret: string) => async (c: Context<AppEnv>, next: Next) => {
    const authHeader = c.req.header('Authorization');

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new UnauthenticatedError('Missing or invalid Authorization header');
    }

    const token = authHeader.slice('Bearer '.length);

    let actorId: unknown;
    try {
        const payload = await verify(token, jwtSecret, 'HS256');
        actorId = payload.sub;
    } catch (e) {
        throw new UnauthenticatedError(`Invalid token: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (typeof actorId !== 'string' || actorId.length === 0) {
        throw new UnauthenticatedError('Token has no subject');
    }

    c.set('actorId', actorId);
    c.set('client', c.get('engine').as(actorId));
    await next();
};
