import { sign } from 'hono/jwt';
import { CareCircleEngine, InMemoryDocumentStore, ManualClock, generateInviteCode } from '@carecircle/core';
import { createApp } from '../src/index.js';

export const TEST_SECRET = 'test-secret';
export const WEBHOOK_SECRET = 'test-webhook-secret';
export const T0 = new Date('2026-03-02T09:00:00.000Z');

export function createTestApp(codes: string[] = []) {
    const clock = new ManualClock(T0);
    const engine = new CareCircleEngine({
        store: new InMemoryDocumentStore(),
        clock,
        generateInviteCode: () => codes.shift() ?? generateInviteCode(),
    });
    const app = createApp({
        engine,
        config: { jwtSecret: TEST_SECRET, billingWebhookSecret: WEBHOOK_SECRET, requestLogging: false },
    });

    const tokenFor = (actorId: string) => sign({ sub: actorId }, TEST_SECRET);

    const call = async (actorId: string, method: string, path: string, body?: unknown, headers: Record<string, string> = {}) => {
        const init: RequestInit = {
            method,
            headers: { 'Authorization': `Bearer ${await tokenFor(actorId)}`, 'Content-Type': 'application/json', ...headers },
        };
        if (body !== undefined) init.body = JSON.stringify(body);
        return app.request(path, init);
    };

    return { app, engine, clock, tokenFor, call };
}

export const readJson = <T>(res: Response): Promise<T> => res.json();
