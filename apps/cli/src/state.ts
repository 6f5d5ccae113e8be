import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { randomUUID } from 'crypto';
import { isValid, parseISO } from 'date-fns';
import {
    CareCircleClient, CareCircleEngine, Clock, DocumentMapper, InMemoryDocumentStore, ManualClock, systemClock
} from '@carecircle/core';

export const CONFIG_DIR = path.join(os.homedir(), '.carecircle');
export const DEFAULT_STATE_PATH = path.join(CONFIG_DIR, 'state.json');
export const SESSION_PATH = path.join(CONFIG_DIR, 'session.json');

export interface GlobalOptions {
    state?: string;
    as?: string;
    at?: string;
}

export interface Session {
    actorId: string;
    deviceId: string;
}

export interface CliContext {
    engine: CareCircleEngine;
    client: CareCircleClient;
    deviceId: string;
    save(): Promise<void>;
}

const isMissingFile = (e: unknown) => e instanceof Error && 'code' in e && e.code === 'ENOENT';

async function readJson(filePath: string): Promise<unknown> {
    try {
        return JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (e) {
        if (isMissingFile(e)) return null;
        throw e;
    }
}

export async function loadStore(statePath: string): Promise<InMemoryDocumentStore> {
    const store = new InMemoryDocumentStore();
    const raw = await readJson(statePath);
    if (raw !== null) store.restore(raw);
    return store;
}

export async function saveStore(statePath: string, store: InMemoryDocumentStore): Promise<void> {
    await fs.mkdir(path.dirname(statePath), { recursive: true });
    await fs.writeFile(statePath, DocumentMapper.serializeSnapshot(store.snapshot()), { mode: 0o600 });
}

export async function getSession(sessionPath = SESSION_PATH): Promise<Session | null> {
    const raw = await readJson(sessionPath);
    if (typeof raw !== 'object' || raw === null) return null;
    if (!('actorId' in raw) || typeof raw.actorId !== 'string') return null;
    if (!('deviceId' in raw) || typeof raw.deviceId !== 'string') return null;
    return { actorId: raw.actorId, deviceId: raw.deviceId };
}

/** Keeps the device id of an earlier session so the daily quota follows the machine, not the user. */
export async function saveSession(actorId: string, sessionPath = SESSION_PATH): Promise<Session> {
    const previous = await getSession(sessionPath);
    const session: Session = { actorId, deviceId: previous?.deviceId ?? randomUUID() };
    await fs.mkdir(path.dirname(sessionPath), { recursive: true });
    await fs.writeFile(sessionPath, JSON.stringify(session, null, 2), { mode: 0o600 });
    return session;
}

export async function clearSession(sessionPath = SESSION_PATH): Promise<void> {
    try {
        await fs.unlink(sessionPath);
    } catch (e) {
        if (!isMissingFile(e)) throw e;
    }
}

export function parseClock(at: string | undefined): Clock {
    if (at === undefined) return systemClock;
    const date = parseISO(at);
    if (!isValid(date)) throw new Error(`Invalid --at timestamp: ${at}`);
    return new ManualClock(date);
}

export async function openContext(options: GlobalOptions, sessionPath = SESSION_PATH): Promise<CliContext> {
    const statePath = options.state ?? process.env.CARECIRCLE_STATE_FILE ?? DEFAULT_STATE_PATH;
    const session = await getSession(sessionPath);
    const actorId = options.as ?? process.env.CARECIRCLE_ACTOR ?? session?.actorId;
    if (!actorId) {
        throw new Error("Not logged in. Run 'carecircle login <user-id>' first.");
    }

    const store = await loadStore(statePath);
    const engine = new CareCircleEngine({ store, clock: parseClock(options.at) });

    return {
        engine,
        client: engine.as(actorId),
        deviceId: session?.deviceId ?? `cli-${actorId}`,
        save: () => saveStore(statePath, store),
    };
}
