import { addDays, differenceInMilliseconds, format, startOfDay } from "date-fns";
import type { IDocumentStore } from "../infrastructure/IDocumentStore.js";
import { keyOf } from "../infrastructure/IDocumentStore.js";
import { runInTransaction } from "../infrastructure/transactions.js";
import { AttestationUnsupportedError } from "../errors.js";
import type { Clock } from "./clock.js";
import type { IDeviceAttestationStore } from "./attestation.js";

export interface DailyAccessStatus {
    available: boolean;
    accessDate: string;
    msUntilNextAccess: number;
}

export const accessDayOf = (date: Date): string => format(date, "yyyy-MM-dd");

const sessionKey = (deviceId: string, accessDate: string) => keyOf("accessSessions", `${deviceId}:${accessDate}`);

// Sessions recorded under the attested token outlive the device id across reinstalls.
const attestedDeviceId = (token: string) => `attested-${token}`;

/**
 * Free-tier quota: one session per device per calendar day. Keyed by device,
 * not actor, so a reinstall with a fresh actor id does not reset it.
 */
export class DailyAccessGate {
    constructor(
        private store: IDocumentStore,
        private clock: Clock,
        private attestation?: IDeviceAttestationStore
    ) { }

    async canAccessToday(deviceId: string): Promise<boolean> {
        const today = accessDayOf(this.clock.now());
        const session = await this.store.get(sessionKey(deviceId, today));
        if (session?.used) return false;
        const token = await this.attestationToken();
        if (token === null) return true;
        return !(await this.attestedUsedToday(token, today));
    }

    async status(deviceId: string): Promise<DailyAccessStatus> {
        const available = await this.canAccessToday(deviceId);
        return {
            available,
            accessDate: accessDayOf(this.clock.now()),
            msUntilNextAccess: available ? 0 : this.timeUntilNextAccess(),
        };
    }

    /** Idempotent within a day. */
    async markUsed(deviceId: string): Promise<void> {
        const now = this.clock.now();
        const today = accessDayOf(now);
        const token = await this.attestationToken();

        const deviceIds = token === null ? [deviceId] : [deviceId, attestedDeviceId(token)];

        await runInTransaction(this.store, async tx => {
            for (const id of deviceIds) {
                const key = sessionKey(id, today);
                if ((await tx.get(key))?.used) continue;
                tx.set(key, { deviceId: id, accessDate: today, used: true, updatedAt: now });
            }
        }, { label: "markUsed" });

        if (token !== null) await this.withAttestation(attestation => attestation.writeBit(token, true));
    }

    timeUntilNextAccess(): number {
        const now = this.clock.now();
        return differenceInMilliseconds(startOfDay(addDays(now, 1)), now);
    }

    private async attestationToken(): Promise<string | null> {
        return (await this.withAttestation(attestation => attestation.getToken())) ?? null;
    }

    private async attestedUsedToday(deviceToken: string, today: string): Promise<boolean> {
        if (!(await this.withAttestation(attestation => attestation.readBit(deviceToken)))) return false;

        // The bit carries no date. Without a session recorded under the token today, it is left over from an earlier day.
        const session = await this.store.get(sessionKey(attestedDeviceId(deviceToken), today));
        if (session?.used) return true;
        await this.withAttestation(attestation => attestation.writeBit(deviceToken, false));
        return false;
    }

    // Absent or unsupported attestation degrades to the local quota alone.
    private async withAttestation<T>(call: (attestation: IDeviceAttestationStore) => Promise<T>): Promise<T | undefined> {
        if (!this.attestation) return undefined;
        try {
            return await call(this.attestation);
        } catch (e) {
            if (!(e instanceof AttestationUnsupportedError)) throw e;
            console.warn("[DailyAccessGate] Device attestation unsupported, falling back to the local quota");
            return undefined;
        }
    }
}
