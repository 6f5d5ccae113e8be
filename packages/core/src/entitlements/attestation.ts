import { AttestationUnsupportedError } from "../errors.js";

/**
 * Platform device attestation: one bit per attested device token that
 * survives app deletion. Every call may fail with AttestationUnsupportedError.
 */
export interface IDeviceAttestationStore {
    getToken(): Promise<string>;
    readBit(token: string): Promise<boolean>;
    writeBit(token: string, value: boolean): Promise<void>;
}

export class UnsupportedAttestationStore implements IDeviceAttestationStore {
    async getToken(): Promise<string> {
        throw new AttestationUnsupportedError();
    }

    async readBit(): Promise<boolean> {
        throw new AttestationUnsupportedError();
    }

    async writeBit(): Promise<void> {
        throw new AttestationUnsupportedError();
    }
}

export class InMemoryAttestationStore implements IDeviceAttestationStore {
    private bits = new Map<string, boolean>();

    constructor(private token: string) { }

    async getToken(): Promise<string> {
        return this.token;
    }

    async readBit(token: string): Promise<boolean> {
        return this.bits.get(token) ?? false;
    }

    async writeBit(token: string, value: boolean): Promise<void> {
        this.bits.set(token, value);
    }
}
