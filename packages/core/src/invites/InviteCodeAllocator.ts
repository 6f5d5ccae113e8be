import { customAlphabet } from "nanoid";
import type { Group } from "../domain/models.js";
import { INVITE_CODE_ALPHABET, INVITE_CODE_LENGTH, INVITE_CODE_MAX_ATTEMPTS } from "../domain/policy.js";
import { AllocationExhaustedError, NotFoundError } from "../errors.js";
import type { IDocumentReader, IDocumentStore, ITransaction } from "../infrastructure/IDocumentStore.js";
import { keyOf } from "../infrastructure/IDocumentStore.js";
import { runInTransaction } from "../infrastructure/transactions.js";
import type { Clock } from "../entitlements/clock.js";

export type InviteCodeGenerator = () => string;

export const generateInviteCode: InviteCodeGenerator = customAlphabet(INVITE_CODE_ALPHABET, INVITE_CODE_LENGTH);

const INVITE_CODE_PATTERN = new RegExp(`^[${INVITE_CODE_ALPHABET}]{${INVITE_CODE_LENGTH}}$`);

export const normalizeInviteCode = (raw: string): string => raw.trim().toUpperCase();

export const isWellFormedInviteCode = (code: string): boolean => INVITE_CODE_PATTERN.test(code);

export class InviteCodeAllocator {
    constructor(
        private store: IDocumentStore,
        private clock: Clock,
        private generate: InviteCodeGenerator = generateInviteCode,
        private maxAttempts: number = INVITE_CODE_MAX_ATTEMPTS
    ) { }

    async allocate(groupId: string): Promise<string> {
        return runInTransaction(this.store, tx => this.allocateWithin(tx, groupId), { label: "allocateInviteCode" });
    }

    /**
     * Reserves a code for `groupId` as part of the caller's transaction, so the
     * group and its code mapping commit together. A code whose group no longer
     * exists is free for reuse.
     */
    async allocateWithin(tx: ITransaction, groupId: string): Promise<string> {
        for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
            const code = normalizeInviteCode(this.generate());
            if (!isWellFormedInviteCode(code)) continue;

            const existing = await tx.get(keyOf("inviteCodes", code));
            if (existing && existing.groupId !== groupId && (await tx.get(keyOf("groups", existing.groupId)))) continue;

            tx.set(keyOf("inviteCodes", code), { code, groupId, createdAt: this.clock.now() });
            return code;
        }

        // Collisions are 1 in 36^6 per draw; running out means the generator is broken.
        console.error(`[InviteCodeAllocator] ALARM: no free invite code after ${this.maxAttempts} attempts (group ${groupId})`);
        throw new AllocationExhaustedError(this.maxAttempts);
    }

    async resolve(rawCode: string): Promise<string> {
        const group = await this.resolveGroup(this.store, rawCode);
        return group.id;
    }

    async resolveGroup(reader: IDocumentReader, rawCode: string): Promise<Group> {
        const code = normalizeInviteCode(rawCode);
        if (!isWellFormedInviteCode(code)) throw new NotFoundError("inviteCode", "Invalid invite code.");

        const mapping = await reader.get(keyOf("inviteCodes", code));
        if (!mapping) throw new NotFoundError("inviteCode", "Invalid invite code.");

        const group = await reader.get(keyOf("groups", mapping.groupId));
        if (!group) throw new NotFoundError("group", "Group not found.");
        return group;
    }
}
