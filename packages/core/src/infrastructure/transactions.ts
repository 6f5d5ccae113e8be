import { ConflictError } from "../errors.js";
import { DEFAULT_TRANSACTION_ATTEMPTS } from "../domain/policy.js";
import type { IDocumentStore, ITransaction } from "./IDocumentStore.js";

export interface TransactionOptions {
    maxAttempts?: number;
    label?: string;
}

/**
 * Bounded retry around a read-check-write transaction. Only version conflicts
 * are retried; any other error aborts immediately. When attempts run out the
 * last ConflictError is re-thrown as is.
 */
export async function runInTransaction<R>(
    store: IDocumentStore,
    fn: (tx: ITransaction) => Promise<R>,
    options: TransactionOptions = {}
): Promise<R> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_TRANSACTION_ATTEMPTS);
    let lastConflict: ConflictError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await store.transact(fn);
        } catch (e) {
            if (!(e instanceof ConflictError)) throw e;
            lastConflict = e;
            if (options.label) {
                console.warn(`[Transaction] ${options.label}: conflict on attempt ${attempt}/${maxAttempts}`);
            }
        }
    }

    throw lastConflict ?? new ConflictError();
}
