import type {
    CollectionName, DocumentKey, DocumentTypes, IDocumentStore, ITransaction, ListOptions
} from "../infrastructure/IDocumentStore.js";
import { DocumentMapper, SnapshotEntry, StoreSnapshot } from "../infrastructure/DocumentMapper.js";
import { ConflictError } from "../errors.js";

interface StoredDocument<T> {
    id: string;
    parentId?: string;
    version: number;
    data: T;
}

type Tables = { [C in keyof DocumentTypes]: Map<string, StoredDocument<DocumentTypes[C]>> };

interface PendingWrite {
    key: DocumentKey<CollectionName>;
    data: DocumentTypes[CollectionName] | null;
}

const storageKey = (id: string, parentId?: string) => (parentId === undefined ? id : `${parentId}/${id}`);
const documentRef = (key: DocumentKey<CollectionName>) => `${key.collection}:${storageKey(key.id, key.parentId)}`;
const scopeRef = (collection: CollectionName, parentId?: string) => `${collection}:${parentId ?? ""}`;

const emptyTables = (): Tables => ({
    groups: new Map(),
    members: new Map(),
    joinRequests: new Map(),
    userProfiles: new Map(),
    inviteCodes: new Map(),
    accessSessions: new Map(),
});

class MemoryTransaction implements ITransaction {
    readonly documentReads = new Map<string, number>();
    readonly scopeReads = new Map<string, number>();
    private writes = new Map<string, PendingWrite>();

    constructor(private store: InMemoryDocumentStore) { }

    // Reads observe committed state only; writes become visible at commit.
    async get<C extends CollectionName>(key: DocumentKey<C>): Promise<DocumentTypes[C] | null> {
        const ref = documentRef(key);
        if (!this.documentReads.has(ref)) this.documentReads.set(ref, this.store.versionOf(key));
        return this.store.read(key);
    }

    async list<C extends CollectionName>(collection: C, options: ListOptions<DocumentTypes[C]> = {}): Promise<DocumentTypes[C][]> {
        const ref = scopeRef(collection, options.parentId);
        if (!this.scopeReads.has(ref)) this.scopeReads.set(ref, this.store.scopeVersionOf(collection, options.parentId));
        return this.store.list(collection, options);
    }

    set<C extends CollectionName>(key: DocumentKey<C>, data: DocumentTypes[C]): void {
        this.writes.set(documentRef(key), { key, data: structuredClone(data) });
    }

    delete<C extends CollectionName>(key: DocumentKey<C>): void {
        this.writes.set(documentRef(key), { key, data: null });
    }

    pendingWrites(): PendingWrite[] {
        return [...this.writes.values()];
    }
}

/**
 * In-process document store with per-document versions and optimistic
 * transactions. Documents are cloned on the way in and out.
 */
export class InMemoryDocumentStore implements IDocumentStore {
    private tables: Tables = emptyTables();
    // Last write sequence per document (kept after deletes) and per collection scope.
    private documentVersions = new Map<string, number>();
    private scopeVersions = new Map<string, number>();
    private sequence = 0;

    async get<C extends CollectionName>(key: DocumentKey<C>): Promise<DocumentTypes[C] | null> {
        return this.read(key);
    }

    async list<C extends CollectionName>(collection: C, options: ListOptions<DocumentTypes[C]> = {}): Promise<DocumentTypes[C][]> {
        const results: DocumentTypes[C][] = [];
        const table: Map<string, StoredDocument<DocumentTypes[C]>> = this.tables[collection];
        for (const stored of table.values()) {
            if (options.parentId !== undefined && stored.parentId !== options.parentId) continue;
            if (options.where && !options.where(stored.data)) continue;
            results.push(structuredClone(stored.data));
        }
        return results;
    }

    async transact<R>(fn: (tx: ITransaction) => Promise<R>): Promise<R> {
        const tx = new MemoryTransaction(this);
        const result = await fn(tx);
        this.commit(tx);
        return result;
    }

    /** @internal */
    read<C extends CollectionName>(key: DocumentKey<C>): DocumentTypes[C] | null {
        const table: Map<string, StoredDocument<DocumentTypes[C]>> = this.tables[key.collection];
        const stored = table.get(storageKey(key.id, key.parentId));
        return stored ? structuredClone(stored.data) : null;
    }

    /** @internal */
    versionOf(key: DocumentKey<CollectionName>): number {
        return this.documentVersions.get(documentRef(key)) ?? 0;
    }

    /** @internal */
    scopeVersionOf(collection: CollectionName, parentId?: string): number {
        return this.scopeVersions.get(scopeRef(collection, parentId)) ?? 0;
    }

    snapshot(): StoreSnapshot {
        const documents: SnapshotEntry[] = [
            ...this.entries("groups"),
            ...this.entries("members"),
            ...this.entries("joinRequests"),
            ...this.entries("userProfiles"),
            ...this.entries("inviteCodes"),
            ...this.entries("accessSessions"),
        ];
        return { format: 1, sequence: this.sequence, documents };
    }

    restore(raw: unknown): void {
        const snapshot = DocumentMapper.parseSnapshot(raw);
        this.tables = emptyTables();
        this.documentVersions.clear();
        this.scopeVersions.clear();
        this.sequence = snapshot.sequence;
        for (const entry of snapshot.documents) {
            this.sequence = Math.max(this.sequence, entry.version);
            const key: DocumentKey<CollectionName> = entry.parentId === undefined
                ? { collection: entry.collection, id: entry.id }
                : { collection: entry.collection, id: entry.id, parentId: entry.parentId };
            this.put(key, entry.data, entry.version);
        }
    }

    // Validation and application happen in one synchronous step, so commits never interleave.
    private commit(tx: MemoryTransaction): void {
        const writes = tx.pendingWrites();
        if (writes.length === 0) return;

        for (const [ref, version] of tx.documentReads) {
            if ((this.documentVersions.get(ref) ?? 0) !== version) {
                throw new ConflictError(`Document ${ref} changed during the transaction.`);
            }
        }
        for (const [ref, version] of tx.scopeReads) {
            if ((this.scopeVersions.get(ref) ?? 0) !== version) {
                throw new ConflictError(`Collection ${ref} changed during the transaction.`);
            }
        }

        const version = ++this.sequence;
        for (const write of writes) {
            if (write.data === null) {
                this.remove(write.key, version);
            } else {
                this.put(write.key, write.data, version);
            }
        }
    }

    private put<C extends CollectionName>(key: DocumentKey<C>, data: DocumentTypes[C], version: number): void {
        const stored: StoredDocument<DocumentTypes[C]> = { id: key.id, version, data: structuredClone(data) };
        if (key.parentId !== undefined) stored.parentId = key.parentId;
        const table: Map<string, StoredDocument<DocumentTypes[C]>> = this.tables[key.collection];
        table.set(storageKey(key.id, key.parentId), stored);
        this.touch(key, version);
    }

    private remove<C extends CollectionName>(key: DocumentKey<C>, version: number): void {
        const table: Map<string, StoredDocument<DocumentTypes[C]>> = this.tables[key.collection];
        if (table.delete(storageKey(key.id, key.parentId))) {
            this.touch(key, version);
        }
    }

    private touch(key: DocumentKey<CollectionName>, version: number): void {
        this.documentVersions.set(documentRef(key), version);
        this.scopeVersions.set(scopeRef(key.collection), version);
        if (key.parentId !== undefined) this.scopeVersions.set(scopeRef(key.collection, key.parentId), version);
    }

    private entries<C extends CollectionName>(collection: C) {
        const table: Map<string, StoredDocument<DocumentTypes[C]>> = this.tables[collection];
        return [...table.values()].map(stored => ({
            collection,
            id: stored.id,
            parentId: stored.parentId,
            version: stored.version,
            data: structuredClone(stored.data),
        }));
    }
}
