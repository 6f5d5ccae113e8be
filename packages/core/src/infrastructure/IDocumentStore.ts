import type { AccessSession, Group, InviteCode, JoinRequest, Member, UserProfile } from "../domain/models.js";

/**
 * Document types per collection. `members` and `joinRequests` live under a
 * group and are addressed with `parentId = groupId`; everything else is top-level.
 */
export interface DocumentTypes {
    groups: Group;
    members: Member;
    joinRequests: JoinRequest;
    userProfiles: UserProfile;
    inviteCodes: InviteCode;
    accessSessions: AccessSession;
}

export type CollectionName = keyof DocumentTypes;

export interface DocumentKey<C extends CollectionName> {
    collection: C;
    id: string;
    parentId?: string;
}

export interface ListOptions<T> {
    parentId?: string;
    where?: (doc: T) => boolean;
}

export interface IDocumentReader {
    get<C extends CollectionName>(key: DocumentKey<C>): Promise<DocumentTypes[C] | null>;
    list<C extends CollectionName>(collection: C, options?: ListOptions<DocumentTypes[C]>): Promise<DocumentTypes[C][]>;
}

/**
 * One attempt of an optimistic transaction. Reads are tracked, writes are
 * buffered and only applied if nothing read has changed by commit time.
 */
export interface ITransaction extends IDocumentReader {
    set<C extends CollectionName>(key: DocumentKey<C>, data: DocumentTypes[C]): void;
    delete<C extends CollectionName>(key: DocumentKey<C>): void;
}

export interface IDocumentStore extends IDocumentReader {
    /**
     * Runs `fn` once against a fresh transaction and commits its writes.
     * Throws ConflictError when a document read by `fn` changed before commit.
     */
    transact<R>(fn: (tx: ITransaction) => Promise<R>): Promise<R>;
}

export const keyOf = <C extends CollectionName>(collection: C, id: string, parentId?: string): DocumentKey<C> =>
    parentId === undefined ? { collection, id } : { collection, id, parentId };
