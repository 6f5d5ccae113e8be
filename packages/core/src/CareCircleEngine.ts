import type { IDocumentStore } from "./infrastructure/IDocumentStore.js";
import { InMemoryDocumentStore } from "./storage/memory-store.js";
import { Clock, systemClock } from "./entitlements/clock.js";
import { EntitlementClock } from "./entitlements/EntitlementClock.js";
import { DailyAccessGate } from "./entitlements/DailyAccessGate.js";
import type { IDeviceAttestationStore } from "./entitlements/attestation.js";
import { generateInviteCode, InviteCodeAllocator, InviteCodeGenerator } from "./invites/InviteCodeAllocator.js";
import { GroupDeletionHook, GroupService } from "./membership/GroupService.js";
import { MembershipStateMachine } from "./membership/MembershipStateMachine.js";
import { CareCircleClient } from "./CareCircleClient.js";

export interface CareCircleConfig {
    store?: IDocumentStore;
    clock?: Clock;
    attestation?: IDeviceAttestationStore;
    generateInviteCode?: InviteCodeGenerator;
    /** Bounded retry budget for roster transactions. */
    transactionAttempts?: number;
    deletionHooks?: GroupDeletionHook[];
}

export class CareCircleEngine {
    public readonly store: IDocumentStore;
    public readonly clock: Clock;
    public readonly invites: InviteCodeAllocator;
    public readonly groups: GroupService;
    public readonly membership: MembershipStateMachine;
    public readonly entitlements: EntitlementClock;
    public readonly dailyAccess: DailyAccessGate;

    constructor(config: CareCircleConfig = {}) {
        this.store = config.store ?? new InMemoryDocumentStore();
        this.clock = config.clock ?? systemClock;
        this.invites = new InviteCodeAllocator(this.store, this.clock, config.generateInviteCode ?? generateInviteCode);

        const deps = {
            store: this.store,
            clock: this.clock,
            allocator: this.invites,
            transactionAttempts: config.transactionAttempts,
            deletionHooks: config.deletionHooks,
        };
        this.groups = new GroupService(deps);
        this.membership = new MembershipStateMachine(deps, this.groups);
        this.entitlements = new EntitlementClock(this.clock);
        this.dailyAccess = new DailyAccessGate(this.store, this.clock, config.attestation);
    }

    /** Binds an authenticated actor. There is no ambient "current group"; every call names its group. */
    public as(actorId: string): CareCircleClient {
        return new CareCircleClient(this, actorId);
    }
}
