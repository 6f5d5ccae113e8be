// 1. Engine facade
export { CareCircleEngine } from "./CareCircleEngine.js";
export type { CareCircleConfig } from "./CareCircleEngine.js";
export { CareCircleClient } from "./CareCircleClient.js";

// 2. Domain models, DTOs & policy
export * from "./domain/index.js";
export * from "./errors.js";

// 3. Authorization
export * from "./access/evaluator.js";

// 4. Services
export { GroupService, toGroupSummary, DEFAULT_ADMIN_DISPLAY_NAME } from "./membership/GroupService.js";
export type { GroupDeletionHook, MembershipServiceDeps, CreatedGroup } from "./membership/GroupService.js";
export { MembershipStateMachine } from "./membership/MembershipStateMachine.js";
export type { ApprovalResult } from "./membership/MembershipStateMachine.js";
export { validateDisplayName, validateGroupName } from "./membership/validation.js";
export {
    InviteCodeAllocator, generateInviteCode, normalizeInviteCode, isWellFormedInviteCode
} from "./invites/InviteCodeAllocator.js";
export type { InviteCodeGenerator } from "./invites/InviteCodeAllocator.js";

// 5. Entitlements
export { systemClock, ManualClock } from "./entitlements/clock.js";
export type { Clock } from "./entitlements/clock.js";
export * from "./entitlements/trial.js";
export { EntitlementClock } from "./entitlements/EntitlementClock.js";
export { DailyAccessGate, accessDayOf } from "./entitlements/DailyAccessGate.js";
export type { DailyAccessStatus } from "./entitlements/DailyAccessGate.js";
export { InMemoryAttestationStore, UnsupportedAttestationStore } from "./entitlements/attestation.js";
export type { IDeviceAttestationStore } from "./entitlements/attestation.js";

// 6. Backing store
export type * from "./infrastructure/IDocumentStore.js";
export { keyOf } from "./infrastructure/IDocumentStore.js";
export { runInTransaction } from "./infrastructure/transactions.js";
export type { TransactionOptions } from "./infrastructure/transactions.js";
export { GroupRepository, newUserProfile } from "./infrastructure/GroupRepository.js";
export { DocumentMapper, StoreSnapshotSchema } from "./infrastructure/DocumentMapper.js";
export type { StoreSnapshot, SnapshotEntry } from "./infrastructure/DocumentMapper.js";
export { InMemoryDocumentStore } from "./storage/memory-store.js";
