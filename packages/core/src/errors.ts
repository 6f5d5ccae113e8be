export type ErrorCode =
    | "UNAUTHENTICATED"
    | "NOT_FOUND"
    | "GROUP_FULL"
    | "ALREADY_MEMBER"
    | "ALREADY_OWNS_GROUP"
    | "DUPLICATE_PENDING"
    | "UNAUTHORIZED"
    | "COOLDOWN_ACTIVE"
    | "TRANSITION_LIMIT_REACHED"
    | "ALLOCATION_EXHAUSTED"
    | "TRIAL_EXPIRED"
    | "CONFLICT"
    | "VALIDATION_FAILED";

export abstract class CareCircleError extends Error {
    abstract readonly code: ErrorCode;
}

export class UnauthenticatedError extends CareCircleError {
    readonly code = "UNAUTHENTICATED";

    constructor(message = "Authentication required.") {
        super(message);
        this.name = "UnauthenticatedError";
    }
}

export type NotFoundResource = "group" | "inviteCode" | "joinRequest" | "member";

export class NotFoundError extends CareCircleError {
    readonly code = "NOT_FOUND";

    constructor(public readonly resource: NotFoundResource, message = "Resource not found.") {
        super(message);
        this.name = "NotFoundError";
    }
}

export abstract class InvariantViolationError extends CareCircleError { }

export class GroupFullError extends InvariantViolationError {
    readonly code = "GROUP_FULL";

    constructor(message = "This group is full (maximum 3 members).") {
        super(message);
        this.name = "GroupFullError";
    }
}

export class AlreadyMemberError extends InvariantViolationError {
    readonly code = "ALREADY_MEMBER";

    constructor(message = "You are already a member of this group.") {
        super(message);
        this.name = "AlreadyMemberError";
    }
}

export class AlreadyOwnsGroupError extends InvariantViolationError {
    readonly code = "ALREADY_OWNS_GROUP";

    constructor(public readonly existingGroupId: string, message = "You already own a group. Delete it before creating a new one.") {
        super(message);
        this.name = "AlreadyOwnsGroupError";
    }
}

export class DuplicatePendingError extends InvariantViolationError {
    readonly code = "DUPLICATE_PENDING";

    constructor(message = "A join request for this group is already pending.") {
        super(message);
        this.name = "DuplicatePendingError";
    }
}

export class UnauthorizedError extends CareCircleError {
    readonly code = "UNAUTHORIZED";

    constructor(message = "You are not allowed to perform this action.") {
        super(message);
        this.name = "UnauthorizedError";
    }
}

export class CooldownActiveError extends CareCircleError {
    readonly code = "COOLDOWN_ACTIVE";

    constructor(public readonly cooldownEndDate: Date, message = `You can create a new group after ${cooldownEndDate.toISOString()}.`) {
        super(message);
        this.name = "CooldownActiveError";
    }
}

export class TransitionLimitReachedError extends CareCircleError {
    readonly code = "TRANSITION_LIMIT_REACHED";

    constructor(message = "You have reached the maximum number of group transitions.") {
        super(message);
        this.name = "TransitionLimitReachedError";
    }
}

export class AllocationExhaustedError extends CareCircleError {
    readonly code = "ALLOCATION_EXHAUSTED";

    constructor(public readonly attempts: number, message = `Could not allocate a unique invite code after ${attempts} attempts.`) {
        super(message);
        this.name = "AllocationExhaustedError";
    }
}

export class TrialExpiredError extends CareCircleError {
    readonly code = "TRIAL_EXPIRED";

    constructor(public readonly trialEndDate: Date, message = "The trial for this group has ended. A subscription is required.") {
        super(message);
        this.name = "TrialExpiredError";
    }
}

export class ConflictError extends CareCircleError {
    readonly code = "CONFLICT";

    constructor(message = "Data has been modified by another user.") {
        super(message);
        this.name = "ConflictError";
    }
}

export class ValidationError extends CareCircleError {
    readonly code = "VALIDATION_FAILED";

    constructor(message: string) {
        super(message);
        this.name = "ValidationError";
    }
}

/** Raised by a Device Attestation Store on platforms without attestation. Callers degrade to "quota available". */
export class AttestationUnsupportedError extends Error {
    constructor(message = "Device attestation is not supported on this device.") {
        super(message);
        this.name = "AttestationUnsupportedError";
    }
}

export const isCareCircleError = (e: unknown): e is CareCircleError => e instanceof CareCircleError;
