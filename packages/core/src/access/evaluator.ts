import type { Group, Member } from "../domain/models.js";
import { isTrialValid } from "../entitlements/trial.js";
import { TrialExpiredError, UnauthenticatedError, UnauthorizedError } from "../errors.js";

export const OPERATION_CLASSES = ["ReadGroupMeta", "ReadContent", "WriteContent", "ManageRoster", "ManageGroupMeta"] as const;

export type OperationClass = typeof OPERATION_CLASSES[number];

/**
 * `ordinary` covers approving, denying and toggling members (any admin);
 * `privileged` covers forced removal and promotion (the creator only).
 */
export type RosterScope = "ordinary" | "privileged";

export interface EvaluationContext {
    /** Server time. Never a client-supplied timestamp. */
    now: Date;
    /** The actor's roster entry, when the caller has it; enables the access-disabled check. */
    member?: Member | null;
    rosterScope?: RosterScope;
}

export type DenialReason =
    | "unauthenticated"
    | "not-member"
    | "access-disabled"
    | "no-write-permission"
    | "not-admin"
    | "not-owner"
    | "trial-expired";

export type Decision = { allowed: true } | { allowed: false; reason: DenialReason };

const ALLOW: Decision = { allowed: true };
const deny = (reason: DenialReason): Decision => ({ allowed: false, reason });

export const isOperationClass = (value: string): value is OperationClass =>
    OPERATION_CLASSES.some(op => op === value);

function contentGate(actorId: string, group: Group, context: EvaluationContext): Decision | null {
    if (!group.memberIds.includes(actorId)) return deny("not-member");
    const member = context.member;
    if (member && member.userId === actorId && member.groupId === group.id && !member.isAccessEnabled) {
        return deny("access-disabled");
    }
    return null;
}

/**
 * The single authorization predicate. Pure: it reads only the group's roster,
 * the optional member entry and `context.now`, never content fields.
 */
export function evaluate(actorId: string | null | undefined, group: Group, op: OperationClass, context: EvaluationContext): Decision {
    if (!actorId) return deny("unauthenticated");

    switch (op) {
        case "ReadGroupMeta":
            return ALLOW;

        case "ReadContent": {
            const gate = contentGate(actorId, group, context);
            if (gate) return gate;
            return isTrialValid(group, context.now) ? ALLOW : deny("trial-expired");
        }

        case "WriteContent": {
            const gate = contentGate(actorId, group, context);
            if (gate) return gate;
            if (!group.writePermissionIds.includes(actorId)) return deny("no-write-permission");
            return isTrialValid(group, context.now) ? ALLOW : deny("trial-expired");
        }

        case "ManageRoster":
            if ((context.rosterScope ?? "ordinary") === "privileged") {
                return actorId === group.createdBy ? ALLOW : deny("not-owner");
            }
            return group.adminIds.includes(actorId) ? ALLOW : deny("not-admin");

        case "ManageGroupMeta":
            return group.adminIds.includes(actorId) ? ALLOW : deny("not-admin");
    }
}

/**
 * Boolean form of `evaluate`. Without `context.member` the access-disabled
 * check is skipped, so the content layer should go through
 * `GroupService.checkAccess`, which loads the member entry itself.
 */
export function canPerform(actorId: string | null | undefined, group: Group, op: OperationClass, context: EvaluationContext): boolean {
    return evaluate(actorId, group, op, context).allowed;
}

const DENIAL_MESSAGES: Record<Exclude<DenialReason, "unauthenticated" | "trial-expired">, string> = {
    "not-member": "You are not a member of this group.",
    "access-disabled": "Your access to this group has been disabled by an admin.",
    "no-write-permission": "You don't have permission to modify this data.",
    "not-admin": "Only admins can perform this action.",
    "not-owner": "Only the group creator can perform this action.",
};

/** Like `evaluate`, but throws the error the caller should surface. */
export function authorize(actorId: string | null | undefined, group: Group, op: OperationClass, context: EvaluationContext): void {
    const decision = evaluate(actorId, group, op, context);
    if (decision.allowed) return;

    switch (decision.reason) {
        case "unauthenticated":
            throw new UnauthenticatedError();
        case "trial-expired":
            throw new TrialExpiredError(group.trialEndDate);
        default:
            throw new UnauthorizedError(DENIAL_MESSAGES[decision.reason]);
    }
}
