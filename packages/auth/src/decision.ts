/**
 * Authorization decisions
 *
 * Rule predicates may return anything; the value is normalized into a
 * {@link Decision} right after the predicate returns.
 *
 * @module decision
 */

import type { Decision, ErrorDecision, ErrorPayload, SuccessDecision } from "./types.ts";

const issued = new WeakSet<object>();

const SUCCESS: SuccessDecision = { kind: "success" };
Object.freeze(SUCCESS);
issued.add(SUCCESS);

/**
 * Successful decision.
 */
export function success(): SuccessDecision {
    return SUCCESS;
}

/**
 * Failed decision, optionally carrying a message or a replacement response.
 *
 * @example
 * ```typescript
 * const ownerOnly: RulePredicate = (req) =>
 *   getIdentity(req)?.id === getMatchParams(req).ownerId ? success() : error("Only the owner may do this");
 * ```
 */
export function error(payload?: ErrorPayload): ErrorDecision {
    const decision: ErrorDecision = payload === undefined ? { kind: "error" } : { kind: "error", payload };
    Object.freeze(decision);
    issued.add(decision);
    return decision;
}

/**
 * Whether a value is a decision created by {@link success} or {@link error}.
 */
export function isDecision(value: unknown): value is Decision {
    return typeof value === "object" && value !== null && issued.has(value);
}

/**
 * Normalize a predicate result.
 *
 * Decisions are kept; other truthy values are success; falsy values are an
 * error without payload.
 */
export function toDecision(value: unknown): Decision {
    if (isDecision(value)) {
        return value;
    }
    return value ? SUCCESS : error();
}

export function isSuccess(decision: Decision): decision is SuccessDecision {
    return decision.kind === "success";
}
