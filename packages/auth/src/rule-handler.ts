/**
 * Rule handler evaluation
 *
 * @module rule-handler
 */

import type { HttpRequest } from "@portcullis/core";
import { error, success, toDecision } from "./decision.ts";
import type { Decision, ErrorDecision, RuleHandler } from "./types.ts";

/**
 * Evaluate a rule handler tree against a request.
 *
 * - predicate: its result, normalized
 * - `and`: first error (later children are not evaluated), else success
 * - `or`: first success (later children are not evaluated), else the last error
 * - `not`: success becomes an error without payload, an error becomes success
 *
 * An empty `and` succeeds; an empty `or` fails without payload.
 */
export async function evaluateRuleHandler(handler: RuleHandler, req: HttpRequest): Promise<Decision> {
    if (typeof handler === "function") {
        return toDecision(await handler(req));
    }

    if ("and" in handler) {
        for (const child of handler.and) {
            const decision = await evaluateRuleHandler(child, req);
            if (decision.kind === "error") {
                return decision;
            }
        }
        return success();
    }

    if ("or" in handler) {
        let last: ErrorDecision | undefined;
        for (const child of handler.or) {
            const decision = await evaluateRuleHandler(child, req);
            if (decision.kind === "success") {
                return decision;
            }
            last = decision;
        }
        return last ?? error();
    }

    const inner = await evaluateRuleHandler(handler.not, req);
    return inner.kind === "success" ? error() : success();
}

/**
 * Check the shape of a rule handler tree.
 *
 * @returns A description of the first invalid node, or undefined
 */
export function findInvalidRuleHandler(handler: unknown, path = "handler"): string | undefined {
    if (typeof handler === "function") {
        return undefined;
    }
    if (typeof handler !== "object" || handler === null) {
        return `${path} must be a function or an { and }, { or } or { not } object`;
    }
    const entries = Object.entries(handler);
    const [entry] = entries;
    if (entries.length !== 1 || !entry) {
        return `${path} must have exactly one of and, or, not`;
    }
    const [key, value]: [string, unknown] = entry;
    if (key === "not") {
        return findInvalidRuleHandler(value, `${path}.not`);
    }
    if (key !== "and" && key !== "or") {
        return `${path} must have exactly one of and, or, not`;
    }
    if (!Array.isArray(value)) {
        return `${path}.${key} must be an array`;
    }
    for (const [index, child] of value.entries()) {
        const problem = findInvalidRuleHandler(child, `${path}.${key}[${index}]`);
        if (problem) return problem;
    }
    return undefined;
}
