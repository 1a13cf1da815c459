/**
 * Restrict wrapper
 *
 * Guards a single handler with a rule handler: no rule list, no URL matching.
 *
 * @module restrict
 */

import type { Handler } from "@portcullis/core";
import { ConfigurationError } from "@portcullis/core";
import { resolveDecision } from "./access-rules.ts";
import { evaluateRuleHandler, findInvalidRuleHandler } from "./rule-handler.ts";
import type { RestrictOptions } from "./types.ts";

/**
 * Wrap a handler with an authorization check.
 *
 * Success calls the handler with the unmodified request; an error decision
 * goes to `redirect`, then `onError`, then a 403.
 *
 * @throws ConfigurationError for a malformed handler tree
 *
 * @example
 * ```typescript
 * import { restrict, isAuthenticated } from '@portcullis/auth';
 *
 * const dashboard = restrict(renderDashboard, {
 *   handler: isAuthenticated,
 *   redirect: '/login',
 * });
 * ```
 */
export function restrict(handler: Handler, options: RestrictOptions): Handler {
    const problem = findInvalidRuleHandler(options.handler);
    if (problem) {
        throw new ConfigurationError(`@portcullis/auth restrict: ${problem}`, ["handler"]);
    }
    const { handler: ruleHandler, onError, redirect } = options;

    return async (req) => {
        const decision = await evaluateRuleHandler(ruleHandler, req);
        return await resolveDecision(decision, req, handler, { redirect, onError });
    };
}
