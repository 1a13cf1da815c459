/**
 * Access rules
 *
 * Ordered, declarative authorization: the first rule whose method filter
 * and URL matcher accept the request decides, through its rule handler.
 * Requests no rule matches get the configured policy.
 *
 * @module access-rules
 */

import type { Handler, HttpRequest, Logger, Middleware } from "@portcullis/core";
import { ConfigurationError, getLogger, redirectResponse, textResponse, withContext } from "@portcullis/core";
import { getMatchParams } from "./context.ts";
import type { MatchParams } from "./path-match.ts";
import { compileUrlPattern, matchRule } from "./path-match.ts";
import { evaluateRuleHandler, findInvalidRuleHandler } from "./rule-handler.ts";
import type { AccessErrorHandler, AccessRule, AccessRulesOptions, CompiledAccessRule, Decision, ErrorPayload, RuleHandler } from "./types.ts";
import { AccessPolicy, AUTH_CONTEXT_KEYS } from "./types.ts";

function configurationError(ruleName: string, message: string, path: string): ConfigurationError {
    return new ConfigurationError(`@portcullis/auth access rules: rule "${ruleName}": ${message}`, [path]);
}

function compileRule(rule: AccessRule, index: number): CompiledAccessRule {
    const name = rule.name ?? `#${index}`;

    const problem = findInvalidRuleHandler(rule.handler);
    if (problem) {
        throw configurationError(name, problem, `rules.${index}.handler`);
    }

    if ((rule.pattern === undefined) === (rule.match === undefined)) {
        throw configurationError(name, "exactly one of pattern or match is required", `rules.${index}`);
    }
    if (rule.match !== undefined && typeof rule.match !== "function") {
        throw configurationError(name, "match must be a function", `rules.${index}.match`);
    }

    const sources: readonly unknown[] = rule.pattern === undefined ? [] : Array.isArray(rule.pattern) ? rule.pattern : [rule.pattern];
    if (rule.pattern !== undefined && sources.length === 0) {
        throw configurationError(name, "pattern list is empty", `rules.${index}.pattern`);
    }
    const patterns = sources.map((source) => {
        if (typeof source !== "string" && !(source instanceof RegExp)) {
            throw configurationError(name, "patterns must be RegExp objects or strings", `rules.${index}.pattern`);
        }
        try {
            return compileUrlPattern(source);
        } catch (err) {
            throw configurationError(name, `invalid pattern ${JSON.stringify(String(source))}: ${err instanceof Error ? err.message : String(err)}`, `rules.${index}.pattern`);
        }
    });

    let methods: ReadonlySet<string> | undefined;
    if (rule.method !== undefined) {
        const list: readonly string[] = typeof rule.method === "string" ? [rule.method] : rule.method;
        if (list.length === 0) {
            throw configurationError(name, "method list is empty", `rules.${index}.method`);
        }
        methods = new Set(list.map((method) => method.toUpperCase()));
    }

    if (rule.redirect !== undefined && rule.redirect.length === 0) {
        throw configurationError(name, "redirect must not be empty", `rules.${index}.redirect`);
    }

    return Object.freeze({
        name,
        patterns: Object.freeze(patterns),
        match: rule.match,
        methods,
        handler: rule.handler,
        onError: rule.onError,
        redirect: rule.redirect,
    });
}

/**
 * Validate and freeze an ordered rule list.
 *
 * @throws ConfigurationError for a rule without (or with two) matchers, an
 *   invalid pattern, an empty method list or a malformed handler tree
 */
export function compileAccessRules(rules: readonly AccessRule[]): readonly CompiledAccessRule[] {
    return Object.freeze(rules.map((rule, index) => compileRule(rule, index)));
}

/**
 * Find the first rule that applies to a request.
 *
 * @returns The rule and its captures, or undefined when no rule applies
 */
export function matchAccessRule(rules: readonly CompiledAccessRule[], req: HttpRequest): { rule: CompiledAccessRule; params: MatchParams } | undefined {
    for (const rule of rules) {
        const params = matchRule(rule, req);
        if (params !== undefined) {
            return { rule, params };
        }
    }
    return undefined;
}

/**
 * Response used when an error decision reaches no handler: a carried
 * response is returned as is, otherwise 403 with the message.
 */
export function defaultDenyResponse(payload: ErrorPayload | undefined): Response {
    if (payload instanceof Response) {
        return payload;
    }
    return textResponse(403, payload ?? "Forbidden");
}

/**
 * How an error decision turns into a response.
 */
export interface DenialHandlers {
    readonly redirect?: string | undefined;
    readonly onError?: AccessErrorHandler | undefined;
    readonly globalOnError?: AccessErrorHandler | undefined;
}

/**
 * Turn a decision into a response.
 *
 * Success runs `next` with the request it was given. An error goes to,
 * in order: the redirect target (payload ignored), the local handler, the
 * global handler, or {@link defaultDenyResponse}.
 */
export async function resolveDecision(decision: Decision, req: HttpRequest, next: Handler, handlers: DenialHandlers): Promise<Response> {
    if (decision.kind === "success") {
        return await next(req);
    }
    if (handlers.redirect !== undefined) {
        return redirectResponse(handlers.redirect);
    }
    const onError = handlers.onError ?? handlers.globalOnError;
    if (onError) {
        return await onError(req, decision.payload);
    }
    return defaultDenyResponse(decision.payload);
}

/**
 * Evaluate a rule handler with the rule's captures merged into the request context.
 */
async function evaluateWithParams(handler: RuleHandler, req: HttpRequest, params: MatchParams): Promise<Decision> {
    const scoped = withContext(req, { [AUTH_CONTEXT_KEYS.MATCH_PARAMS]: { ...getMatchParams(req), ...params } });
    return await evaluateRuleHandler(handler, scoped);
}

function logDecision(logger: Logger, req: HttpRequest, rule: CompiledAccessRule, decision: Decision): void {
    logger.debug(decision.kind === "success" ? "access granted" : "access denied", {
        "url.path": req.url.pathname,
        "http.request.method": req.method,
        "auth.rule": rule.name,
        "auth.resolution": decision.kind === "success" ? "handler" : rule.redirect !== undefined ? "redirect" : rule.onError ? "rule-on-error" : "global-on-error",
    });
}

/**
 * Create an access rules middleware.
 *
 * Rules are evaluated in order; the first one whose method filter and
 * matcher accept the request decides. Its handler's decision either lets
 * the request through unchanged or is answered by, in order, the rule's
 * `redirect`, the rule's `onError`, the global `onError` or a 403.
 * Unmatched requests follow `policy`.
 *
 * @throws ConfigurationError for invalid rules or a missing policy
 *
 * @example
 * ```typescript
 * import { AccessPolicy, createAccessRulesMiddleware, error, isAuthenticated } from '@portcullis/auth';
 *
 * const authenticatedOnly = (req) => isAuthenticated(req) || error('Login required');
 * const adminOnly = (req) => getIdentity(req)?.role === 'admin';
 *
 * const accessRules = createAccessRulesMiddleware({
 *   policy: AccessPolicy.REJECT,
 *   rules: [
 *     { name: 'health', pattern: '^/healthz$', handler: () => true },
 *     { name: 'admin', pattern: /^\/admin\//, handler: { and: [authenticatedOnly, adminOnly] }, redirect: '/login' },
 *     { name: 'projects', pattern: /^\/projects\/(?<projectId>[^/]+)/, method: ['PUT', 'DELETE'], handler: canEditProject },
 *     { name: 'everything-else', pattern: '^/', handler: authenticatedOnly },
 *   ],
 * });
 * ```
 */
export function createAccessRulesMiddleware(options: AccessRulesOptions): Middleware {
    const { policy, onError: globalOnError, logger = getLogger("portcullis.access-rules") } = options;
    if (policy !== AccessPolicy.ALLOW && policy !== AccessPolicy.REJECT) {
        throw new ConfigurationError(`@portcullis/auth access rules: policy must be "allow" or "reject"`, ["policy"]);
    }
    const rules = compileAccessRules(options.rules);

    return (next) => async (req) => {
        const matched = matchAccessRule(rules, req);

        if (!matched) {
            logger.debug("no access rule matched", { "url.path": req.url.pathname, "http.request.method": req.method, "auth.policy": policy });
            if (policy === AccessPolicy.ALLOW) {
                return await next(req);
            }
            return globalOnError ? await globalOnError(req, undefined) : defaultDenyResponse(undefined);
        }

        const { rule, params } = matched;
        const decision = await evaluateWithParams(rule.handler, req, params);
        logDecision(logger, req, rule, decision);
        return await resolveDecision(decision, req, next, { redirect: rule.redirect, onError: rule.onError, globalOnError });
    };
}
