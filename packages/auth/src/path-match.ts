/**
 * Request matching for access rules
 *
 * Matching looks at the request path and method only.
 *
 * @module path-match
 */

import type { HttpRequest } from "@portcullis/core";
import type { CompiledAccessRule, UrlPattern } from "./types.ts";

/**
 * Captures produced by a successful match.
 */
export type MatchParams = Readonly<Record<string, string>>;

/**
 * Compile a URL pattern. Strings are regular expression sources.
 *
 * The global and sticky flags are dropped: they make `exec` stateful.
 *
 * @throws SyntaxError for an invalid regular expression source
 */
export function compileUrlPattern(pattern: UrlPattern): RegExp {
    if (typeof pattern === "string") {
        return new RegExp(pattern);
    }
    return pattern.global || pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")) : pattern;
}

/**
 * Match a path against patterns.
 *
 * Returns the named captures of the first pattern that matches (empty
 * when it has none), or undefined if no pattern matches.
 *
 * @example
 * ```typescript
 * matchPath("/projects/42", [/^\/projects\/(?<projectId>\d+)$/]); // { projectId: "42" }
 * ```
 */
export function matchPath(path: string, patterns: readonly RegExp[]): MatchParams | undefined {
    for (const pattern of patterns) {
        const result = pattern.exec(path);
        if (!result) {
            continue;
        }
        const params: Record<string, string> = {};
        for (const [name, value] of Object.entries(result.groups ?? {})) {
            if (value !== undefined) {
                params[name] = value;
            }
        }
        return params;
    }
    return undefined;
}

/**
 * Check a request method against a rule's method filter.
 */
export function matchesMethod(method: string, methods: ReadonlySet<string> | undefined): boolean {
    return methods === undefined || methods.has(method.toUpperCase());
}

/**
 * Match a request against one compiled rule.
 *
 * @returns Captures when the rule applies, undefined otherwise
 */
export function matchRule(rule: CompiledAccessRule, req: HttpRequest): MatchParams | undefined {
    if (!matchesMethod(req.method, rule.methods)) {
        return undefined;
    }
    if (rule.match) {
        const result = rule.match(req);
        if (result === true) return {};
        if (typeof result === "object" && result !== null) return result;
        return undefined;
    }
    return matchPath(req.url.pathname, rule.patterns);
}
