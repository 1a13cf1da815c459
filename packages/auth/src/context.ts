/**
 * Authentication context
 *
 * Identity and backend are attached to the request context by the
 * authentication middleware. The same values are also kept in
 * AsyncLocalStorage so code without access to the request can read them.
 *
 * @module context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { HttpRequest } from "@portcullis/core";
import { withContext } from "@portcullis/core";
import { UnauthorizedError } from "./errors.ts";
import type { AuthBackend, Identity } from "./types.ts";
import { AUTH_CONTEXT_KEYS } from "./types.ts";

/**
 * Result of a successful authentication
 */
export interface AuthContext {
    readonly identity: Identity;
    readonly backend: AuthBackend;
}

/**
 * Module-level AsyncLocalStorage for auth context.
 *
 * Set by the authentication middleware, read via getAuthContext().
 * Automatically isolated per async context (request).
 */
export const authContextStorage = new AsyncLocalStorage<AuthContext>();

function isIdentity(value: unknown): value is Identity {
    return Boolean(value);
}

function isAuthBackend(value: unknown): value is AuthBackend {
    return (
        typeof value === "object" &&
        value !== null &&
        "parse" in value &&
        typeof value.parse === "function" &&
        "authenticate" in value &&
        typeof value.authenticate === "function" &&
        "onUnauthorized" in value &&
        typeof value.onUnauthorized === "function"
    );
}

/**
 * Identity attached to the request, if any.
 */
export function getIdentity(req: HttpRequest): Identity | undefined {
    const identity = req.context[AUTH_CONTEXT_KEYS.IDENTITY];
    return isIdentity(identity) ? identity : undefined;
}

/**
 * Whether an identity is attached to the request.
 *
 * @example
 * ```typescript
 * const handler: Handler = async (req) =>
 *   isAuthenticated(req) ? textResponse(200, "welcome back") : textResponse(200, "hello stranger");
 * ```
 */
export function isAuthenticated(req: HttpRequest): boolean {
    return getIdentity(req) !== undefined;
}

/**
 * Backend that authenticated the request, if any.
 */
export function getAuthBackend(req: HttpRequest): AuthBackend | undefined {
    const backend = req.context[AUTH_CONTEXT_KEYS.BACKEND];
    return isAuthBackend(backend) ? backend : undefined;
}

/**
 * Attach an identity and its backend to a request.
 */
export function withIdentity(req: HttpRequest, context: AuthContext): HttpRequest {
    return withContext(req, {
        [AUTH_CONTEXT_KEYS.IDENTITY]: context.identity,
        [AUTH_CONTEXT_KEYS.BACKEND]: context.backend,
    });
}

/**
 * Captures of the access rule that matched the request (empty when none).
 */
export function getMatchParams(req: HttpRequest): Readonly<Record<string, string>> {
    const params: unknown = req.context[AUTH_CONTEXT_KEYS.MATCH_PARAMS];
    if (typeof params !== "object" || params === null) {
        return {};
    }
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(params)) {
        if (typeof value === "string") {
            result[key] = value;
        }
    }
    return result;
}

/**
 * Get the current auth context.
 *
 * Returns the AuthContext set by the authentication middleware in the
 * current async context, or undefined if the request is unauthenticated.
 */
export function getAuthContext(): AuthContext | undefined {
    return authContextStorage.getStore();
}

/**
 * Get the current identity or raise the unauthorized signal.
 *
 * @throws UnauthorizedError if no identity is available
 *
 * @example Usage deep inside a service
 * ```typescript
 * async function deleteProject(id: string) {
 *   const user = requireIdentity();
 *   ...
 * }
 * ```
 */
export function requireIdentity(): Identity {
    const context = authContextStorage.getStore();
    if (!context) {
        throw new UnauthorizedError({ message: "Authentication required" });
    }
    return context.identity;
}
