/**
 * Authentication middleware
 *
 * Runs the configured backends in order and attaches the first identity
 * found to the request. Unauthenticated requests pass through untouched;
 * whether that matters is decided downstream.
 *
 * @module auth-middleware
 */

import type { HttpRequest, Middleware } from "@portcullis/core";
import { ConfigurationError, getLogger } from "@portcullis/core";
import type { AuthContext } from "./context.ts";
import { authContextStorage, withIdentity } from "./context.ts";
import type { AuthBackend, AuthMiddlewareOptions } from "./types.ts";

/**
 * Authenticate a request against backends in order.
 *
 * For each backend: `parse`, then `authenticate` if parse produced data.
 * The first truthy identity wins. Later backends are not consulted.
 *
 * @returns The identity and the backend that produced it, or undefined
 */
export async function authenticateRequest(req: HttpRequest, backends: ReadonlyArray<AuthBackend>): Promise<AuthContext | undefined> {
    for (const backend of backends) {
        const data = await backend.parse(req);
        if (data === undefined) {
            continue;
        }
        const identity = await backend.authenticate(req, data);
        if (identity) {
            return { identity, backend };
        }
    }
    return undefined;
}

/**
 * Create an authentication middleware.
 *
 * On success the downstream handler receives the request with `identity`
 * and `authBackend` in its context, and runs inside the auth
 * AsyncLocalStorage scope.
 *
 * @throws ConfigurationError when `backends` is empty
 *
 * @example Basic auth with session fallback
 * ```typescript
 * import { createAuthMiddleware, createBasicBackend, createSessionBackend } from '@portcullis/auth';
 *
 * const authentication = createAuthMiddleware({
 *   backends: [createSessionBackend(), createBasicBackend({ realm: 'API', authenticate: checkPassword })],
 * });
 * ```
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): Middleware {
    const { backends, logger = getLogger("portcullis.auth") } = options;
    if (backends.length === 0) {
        throw new ConfigurationError("@portcullis/auth authentication: at least one backend is required", ["backends"]);
    }
    const ordered = Object.freeze([...backends]);

    return (next) => async (req) => {
        const authContext = await authenticateRequest(req, ordered);
        if (!authContext) {
            logger.debug("request unauthenticated", { "url.path": req.url.pathname, "auth.backends": ordered.map((backend) => backend.name) });
            return await next(req);
        }

        logger.debug("request authenticated", { "url.path": req.url.pathname, "auth.backend": authContext.backend.name });
        const authenticated = withIdentity(req, authContext);
        return await authContextStorage.run(authContext, () => next(authenticated));
    };
}
