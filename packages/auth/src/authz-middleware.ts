/**
 * Authorization middleware
 *
 * Catches the unauthorized signal raised downstream and resolves it into
 * a response. Every other error passes through unchanged.
 *
 * @module authz-middleware
 */

import type { HttpRequest, Middleware } from "@portcullis/core";
import { getLogger, textResponse } from "@portcullis/core";
import { getAuthBackend } from "./context.ts";
import { isUnauthorizedError } from "./errors.ts";
import type { AuthorizationMiddlewareOptions, AuthBackend, UnauthorizedMetadata } from "./types.ts";

/**
 * Resolve unauthorized metadata into a response.
 *
 * 1. A response carried by the metadata is returned as is.
 * 2. Otherwise the backend that authenticated the request answers.
 * 3. Otherwise the fallback backend, if any, answers.
 * 4. Otherwise a generic 403.
 */
export async function resolveUnauthorized(req: HttpRequest, metadata: UnauthorizedMetadata, fallback?: AuthBackend): Promise<Response> {
    if (metadata.response) {
        return metadata.response;
    }
    const backend = getAuthBackend(req) ?? fallback;
    if (backend) {
        return await backend.onUnauthorized(req, metadata);
    }
    return textResponse(403, metadata.message ?? "Forbidden");
}

/**
 * Create an authorization middleware.
 *
 * Place it after the authentication middleware so that the backend that
 * authenticated a request is known when a signal has to be answered.
 *
 * @example
 * ```typescript
 * import { composeMiddleware } from '@portcullis/core';
 * import { createAuthMiddleware, createAuthorizationMiddleware, raiseUnauthorized } from '@portcullis/auth';
 *
 * const app = composeMiddleware(
 *   createAuthMiddleware({ backends: [basic] }),
 *   createAuthorizationMiddleware({ backend: basic }),
 * )(async (req) => {
 *   if (!isAuthenticated(req)) raiseUnauthorized({ message: 'Login required' });
 *   return textResponse(200, 'ok');
 * });
 * ```
 */
export function createAuthorizationMiddleware(options: AuthorizationMiddlewareOptions = {}): Middleware {
    const { backend: fallback, logger = getLogger("portcullis.authz") } = options;

    return (next) => async (req) => {
        try {
            return await next(req);
        } catch (err) {
            if (!isUnauthorizedError(err)) {
                throw err;
            }
            const response = await resolveUnauthorized(req, err.unauthorized, fallback);
            logger.debug("unauthorized signal handled", {
                "url.path": req.url.pathname,
                "http.response.status_code": response.status,
                "auth.reason": err.unauthorized.message,
            });
            return response;
        }
    };
}
