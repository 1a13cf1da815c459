/**
 * Session authentication backend
 *
 * @module session-backend
 */

import type { HttpRequest } from "@portcullis/core";
import { textResponse } from "@portcullis/core";
import { SessionBackendOptionsSchema, validateOptions } from "./config.ts";
import type { AuthBackend, SessionBackendOptions } from "./types.ts";

type SessionData = Readonly<Record<string, unknown>>;

function defaultGetSession(req: HttpRequest): SessionData | undefined {
    return req.session;
}

/**
 * Create a session authentication backend.
 *
 * Parsing always matches; the identity is whatever truthy value the
 * session holds under `sessionKey`. Logging in is the application's job:
 * store the identity in the session and the next request is authenticated.
 *
 * @example
 * ```typescript
 * import { createSessionBackend } from '@portcullis/auth';
 *
 * const session = createSessionBackend({
 *   getSession: (req) => sessionStore.read(req.header.get('cookie')),
 * });
 * ```
 */
export function createSessionBackend(options: SessionBackendOptions = {}): AuthBackend<SessionData> {
    validateOptions("session backend", SessionBackendOptionsSchema, options);
    const { getSession = defaultGetSession, sessionKey = "identity", onUnauthorized } = options;

    return Object.freeze({
        name: "session",
        async parse(req: HttpRequest): Promise<SessionData> {
            return (await getSession(req)) ?? {};
        },
        authenticate(_req: HttpRequest, session: SessionData) {
            const identity = session[sessionKey];
            return identity ? identity : undefined;
        },
        onUnauthorized(req, metadata) {
            if (onUnauthorized) {
                return onUnauthorized(req, metadata);
            }
            return textResponse(401, metadata.message ?? "Unauthorized");
        },
    } satisfies AuthBackend<SessionData>);
}
