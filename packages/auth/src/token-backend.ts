/**
 * Opaque token authentication backend
 *
 * @module token-backend
 */

import type { HttpRequest } from "@portcullis/core";
import { textResponse } from "@portcullis/core";
import { TokenBackendOptionsSchema, validateOptions } from "./config.ts";
import { readSchemeCredentials } from "./headers.ts";
import type { AuthBackend, TokenBackendOptions, TokenLocation, UnauthorizedHandler } from "./types.ts";

/**
 * Build a token extractor for `<header>: <scheme> <token>`.
 */
export function createTokenReader(location: TokenLocation): (req: HttpRequest) => string | undefined {
    const { header = "authorization", scheme = "Token" } = location;
    return (req) => readSchemeCredentials(req.header, header, scheme);
}

/**
 * Default unauthorized handler for token backends: plain 401.
 */
export function tokenUnauthorizedHandler(custom: UnauthorizedHandler | undefined): UnauthorizedHandler {
    return (req, metadata) => (custom ? custom(req, metadata) : textResponse(401, metadata.message ?? "Unauthorized"));
}

/**
 * Create an opaque token authentication backend.
 *
 * Reads the token from `Authorization: Token <value>` (header and scheme
 * configurable) and resolves it through the `authenticate` identity function.
 *
 * @example API key in a custom header
 * ```typescript
 * import { createTokenBackend } from '@portcullis/auth';
 *
 * const apiKeys = createTokenBackend({
 *   header: 'x-api-key',
 *   scheme: 'Key',
 *   authenticate: (_req, key) => apiKeyStore.lookup(key),
 * });
 * ```
 */
export function createTokenBackend(options: TokenBackendOptions): AuthBackend<string> {
    validateOptions("token backend", TokenBackendOptionsSchema, options);
    const { authenticate } = options;
    const readToken = createTokenReader(options);
    const onUnauthorized = tokenUnauthorizedHandler(options.onUnauthorized);

    return Object.freeze({
        name: "token",
        parse: readToken,
        authenticate(req: HttpRequest, token: string) {
            return authenticate(req, token);
        },
        onUnauthorized,
    } satisfies AuthBackend<string>);
}
