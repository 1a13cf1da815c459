/**
 * HTTP Basic authentication backend
 *
 * @module basic-backend
 */

import type { HttpRequest } from "@portcullis/core";
import { textResponse } from "@portcullis/core";
import { BasicBackendOptionsSchema, validateOptions } from "./config.ts";
import { decodeBasicCredentials, quoteHeaderParameter, readSchemeCredentials } from "./headers.ts";
import type { AuthBackend, BasicBackendOptions, BasicCredentials } from "./types.ts";

/**
 * Create an HTTP Basic authentication backend.
 *
 * Reads `Authorization: Basic <base64(username:password)>` and resolves the
 * pair through the `authenticate` identity function. Unauthorized requests
 * get a 401 challenge for the configured realm.
 *
 * @throws ConfigurationError when `authenticate` is missing or `realm` is invalid
 *
 * @example
 * ```typescript
 * import { createBasicBackend } from '@portcullis/auth';
 *
 * const basic = createBasicBackend({
 *   realm: 'API',
 *   authenticate: async (_req, { username, password }) => {
 *     const user = await users.findByName(username);
 *     return user && (await users.checkPassword(user, password)) ? user : undefined;
 *   },
 * });
 * ```
 */
export function createBasicBackend(options: BasicBackendOptions): AuthBackend<BasicCredentials> {
    validateOptions("basic backend", BasicBackendOptionsSchema, options);
    const { realm = "Restricted", authenticate, onUnauthorized } = options;
    const challenge = `Basic realm=${quoteHeaderParameter(realm)}`;

    return Object.freeze({
        name: "basic",
        parse(req: HttpRequest): BasicCredentials | undefined {
            const encoded = readSchemeCredentials(req.header, "authorization", "Basic");
            return encoded === undefined ? undefined : decodeBasicCredentials(encoded);
        },
        authenticate(req: HttpRequest, credentials: BasicCredentials) {
            return authenticate(req, credentials);
        },
        onUnauthorized(req, metadata) {
            if (onUnauthorized) {
                return onUnauthorized(req, metadata);
            }
            return textResponse(401, metadata.message ?? "Unauthorized", { "www-authenticate": challenge });
        },
    } satisfies AuthBackend<BasicCredentials>);
}
