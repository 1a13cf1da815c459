/**
 * Self-contained token backends
 *
 * Signed (JWS) and encrypted (JWE) JSON Web Tokens, verified with the
 * jose library. A token that fails verification leaves the request
 * unauthenticated; it is never an error.
 *
 * @module jwt-backend
 */

import type { HttpRequest } from "@portcullis/core";
import { ConfigurationError } from "@portcullis/core";
import * as jose from "jose";
import { JweBackendOptionsSchema, JwsBackendOptionsSchema, validateOptions } from "./config.ts";
import { createTokenReader, tokenUnauthorizedHandler } from "./token-backend.ts";
import type { AuthBackend, Identity, JweBackendOptions, JweKeyAlgorithm, JwsAlgorithm, JwsBackendOptions, MaybePromise, SelfContainedTokenOptions, TokenClaims } from "./types.ts";

/**
 * Get minimum HMAC key size in bytes per RFC 7518.
 * HS256 requires 32 bytes, HS384 requires 48, HS512 requires 64.
 */
function getMinHmacKeyBytes(algorithms: readonly JwsAlgorithm[]): number {
    if (algorithms.includes("HS512")) return 64;
    if (algorithms.includes("HS384")) return 48;
    return 32;
}

function isAsymmetricKeyAlgorithm(algorithm: JweKeyAlgorithm): boolean {
    return algorithm.startsWith("RSA-OAEP") || algorithm.startsWith("ECDH-ES");
}

function encodeSecret(secret: string | Uint8Array): Uint8Array {
    return typeof secret === "string" ? new TextEncoder().encode(secret) : secret;
}

/**
 * Shared parse/authenticate plumbing of the JWS and JWE backends.
 *
 * `decode` performs the cryptographic step; jose errors it raises are
 * reported to `onError` and turn into an absent identity.
 */
function createSelfContainedBackend(name: string, options: SelfContainedTokenOptions, decode: (token: string) => Promise<TokenClaims>): AuthBackend<string> {
    const { authenticate, onError } = options;
    const readToken = createTokenReader(options);
    const onUnauthorized = tokenUnauthorizedHandler(options.onUnauthorized);

    return Object.freeze({
        name,
        parse: readToken,
        async authenticate(req: HttpRequest, token: string): Promise<Identity | null | undefined | false> {
            let claims: TokenClaims;
            try {
                claims = await decode(token);
            } catch (err) {
                if (!(err instanceof jose.errors.JOSEError)) {
                    throw err;
                }
                onError?.(req, err);
                return undefined;
            }
            const identity: MaybePromise<Identity | null | undefined | false> = authenticate ? authenticate(req, claims) : claims;
            return await identity;
        },
        onUnauthorized,
    } satisfies AuthBackend<string>);
}

function buildVerifyOptions(options: SelfContainedTokenOptions): { issuer?: string | string[]; audience?: string | string[]; maxTokenAge?: number | string } {
    const verifyOptions: { issuer?: string | string[]; audience?: string | string[]; maxTokenAge?: number | string } = {};
    if (options.issuer !== undefined) {
        verifyOptions.issuer = options.issuer;
    }
    if (options.audience !== undefined) {
        verifyOptions.audience = options.audience;
    }
    if (options.maxTokenAge !== undefined) {
        verifyOptions.maxTokenAge = options.maxTokenAge;
    }
    return verifyOptions;
}

/**
 * Create a signed token (JWS) authentication backend.
 *
 * Reads the token like the opaque token backend, then verifies signature,
 * expiry and the configured issuer/audience/age with jose. Expired, forged
 * or malformed tokens leave the request unauthenticated.
 *
 * @throws ConfigurationError when no key (or both keys) are given, an
 *   algorithm is unknown or does not fit the key kind, or an HMAC secret
 *   is shorter than RFC 7518 allows
 *
 * @example HMAC secret
 * ```typescript
 * import { createJwsBackend } from '@portcullis/auth';
 *
 * const jws = createJwsBackend({
 *   secret: process.env.AUTH_JWT_SECRET,
 *   scheme: 'Bearer',
 *   issuer: 'accounts.internal',
 *   authenticate: (_req, claims) => (typeof claims.sub === 'string' ? { userId: claims.sub } : undefined),
 * });
 * ```
 *
 * @example Asymmetric key
 * ```typescript
 * const publicKey = await jose.importSPKI(pem, 'ES256');
 * const jws = createJwsBackend({ publicKey, algorithms: ['ES256'] });
 * ```
 */
export function createJwsBackend(options: JwsBackendOptions): AuthBackend<string> {
    validateOptions("jws backend", JwsBackendOptionsSchema, options);
    const algorithms = options.algorithms ?? ["HS256"];
    const verifyOptions: jose.JWTVerifyOptions = { ...buildVerifyOptions(options), algorithms: [...algorithms] };

    let key: jose.KeyLike | Uint8Array;
    if (options.secret !== undefined) {
        if (algorithms.some((algorithm) => !algorithm.startsWith("HS"))) {
            throw new ConfigurationError("@portcullis/auth jws backend: a secret can only verify HS256, HS384 or HS512 tokens", ["algorithms"]);
        }
        key = encodeSecret(options.secret);
        const minBytes = getMinHmacKeyBytes(algorithms);
        if (key.byteLength < minBytes) {
            throw new ConfigurationError(`@portcullis/auth jws backend: HMAC secret must be at least ${minBytes} bytes (${minBytes * 8} bits) per RFC 7518, got ${key.byteLength} bytes`, [
                "secret",
            ]);
        }
    } else if (options.publicKey !== undefined) {
        if (algorithms.some((algorithm) => algorithm.startsWith("HS"))) {
            throw new ConfigurationError("@portcullis/auth jws backend: a public key cannot verify HS256, HS384 or HS512 tokens", ["algorithms"]);
        }
        key = options.publicKey;
    } else {
        throw new ConfigurationError("@portcullis/auth jws backend: one of secret or publicKey is required", ["secret", "publicKey"]);
    }

    return createSelfContainedBackend("jws", options, async (token) => {
        const { payload } = await jose.jwtVerify(token, key, verifyOptions);
        return payload;
    });
}

/**
 * Create an encrypted token (JWE) authentication backend.
 *
 * Decrypts the token with jose and validates its claims the same way the
 * JWS backend does. Tokens that fail to decrypt leave the request
 * unauthenticated.
 *
 * @throws ConfigurationError when no key (or both keys) are given, an
 *   algorithm is unknown, or the key kind does not fit the key management
 *   algorithms
 *
 * @example Direct encryption with a 256-bit key
 * ```typescript
 * const jwe = createJweBackend({
 *   secret: base64url.decode(process.env.AUTH_JWE_KEY),
 *   keyManagementAlgorithms: ['dir'],
 *   contentEncryptionAlgorithms: ['A256GCM'],
 * });
 * ```
 */
export function createJweBackend(options: JweBackendOptions): AuthBackend<string> {
    validateOptions("jwe backend", JweBackendOptionsSchema, options);
    const keyManagementAlgorithms = options.keyManagementAlgorithms ?? ["dir"];
    const decryptOptions: jose.JWTDecryptOptions = {
        ...buildVerifyOptions(options),
        keyManagementAlgorithms: [...keyManagementAlgorithms],
        contentEncryptionAlgorithms: [...(options.contentEncryptionAlgorithms ?? ["A256GCM"])],
    };

    let key: jose.KeyLike | Uint8Array;
    if (options.secret !== undefined) {
        if (keyManagementAlgorithms.some(isAsymmetricKeyAlgorithm)) {
            throw new ConfigurationError("@portcullis/auth jwe backend: a secret can only decrypt dir, A*KW or A*GCMKW tokens", ["keyManagementAlgorithms"]);
        }
        key = encodeSecret(options.secret);
    } else if (options.privateKey !== undefined) {
        if (!keyManagementAlgorithms.every(isAsymmetricKeyAlgorithm)) {
            throw new ConfigurationError("@portcullis/auth jwe backend: a private key can only decrypt RSA-OAEP or ECDH-ES tokens", ["keyManagementAlgorithms"]);
        }
        key = options.privateKey;
    } else {
        throw new ConfigurationError("@portcullis/auth jwe backend: one of secret or privateKey is required", ["secret", "privateKey"]);
    }

    return createSelfContainedBackend("jwe", options, async (token) => {
        const { payload } = await jose.jwtDecrypt(token, key, decryptOptions);
        return payload;
    });
}
