/**
 * Shared types for @portcullis/auth
 *
 * @module types
 */

import type { HttpRequest, Logger } from "@portcullis/core";
import type * as jose from "jose";

/**
 * Authenticated principal.
 *
 * Opaque to the engine; any truthy value. Falsy values mean "unauthenticated".
 */
export type Identity = NonNullable<unknown>;

/**
 * Value returned or resolved by user callbacks.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Well-known request context keys.
 */
export const AUTH_CONTEXT_KEYS = {
    /** Identity attached by the authentication middleware */
    IDENTITY: "identity",
    /** Backend that authenticated the request */
    BACKEND: "authBackend",
    /** Named captures of the access rule that matched the request */
    MATCH_PARAMS: "matchParams",
} as const;

/**
 * Metadata carried by the unauthorized signal.
 */
export interface UnauthorizedMetadata {
    /** Human-readable reason, used as response body by default handlers */
    readonly message?: string | undefined;
    /** Full response to return instead of asking a backend */
    readonly response?: Response | undefined;
    /** Server-side details (logged, never sent) */
    readonly details?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Builds the response for a request that is not allowed to proceed.
 */
export type UnauthorizedHandler = (req: HttpRequest, metadata: UnauthorizedMetadata) => MaybePromise<Response>;

/**
 * Authentication backend contract.
 *
 * `parse` extracts backend-specific data from the request (or `undefined`
 * when the request carries none for this backend); `authenticate` turns it
 * into an identity (or `undefined`). Neither throws for bad credentials.
 *
 * @template TData - Data produced by `parse`
 */
export interface AuthBackend<TData = unknown> {
    /** Backend name for logging (e.g., "basic", "jws") */
    readonly name: string;
    parse(req: HttpRequest): MaybePromise<TData | undefined>;
    authenticate(req: HttpRequest, data: TData): MaybePromise<Identity | null | undefined | false>;
    onUnauthorized(req: HttpRequest, metadata: UnauthorizedMetadata): MaybePromise<Response>;
}

/**
 * Username/password pair decoded from an HTTP Basic header.
 */
export interface BasicCredentials {
    readonly username: string;
    readonly password: string;
}

/**
 * Identity function: resolves backend data to an identity.
 *
 * Returns a falsy value for unknown credentials; throws only for
 * infrastructure failures.
 */
export type IdentityFunction<TData> = (req: HttpRequest, data: TData) => MaybePromise<Identity | null | undefined | false>;

/**
 * HTTP Basic backend options
 */
export interface BasicBackendOptions {
    /**
     * Realm announced in the WWW-Authenticate challenge.
     * @default "Restricted"
     */
    readonly realm?: string | undefined;
    /** Resolve a username/password pair to an identity. REQUIRED. */
    readonly authenticate: IdentityFunction<BasicCredentials>;
    /** Replace the default 401 challenge response */
    readonly onUnauthorized?: UnauthorizedHandler | undefined;
}

/**
 * Session backend options
 */
export interface SessionBackendOptions {
    /**
     * Read the session map of a request.
     * @default (req) => req.session
     */
    readonly getSession?: ((req: HttpRequest) => MaybePromise<Readonly<Record<string, unknown>> | undefined>) | undefined;
    /**
     * Session key holding the identity.
     * @default "identity"
     */
    readonly sessionKey?: string | undefined;
    /** Replace the default 401 response */
    readonly onUnauthorized?: UnauthorizedHandler | undefined;
}

/**
 * Where a token is read from: `<header>: <scheme> <token>`.
 */
export interface TokenLocation {
    /**
     * Header carrying the token.
     * @default "authorization"
     */
    readonly header?: string | undefined;
    /**
     * Scheme preceding the token (case-insensitive).
     * @default "Token"
     */
    readonly scheme?: string | undefined;
}

/**
 * Opaque token backend options
 */
export interface TokenBackendOptions extends TokenLocation {
    /** Resolve a token string to an identity. REQUIRED. */
    readonly authenticate: IdentityFunction<string>;
    /** Replace the default 401 response */
    readonly onUnauthorized?: UnauthorizedHandler | undefined;
}

/**
 * Supported JWS algorithms
 */
export const JWS_ALGORITHMS = ["HS256", "HS384", "HS512", "RS256", "RS384", "RS512", "PS256", "PS384", "PS512", "ES256", "ES384", "ES512", "EdDSA"] as const;

export type JwsAlgorithm = (typeof JWS_ALGORITHMS)[number];

/**
 * Supported JWE key management algorithms
 */
export const JWE_KEY_ALGORITHMS = ["dir", "A128KW", "A192KW", "A256KW", "A128GCMKW", "A192GCMKW", "A256GCMKW", "RSA-OAEP", "RSA-OAEP-256", "ECDH-ES", "ECDH-ES+A128KW", "ECDH-ES+A256KW"] as const;

export type JweKeyAlgorithm = (typeof JWE_KEY_ALGORITHMS)[number];

/**
 * Supported JWE content encryption algorithms
 */
export const JWE_ENCRYPTION_ALGORITHMS = ["A128GCM", "A192GCM", "A256GCM", "A128CBC-HS256", "A192CBC-HS384", "A256CBC-HS512"] as const;

export type JweEncryptionAlgorithm = (typeof JWE_ENCRYPTION_ALGORITHMS)[number];

/**
 * Verified or decrypted token claims
 */
export type TokenClaims = jose.JWTPayload;

/**
 * Options shared by the self-contained token backends
 */
export interface SelfContainedTokenOptions extends TokenLocation {
    /** Expected issuer(s) */
    readonly issuer?: string | string[] | undefined;
    /** Expected audience(s) */
    readonly audience?: string | string[] | undefined;
    /**
     * Maximum token age.
     * Number (seconds) or string (e.g., "2h", "7d").
     */
    readonly maxTokenAge?: number | string | undefined;
    /**
     * Map verified claims to an identity.
     * @default the claims object itself
     */
    readonly authenticate?: IdentityFunction<TokenClaims> | undefined;
    /**
     * Called when verification or decryption fails, before the request
     * continues unauthenticated. May raise the unauthorized signal to
     * surface the failure instead.
     */
    readonly onError?: ((req: HttpRequest, error: jose.errors.JOSEError) => void) | undefined;
    /** Replace the default 401 response */
    readonly onUnauthorized?: UnauthorizedHandler | undefined;
}

/**
 * Signed token (JWS) backend options.
 *
 * Exactly one of `secret` (HMAC) or `publicKey` is required.
 */
export interface JwsBackendOptions extends SelfContainedTokenOptions {
    /** HMAC symmetric secret (for HS256/HS384/HS512) */
    readonly secret?: string | Uint8Array | undefined;
    /** Asymmetric public key (RS*, PS*, ES*, EdDSA) */
    readonly publicKey?: jose.KeyLike | undefined;
    /**
     * Accepted algorithms.
     * @default ["HS256"] with a secret, required with a public key
     */
    readonly algorithms?: readonly JwsAlgorithm[] | undefined;
}

/**
 * Encrypted token (JWE) backend options.
 *
 * Exactly one of `secret` (symmetric) or `privateKey` is required.
 */
export interface JweBackendOptions extends SelfContainedTokenOptions {
    /** Symmetric key ("dir", AES key wrap) */
    readonly secret?: string | Uint8Array | undefined;
    /** Private key (RSA-OAEP, ECDH-ES) */
    readonly privateKey?: jose.KeyLike | undefined;
    /**
     * Accepted key management algorithms.
     * @default ["dir"] with a secret, required with a private key
     */
    readonly keyManagementAlgorithms?: readonly JweKeyAlgorithm[] | undefined;
    /**
     * Accepted content encryption algorithms.
     * @default ["A256GCM"]
     */
    readonly contentEncryptionAlgorithms?: readonly JweEncryptionAlgorithm[] | undefined;
}

/**
 * Authentication middleware options
 */
export interface AuthMiddlewareOptions {
    /** Backends tried in order; the first to authenticate wins. REQUIRED, non-empty. */
    readonly backends: ReadonlyArray<AuthBackend>;
    /** @default getLogger("portcullis.auth") */
    readonly logger?: Logger | undefined;
}

/**
 * Authorization (unauthorized signal) middleware options
 */
export interface AuthorizationMiddlewareOptions {
    /**
     * Backend answering signals for requests no backend authenticated.
     * Without it such requests get a generic 403.
     */
    readonly backend?: AuthBackend | undefined;
    /** @default getLogger("portcullis.authz") */
    readonly logger?: Logger | undefined;
}

/**
 * Payload of an error decision: a message or a replacement response.
 */
export type ErrorPayload = string | Response;

/**
 * Successful decision
 */
export interface SuccessDecision {
    readonly kind: "success";
}

/**
 * Failed decision
 */
export interface ErrorDecision {
    readonly kind: "error";
    readonly payload?: ErrorPayload | undefined;
}

/**
 * Outcome of evaluating a rule handler.
 */
export type Decision = SuccessDecision | ErrorDecision;

/**
 * Leaf rule handler.
 *
 * May return a {@link Decision}, a boolean, or any value: truthy values
 * are success, falsy values are an error without payload.
 */
export type RulePredicate = (req: HttpRequest) => unknown;

/**
 * Rule handler: a predicate or a logical composition of rule handlers.
 */
export type RuleHandler = RulePredicate | { readonly and: readonly RuleHandler[] } | { readonly or: readonly RuleHandler[] } | { readonly not: RuleHandler };

/**
 * Handles an error decision.
 *
 * @param payload - Message or response carried by the decision, if any
 */
export type AccessErrorHandler = (req: HttpRequest, payload: ErrorPayload | undefined) => MaybePromise<Response>;

/**
 * URL pattern: a RegExp or regular expression source.
 *
 * Named capture groups become match parameters.
 */
export type UrlPattern = RegExp | string;

/**
 * Predicate matcher: `true` or a captures record to match, anything else to skip.
 */
export type RequestMatcher = (req: HttpRequest) => boolean | Readonly<Record<string, string>> | null | undefined;

/**
 * Default decision when no access rule matches.
 */
export const AccessPolicy = {
    ALLOW: "allow",
    REJECT: "reject",
} as const;

export type AccessPolicy = (typeof AccessPolicy)[keyof typeof AccessPolicy];

/**
 * Access rule definition.
 *
 * Exactly one of `pattern` or `match` is required.
 */
export interface AccessRule {
    /** Rule name for logging/debugging */
    readonly name?: string | undefined;
    /** One URL pattern or a list of them, tested against the request path */
    readonly pattern?: UrlPattern | readonly UrlPattern[] | undefined;
    /** Predicate matcher, used instead of `pattern` */
    readonly match?: RequestMatcher | undefined;
    /** HTTP method(s) the rule applies to (case-insensitive); all when omitted */
    readonly method?: string | readonly string[] | undefined;
    /** Decision procedure for matching requests */
    readonly handler: RuleHandler;
    /** Handles error decisions of this rule */
    readonly onError?: AccessErrorHandler | undefined;
    /** Redirect target for error decisions of this rule; wins over `onError` */
    readonly redirect?: string | undefined;
}

/**
 * Access rule after validation.
 */
export interface CompiledAccessRule {
    readonly name: string;
    readonly patterns: readonly RegExp[];
    readonly match?: RequestMatcher | undefined;
    readonly methods?: ReadonlySet<string> | undefined;
    readonly handler: RuleHandler;
    readonly onError?: AccessErrorHandler | undefined;
    readonly redirect?: string | undefined;
}

/**
 * Access rules middleware options
 */
export interface AccessRulesOptions {
    /** Rules evaluated in order; the first matching rule decides. */
    readonly rules: readonly AccessRule[];
    /** Decision when no rule matches. REQUIRED. */
    readonly policy: AccessPolicy;
    /** Global handler for error decisions and policy rejections */
    readonly onError?: AccessErrorHandler | undefined;
    /** @default getLogger("portcullis.access-rules") */
    readonly logger?: Logger | undefined;
}

/**
 * Restrict wrapper options
 */
export interface RestrictOptions {
    /** Decision procedure */
    readonly handler: RuleHandler;
    /** Handles error decisions */
    readonly onError?: AccessErrorHandler | undefined;
    /** Redirect target for error decisions; wins over `onError` */
    readonly redirect?: string | undefined;
}
