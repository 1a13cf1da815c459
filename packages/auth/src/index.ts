/**
 * @portcullis/auth
 *
 * Authentication and authorization middleware for Portcullis.
 *
 * Authentication:
 * - createBasicBackend(), createSessionBackend(), createTokenBackend(),
 *   createJwsBackend(), createJweBackend(): pluggable backends
 * - createAuthMiddleware(): runs backends in order, attaches the identity
 *
 * Authorization:
 * - raiseUnauthorized() + createAuthorizationMiddleware(): signal raised
 *   by handlers, answered by the authenticating backend
 * - createAccessRulesMiddleware(): ordered, declarative URL rules
 * - restrict(): guard a single handler
 *
 * @module @portcullis/auth
 */

// Access rules
export type { DenialHandlers } from "./access-rules.ts";
export { compileAccessRules, createAccessRulesMiddleware, defaultDenyResponse, matchAccessRule, resolveDecision } from "./access-rules.ts";
// Middleware
export { authenticateRequest, createAuthMiddleware } from "./auth-middleware.ts";
export { createAuthorizationMiddleware, resolveUnauthorized } from "./authz-middleware.ts";
// Backends
export { createBasicBackend } from "./basic-backend.ts";
// Configuration
export type { AuthEnv } from "./config.ts";
export { AuthEnvSchema, parseAuthEnvConfig } from "./config.ts";
// Context management
export type { AuthContext } from "./context.ts";
export { authContextStorage, getAuthBackend, getAuthContext, getIdentity, getMatchParams, isAuthenticated, requireIdentity, withIdentity } from "./context.ts";
// Decisions
export { error, isDecision, isSuccess, success, toDecision } from "./decision.ts";
export { isUnauthorizedError, raiseUnauthorized, UnauthorizedError } from "./errors.ts";
// Header utilities
export { decodeBasicCredentials, encodeBasicAuthorization, readSchemeCredentials } from "./headers.ts";
export { createJweBackend, createJwsBackend } from "./jwt-backend.ts";
// Matching
export type { MatchParams } from "./path-match.ts";
export { compileUrlPattern, matchPath } from "./path-match.ts";
export { restrict } from "./restrict.ts";
export { evaluateRuleHandler } from "./rule-handler.ts";
export { createSessionBackend } from "./session-backend.ts";
export { createTokenBackend } from "./token-backend.ts";

// Types and constants
export type {
    AccessErrorHandler,
    AccessRule,
    AccessRulesOptions,
    AuthBackend,
    AuthMiddlewareOptions,
    AuthorizationMiddlewareOptions,
    BasicBackendOptions,
    BasicCredentials,
    CompiledAccessRule,
    Decision,
    ErrorDecision,
    ErrorPayload,
    Identity,
    IdentityFunction,
    JweBackendOptions,
    JweEncryptionAlgorithm,
    JweKeyAlgorithm,
    JwsAlgorithm,
    JwsBackendOptions,
    MaybePromise,
    RequestMatcher,
    RestrictOptions,
    RuleHandler,
    RulePredicate,
    SelfContainedTokenOptions,
    SessionBackendOptions,
    SuccessDecision,
    TokenBackendOptions,
    TokenClaims,
    TokenLocation,
    UnauthorizedHandler,
    UnauthorizedMetadata,
    UrlPattern,
} from "./types.ts";

export { AccessPolicy, AUTH_CONTEXT_KEYS, JWE_ENCRYPTION_ALGORITHMS, JWE_KEY_ALGORITHMS, JWS_ALGORITHMS } from "./types.ts";
