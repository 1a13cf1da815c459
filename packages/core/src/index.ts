/**
 * @portcullis/core
 *
 * Request/response model and ambient infrastructure shared by
 * Portcullis packages.
 *
 * @module @portcullis/core
 */

// Request/response model
export type { FetchAdapterOptions, Handler, HeaderInit, HttpRequest, HttpRequestInit, Middleware } from "./http.ts";
export { composeMiddleware, createRequest, fromFetchRequest, redirectResponse, textResponse, toFetchHandler, withContext } from "./http.ts";

// Errors
export type { SanitizableError } from "./errors.ts";
export { ConfigurationError, httpStatusFromCode, isSanitizableError } from "./errors.ts";
export type { ErrorHandlerOptions } from "./errorHandler.ts";
export { createErrorHandlerMiddleware } from "./errorHandler.ts";

// Configuration
export {
    BooleanFromStringSchema,
    LogLevelSchema,
    NodeEnvSchema,
    PortcullisEnvSchema,
    parseEnvConfig,
    resolveLogLevel,
    resolveStackTraces,
    safeParseEnvConfig,
    type LogLevel,
    type PortcullisEnv,
} from "./config/index.ts";

// Logging
export type { Logger, LoggerOptions } from "./logger.ts";
export { getLogger } from "./logger.ts";
