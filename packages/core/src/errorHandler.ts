/**
 * Error handler middleware
 *
 * Turns errors escaping the pipeline into HTTP responses.
 * Recognizes SanitizableError protocol for safe client-facing messages.
 *
 * @module errorHandler
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { resolveStackTraces } from "./config/index.ts";
import { httpStatusFromCode, isSanitizableError } from "./errors.ts";
import type { Middleware } from "./http.ts";
import { textResponse } from "./http.ts";
import type { Logger } from "./logger.ts";
import { getLogger } from "./logger.ts";

/**
 * Error handler middleware options
 */
export interface ErrorHandlerOptions {
    /** @default getLogger("portcullis.error-handler") */
    logger?: Logger | undefined;

    /**
     * Include stack trace in logs
     * @default LOG_STACK_TRACES from the environment
     */
    includeStackTrace?: boolean | undefined;
}

/**
 * Create error handler middleware
 *
 * Catches every error thrown downstream and answers with a response:
 * sanitizable errors get the status of their code and their client message,
 * everything else gets 500. The original error is logged, never sent.
 *
 * IMPORTANT: This middleware should be FIRST in the chain to catch all errors.
 *
 * @example
 * ```typescript
 * const app = composeMiddleware(
 *   createErrorHandlerMiddleware(),
 *   createAuthMiddleware({ backends }),
 * )(handler);
 * ```
 */
export function createErrorHandlerMiddleware(options: ErrorHandlerOptions = {}): Middleware {
    const { logger = getLogger("portcullis.error-handler"), includeStackTrace = resolveStackTraces() } = options;

    return (next) => async (req) => {
        try {
            return await next(req);
        } catch (err) {
            const attributes: AnyValueMap = {
                "http.request.method": req.method,
                "url.path": req.url.pathname,
            };
            if (err instanceof Error) {
                attributes["error.type"] = err.name;
                attributes["error.message"] = err.message;
                if (includeStackTrace && err.stack) attributes["error.stack"] = err.stack;
            }

            if (isSanitizableError(err)) {
                const status = httpStatusFromCode(err.code);
                logger.warn("request failed", { ...attributes, "http.response.status_code": status, ...flattenDetails(err.serverDetails) });
                return textResponse(status, err.clientMessage);
            }

            logger.error("unhandled error", { ...attributes, "http.response.status_code": 500 });
            return textResponse(500, "Internal Server Error");
        }
    };
}

function flattenDetails(details: Readonly<Record<string, unknown>>): AnyValueMap {
    const out: AnyValueMap = {};
    for (const [key, value] of Object.entries(details)) {
        if (value === undefined) continue;
        out[`error.details.${key}`] = typeof value === "string" || typeof value === "number" || typeof value === "boolean" ? value : JSON.stringify(value);
    }
    return out;
}
