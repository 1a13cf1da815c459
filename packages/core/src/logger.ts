/**
 * Structured logging over the OpenTelemetry logs API.
 *
 * Records go to whatever LoggerProvider the host registered with
 * `logs.setGlobalLoggerProvider()`; without one they are dropped.
 *
 * @module logger
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";
import type { LogLevel } from "./config/index.ts";
import { resolveLogLevel } from "./config/index.ts";

export interface Logger {
    debug(message: string, attributes?: AnyValueMap): void;
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
}

export interface LoggerOptions {
    /** Minimum level emitted. Defaults to LOG_LEVEL from the environment. */
    level?: LogLevel | undefined;
    defaultAttributes?: AnyValueMap | undefined;
}

const SEVERITY: Record<LogLevel, { number: SeverityNumber; text: string }> = {
    debug: { number: SeverityNumber.DEBUG, text: "DEBUG" },
    info: { number: SeverityNumber.INFO, text: "INFO" },
    warn: { number: SeverityNumber.WARN, text: "WARN" },
    error: { number: SeverityNumber.ERROR, text: "ERROR" },
};

/**
 * Get a named logger.
 *
 * @example
 * ```typescript
 * const logger = getLogger("portcullis.auth");
 * logger.debug("request authenticated", { backend: "basic" });
 * ```
 */
export function getLogger(name: string, options: LoggerOptions = {}): Logger {
    const otelLogger = logs.getLogger(name);
    const minimum = SEVERITY[options.level ?? resolveLogLevel()].number;
    const base: AnyValueMap = { "logger.name": name, ...options.defaultAttributes };

    function emit(level: LogLevel, message: string, attributes?: AnyValueMap): void {
        const severity = SEVERITY[level];
        if (severity.number < minimum) return;
        otelLogger.emit({
            severityNumber: severity.number,
            severityText: severity.text,
            body: message,
            attributes: attributes ? { ...base, ...attributes } : base,
        });
    }

    return {
        debug(message, attributes?) {
            emit("debug", message, attributes);
        },
        info(message, attributes?) {
            emit("info", message, attributes);
        },
        warn(message, attributes?) {
            emit("warn", message, attributes);
        },
        error(message, attributes?) {
            emit("error", message, attributes);
        },
    };
}
