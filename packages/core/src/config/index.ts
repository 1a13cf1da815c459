/**
 * Configuration module
 *
 * Provides type-safe environment configuration validation
 * using Zod schemas. Follows 12-Factor App principles.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type PortcullisEnv } from '@portcullis/core';
 *
 * const config = parseEnvConfig();
 * console.log(`Log level: ${config.LOG_LEVEL}`);
 * ```
 *
 * @module @portcullis/core/config
 */

export {
    PortcullisEnvSchema,
    LogLevelSchema,
    NodeEnvSchema,
    BooleanFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    resolveLogLevel,
    resolveStackTraces,
    type LogLevel,
    type PortcullisEnv,
} from "./envSchema.ts";
