/**
 * Environment configuration validation with Zod
 *
 * Provides type-safe configuration from environment variables
 * following 12-Factor App principles.
 *
 * @module @portcullis/core/config
 */

import { z } from "zod";

/**
 * Log level schema with validation
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Node environment schema
 */
export const NodeEnvSchema = z.enum(["development", "production", "test"]).default("development");

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default("false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Portcullis environment configuration schema
 *
 * @example
 * ```typescript
 * const config = PortcullisEnvSchema.parse(process.env);
 * console.log(config.LOG_LEVEL); // 'info' (default)
 * ```
 */
export const PortcullisEnvSchema = z.object({
    /**
     * Minimum log level emitted by getLogger()
     * @default 'info'
     */
    LOG_LEVEL: LogLevelSchema,

    /**
     * Node environment
     * @default 'development'
     */
    NODE_ENV: NodeEnvSchema,

    /**
     * Include stack traces in error logs
     * @default false
     */
    LOG_STACK_TRACES: BooleanFromStringSchema,
});

/**
 * Portcullis environment configuration type
 */
export type PortcullisEnv = z.infer<typeof PortcullisEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ LOG_LEVEL: 'debug' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): PortcullisEnv {
    return PortcullisEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return PortcullisEnvSchema.safeParse(env);
}

/**
 * Read LOG_LEVEL alone, falling back to "info" when it is unset or unknown.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
    return LogLevelSchema.catch("info").parse(env.LOG_LEVEL);
}

/**
 * Read LOG_STACK_TRACES alone, falling back to false when it is unset or unknown.
 */
export function resolveStackTraces(env: Record<string, string | undefined> = process.env): boolean {
    return BooleanFromStringSchema.catch(false).parse(env.LOG_STACK_TRACES);
}
