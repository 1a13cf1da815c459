/**
 * Configuration schemas
 *
 * Environment configuration for auth wiring, plus the zod schemas every
 * backend factory validates its options against.
 *
 * @module config
 */

import { ConfigurationError } from "@portcullis/core";
import { z } from "zod";
import { AccessPolicy, JWE_ENCRYPTION_ALGORITHMS, JWE_KEY_ALGORITHMS, JWS_ALGORITHMS } from "./types.ts";

/**
 * Auth environment configuration schema
 *
 * @example
 * ```typescript
 * const env = parseAuthEnvConfig();
 * const backend = createJwsBackend({ secret: env.AUTH_JWT_SECRET, algorithms: [env.AUTH_JWT_ALGORITHM] });
 * ```
 */
export const AuthEnvSchema = z.object({
    /**
     * Realm for HTTP Basic challenges
     * @default 'Restricted'
     */
    AUTH_REALM: z.string().min(1).default("Restricted"),

    /**
     * Header carrying tokens
     * @default 'authorization'
     */
    AUTH_TOKEN_HEADER: z.string().min(1).default("authorization"),

    /**
     * Scheme preceding tokens
     * @default 'Token'
     */
    AUTH_TOKEN_SCHEME: z.string().min(1).default("Token"),

    /**
     * Signing secret for self-contained tokens
     */
    AUTH_JWT_SECRET: z.string().min(1).optional(),

    /**
     * Signing algorithm for self-contained tokens
     * @default 'HS256'
     */
    AUTH_JWT_ALGORITHM: z.enum(JWS_ALGORITHMS).default("HS256"),

    /**
     * Decision when no access rule matches
     * @default 'reject'
     */
    AUTH_DEFAULT_POLICY: z.enum([AccessPolicy.ALLOW, AccessPolicy.REJECT]).default(AccessPolicy.REJECT),
});

/**
 * Auth environment configuration type
 */
export type AuthEnv = z.infer<typeof AuthEnvSchema>;

/**
 * Parse and validate auth environment configuration.
 *
 * @throws ConfigurationError on invalid values
 */
export function parseAuthEnvConfig(env: Record<string, string | undefined> = process.env): AuthEnv {
    const result = AuthEnvSchema.safeParse(env);
    if (!result.success) {
        throw ConfigurationError.fromZodError("@portcullis/auth environment", result.error);
    }
    return result.data;
}

const functionSchema = z.custom<(...args: never[]) => unknown>((value) => typeof value === "function", { message: "Expected a function" });

const optionalFunction = functionSchema.optional();

const headerNameSchema = z
    .string()
    .regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, { message: "Invalid header name" })
    .optional();

const tokenLocationShape = {
    header: headerNameSchema,
    scheme: z
        .string()
        .regex(/^\S+$/, { message: "Scheme must be a single word" })
        .optional(),
};

export const BasicBackendOptionsSchema = z.object({
    realm: z
        .string()
        .min(1)
        .regex(/^[^\r\n]*$/, { message: "Realm must be a single line" })
        .optional(),
    authenticate: functionSchema,
    onUnauthorized: optionalFunction,
});

export const SessionBackendOptionsSchema = z.object({
    getSession: optionalFunction,
    sessionKey: z.string().min(1).optional(),
    onUnauthorized: optionalFunction,
});

export const TokenBackendOptionsSchema = z.object({
    ...tokenLocationShape,
    authenticate: functionSchema,
    onUnauthorized: optionalFunction,
});

const keySchema = z.custom<object>((value) => typeof value === "object" && value !== null && !(value instanceof Uint8Array), { message: "Expected a key object" });

const secretSchema = z.union([z.string().min(1), z.instanceof(Uint8Array)]);

const selfContainedShape = {
    ...tokenLocationShape,
    issuer: z.union([z.string(), z.array(z.string())]).optional(),
    audience: z.union([z.string(), z.array(z.string())]).optional(),
    maxTokenAge: z.union([z.number().positive(), z.string().min(1)]).optional(),
    authenticate: optionalFunction,
    onError: optionalFunction,
    onUnauthorized: optionalFunction,
};

export const JwsBackendOptionsSchema = z
    .object({
        ...selfContainedShape,
        secret: secretSchema.optional(),
        publicKey: keySchema.optional(),
        algorithms: z.array(z.enum(JWS_ALGORITHMS)).min(1).optional(),
    })
    .refine((options) => (options.secret === undefined) !== (options.publicKey === undefined), {
        message: "Exactly one of secret or publicKey is required",
    })
    .refine((options) => options.publicKey === undefined || options.algorithms !== undefined, {
        message: "algorithms is required with publicKey",
        path: ["algorithms"],
    });

export const JweBackendOptionsSchema = z
    .object({
        ...selfContainedShape,
        secret: secretSchema.optional(),
        privateKey: keySchema.optional(),
        keyManagementAlgorithms: z.array(z.enum(JWE_KEY_ALGORITHMS)).min(1).optional(),
        contentEncryptionAlgorithms: z.array(z.enum(JWE_ENCRYPTION_ALGORITHMS)).min(1).optional(),
    })
    .refine((options) => (options.secret === undefined) !== (options.privateKey === undefined), {
        message: "Exactly one of secret or privateKey is required",
    })
    .refine((options) => options.privateKey === undefined || options.keyManagementAlgorithms !== undefined, {
        message: "keyManagementAlgorithms is required with privateKey",
        path: ["keyManagementAlgorithms"],
    });

/**
 * Validate options against a schema or throw ConfigurationError.
 */
export function validateOptions(component: string, schema: z.ZodTypeAny, options: unknown): void {
    const result = schema.safeParse(options);
    if (!result.success) {
        throw ConfigurationError.fromZodError(`@portcullis/auth ${component}`, result.error);
    }
}
