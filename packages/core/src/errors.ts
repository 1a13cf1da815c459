/**
 * Error protocols shared by Portcullis packages
 *
 * @module errors
 */

import { Code } from "@connectrpc/connect";
import type { ZodError } from "zod";

/**
 * Sanitizable error interface.
 *
 * Errors implementing this protocol carry rich server-side details
 * but expose only a safe message to clients.
 */
export interface SanitizableError {
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;
}

/**
 * Type guard for SanitizableError.
 *
 * Checks if the value is an object with clientMessage (string) and
 * serverDetails (non-null object) properties, plus a numeric code.
 */
export function isSanitizableError(err: unknown): err is Error & SanitizableError & { code: Code } {
    if (!(err instanceof Error)) return false;
    return (
        "clientMessage" in err &&
        typeof err.clientMessage === "string" &&
        "serverDetails" in err &&
        typeof err.serverDetails === "object" &&
        err.serverDetails !== null &&
        "code" in err &&
        typeof err.code === "number"
    );
}

/**
 * Invalid wiring detected while building a component.
 *
 * Always thrown at construction time, never while serving a request.
 */
export class ConfigurationError extends Error {
    /** Dotted option paths that failed validation */
    readonly paths: readonly string[];

    constructor(message: string, paths: readonly string[] = []) {
        super(message);
        this.name = "ConfigurationError";
        this.paths = paths;
    }

    /**
     * Build from a failed zod validation.
     *
     * @param component - Component name used as message prefix (e.g., "@portcullis/auth basic backend")
     */
    static fromZodError(component: string, error: ZodError): ConfigurationError {
        const paths = error.issues.map((issue) => issue.path.join("."));
        const details = error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
        return new ConfigurationError(`${component}: invalid options (${details})`, paths);
    }
}

/**
 * HTTP status for each Connect error code, per the Connect protocol mapping.
 */
const HTTP_STATUS_BY_CODE: Readonly<Record<Code, number>> = {
    [Code.Canceled]: 499,
    [Code.Unknown]: 500,
    [Code.InvalidArgument]: 400,
    [Code.DeadlineExceeded]: 504,
    [Code.NotFound]: 404,
    [Code.AlreadyExists]: 409,
    [Code.PermissionDenied]: 403,
    [Code.ResourceExhausted]: 429,
    [Code.FailedPrecondition]: 400,
    [Code.Aborted]: 409,
    [Code.OutOfRange]: 400,
    [Code.Unimplemented]: 501,
    [Code.Internal]: 500,
    [Code.Unavailable]: 503,
    [Code.DataLoss]: 500,
    [Code.Unauthenticated]: 401,
};

/**
 * Map a Connect error code to an HTTP status.
 */
export function httpStatusFromCode(code: Code): number {
    return HTTP_STATUS_BY_CODE[code];
}
