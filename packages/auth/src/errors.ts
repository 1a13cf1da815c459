/**
 * Auth-specific error types
 *
 * @module errors
 */

import { Code, ConnectError } from "@connectrpc/connect";
import type { SanitizableError } from "@portcullis/core";
import type { UnauthorizedMetadata } from "./types.ts";

/**
 * Unauthorized signal.
 *
 * Thrown from anywhere downstream of the authorization middleware to stop
 * the request; the middleware turns it into a response. Outside that
 * middleware it behaves as a SanitizableError with PermissionDenied code.
 */
export class UnauthorizedError extends ConnectError implements SanitizableError {
    /**
     * `ConnectError` answers `instanceof` for every class in its hierarchy
     * by prototype identity or name; this class checks its own prototype chain.
     */
    static override [Symbol.hasInstance](value: unknown): boolean {
        return value instanceof Error && this.prototype.isPrototypeOf(value);
    }

    readonly unauthorized: UnauthorizedMetadata;

    get clientMessage(): string {
        return this.unauthorized.message ?? "Forbidden";
    }

    get serverDetails(): Readonly<Record<string, unknown>> {
        return this.unauthorized.details ?? {};
    }

    constructor(metadata: UnauthorizedMetadata = {}) {
        super(metadata.message ?? "Unauthorized", Code.PermissionDenied);
        this.name = "UnauthorizedError";
        this.unauthorized = metadata;
    }
}

/**
 * Raise the unauthorized signal.
 *
 * @example
 * ```typescript
 * if (project.ownerId !== user.id) {
 *   raiseUnauthorized({ message: "Only the owner may archive a project" });
 * }
 * ```
 */
export function raiseUnauthorized(metadata: UnauthorizedMetadata = {}): never {
    throw new UnauthorizedError(metadata);
}

/**
 * Type guard for the unauthorized signal.
 */
export function isUnauthorizedError(err: unknown): err is UnauthorizedError {
    return err instanceof UnauthorizedError;
}
