/**
 * Authorization header parsing
 *
 * Malformed headers are never errors: every function here returns
 * undefined for input it cannot read.
 *
 * @module headers
 */

import type { BasicCredentials } from "./types.ts";

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Read `<scheme> <credentials>` from a header.
 *
 * The scheme comparison is case-insensitive. Returns the credentials part,
 * or undefined if the header is missing, uses another scheme, or carries
 * no credentials.
 *
 * @example
 * ```typescript
 * readSchemeCredentials(new Headers({ authorization: "Token abc" }), "authorization", "token"); // "abc"
 * ```
 */
export function readSchemeCredentials(headers: Headers, headerName: string, scheme: string): string | undefined {
    const value = headers.get(headerName)?.trim();
    if (!value) {
        return undefined;
    }

    const separator = value.search(/\s/);
    if (separator <= 0) {
        return undefined;
    }
    if (value.slice(0, separator).toLowerCase() !== scheme.toLowerCase()) {
        return undefined;
    }

    const credentials = value.slice(separator).trim();
    return credentials.length > 0 ? credentials : undefined;
}

/**
 * Decode the credentials part of an HTTP Basic header.
 *
 * Splits on the first colon only, so passwords may contain colons.
 */
export function decodeBasicCredentials(encoded: string): BasicCredentials | undefined {
    if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
        return undefined;
    }

    const decoded = Buffer.from(encoded, "base64").toString("utf8");
    const colon = decoded.indexOf(":");
    if (colon < 0) {
        return undefined;
    }

    return {
        username: decoded.slice(0, colon),
        password: decoded.slice(colon + 1),
    };
}

/**
 * Encode an HTTP Basic `Authorization` header value.
 */
export function encodeBasicAuthorization(username: string, password: string): string {
    return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

/**
 * Quote a value for use in a `WWW-Authenticate` parameter.
 */
export function quoteHeaderParameter(value: string): string {
    return `"${value.replace(/["\\]/g, "\\$&")}"`;
}
