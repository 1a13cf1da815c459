/**
 * @portcullis/auth/testing
 *
 * Test utilities for authentication and authorization.
 *
 * @module @portcullis/auth/testing
 */

export { encodeBasicAuthorization as basicAuthorization } from "../headers.ts";
export { createTestJwe, createTestJwt, TEST_JWE_SECRET, TEST_JWT_SECRET } from "./test-jwt.ts";
