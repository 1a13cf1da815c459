/**
 * Unit tests for the signed (JWS) and encrypted (JWE) token backends
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { ConfigurationError, createRequest } from "@portcullis/core";
import * as jose from "jose";
import { UnauthorizedError } from "../../src/errors.ts";
import { createJweBackend, createJwsBackend } from "../../src/jwt-backend.ts";
import { createTestJwe, createTestJwt, TEST_JWE_SECRET, TEST_JWT_SECRET } from "../../src/testing/test-jwt.ts";

const req = createRequest("http://localhost/");

function secondsFromNow(seconds: number): number {
    return Math.floor(Date.now() / 1000) + seconds;
}

describe("createJwsBackend()", () => {
    it("should read the token after the Token scheme", async () => {
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET });
        const token = await createTestJwt({ sub: "u-1" });

        assert.strictEqual(await backend.parse(createRequest("http://localhost/", { headers: { authorization: `Token ${token}` } })), token);
        assert.strictEqual(backend.name, "jws");
    });

    it("should return the verified claims as identity", async () => {
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET });
        const token = await createTestJwt({ sub: "u-1", role: "admin" }, { expiresIn: "5m" });

        const identity = await backend.authenticate(req, token);

        assert.ok(identity && typeof identity === "object");
        assert.ok("sub" in identity && "role" in identity);
        assert.strictEqual(identity.sub, "u-1");
        assert.strictEqual(identity.role, "admin");
    });

    it("should map claims through the identity function", async () => {
        const backend = createJwsBackend({
            secret: TEST_JWT_SECRET,
            authenticate: (_req, claims) => (typeof claims.sub === "string" ? { userId: claims.sub } : undefined),
        });

        assert.deepStrictEqual(await backend.authenticate(req, await createTestJwt({ sub: "u-2" })), { userId: "u-2" });
        assert.strictEqual(await backend.authenticate(req, await createTestJwt({})), undefined);
    });

    it("should leave expired tokens unauthenticated and report the error", async () => {
        const reported: string[] = [];
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET, onError: (_req, err) => reported.push(err.code) });
        const token = await createTestJwt({ sub: "u-1" }, { expiresIn: secondsFromNow(-60) });

        assert.strictEqual(await backend.authenticate(req, token), undefined);
        assert.deepStrictEqual(reported, ["ERR_JWT_EXPIRED"]);
    });

    it("should reject tokens signed with another secret", async () => {
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET });
        const forged = await new jose.SignJWT({ sub: "u-1" }).setProtectedHeader({ alg: "HS256" }).sign(new TextEncoder().encode("another-test-secret-of-enough-length!!"));

        assert.strictEqual(await backend.authenticate(req, forged), undefined);
    });

    it("should reject malformed tokens", async () => {
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET });
        assert.strictEqual(await backend.authenticate(req, "not-a-token"), undefined);
    });

    it("should check issuer and audience", async () => {
        const backend = createJwsBackend({ secret: TEST_JWT_SECRET, issuer: "accounts.test", audience: "billing" });

        const good = await createTestJwt({ sub: "u-1" }, { issuer: "accounts.test", audience: "billing" });
        const wrongIssuer = await createTestJwt({ sub: "u-1" }, { issuer: "elsewhere.test", audience: "billing" });

        assert.ok(await backend.authenticate(req, good));
        assert.strictEqual(await backend.authenticate(req, wrongIssuer), undefined);
    });

    it("should let onError raise the unauthorized signal", async () => {
        const backend = createJwsBackend({
            secret: TEST_JWT_SECRET,
            onError: () => {
                throw new UnauthorizedError({ message: "Token expired" });
            },
        });
        const token = await createTestJwt({ sub: "u-1" }, { expiresIn: secondsFromNow(-60) });

        await assert.rejects(async () => backend.authenticate(req, token), UnauthorizedError);
    });

    it("should reject HMAC secrets shorter than the algorithm requires", () => {
        assert.throws(() => createJwsBackend({ secret: "short-test-secret" }), {
            name: "ConfigurationError",
            message: "@portcullis/auth jws backend: HMAC secret must be at least 32 bytes (256 bits) per RFC 7518, got 17 bytes",
        });
        assert.throws(() => createJwsBackend({ secret: TEST_JWT_SECRET, algorithms: ["HS512"] }), ConfigurationError);
    });

    it("should reject a secret with asymmetric algorithms", () => {
        assert.throws(() => createJwsBackend({ secret: TEST_JWT_SECRET, algorithms: ["RS256"] }), ConfigurationError);
    });

    it("should verify tokens with a public key", async () => {
        const { publicKey, privateKey } = await jose.generateKeyPair("ES256");
        const backend = createJwsBackend({ publicKey, algorithms: ["ES256"] });
        const token = await new jose.SignJWT({ sub: "u-ec" }).setProtectedHeader({ alg: "ES256" }).sign(privateKey);

        const identity = await backend.authenticate(req, token);

        assert.ok(identity && typeof identity === "object" && "sub" in identity);
        assert.strictEqual(identity.sub, "u-ec");
        assert.strictEqual(await backend.authenticate(req, await createTestJwt({ sub: "u-ec" })), undefined);
    });

    it("should reject a public key with HMAC algorithms", async () => {
        const { publicKey } = await jose.generateKeyPair("ES256");

        assert.throws(() => createJwsBackend({ publicKey, algorithms: ["ES256", "HS256"] }), {
            name: "ConfigurationError",
            message: "@portcullis/auth jws backend: a public key cannot verify HS256, HS384 or HS512 tokens",
        });
    });
});

describe("createJweBackend()", () => {
    it("should decrypt tokens into claims", async () => {
        const backend = createJweBackend({ secret: TEST_JWE_SECRET });
        const token = await createTestJwe({ sub: "u-3" }, { expiresIn: "5m" });

        const identity = await backend.authenticate(req, token);

        assert.strictEqual(backend.name, "jwe");
        assert.ok(identity && typeof identity === "object" && "sub" in identity);
        assert.strictEqual(identity.sub, "u-3");
    });

    it("should leave tokens encrypted with another key unauthenticated", async () => {
        const backend = createJweBackend({ secret: new TextEncoder().encode("another-32-byte-test-secret-key!") });
        const token = await createTestJwe({ sub: "u-3" });

        assert.strictEqual(await backend.authenticate(req, token), undefined);
    });

    it("should leave signed tokens unauthenticated", async () => {
        const backend = createJweBackend({ secret: TEST_JWE_SECRET });
        assert.strictEqual(await backend.authenticate(req, await createTestJwt({ sub: "u-3" })), undefined);
    });

    it("should require a key", () => {
        assert.throws(() => createJweBackend({}), ConfigurationError);
    });

    it("should decrypt tokens with a private key", async () => {
        const { publicKey, privateKey } = await jose.generateKeyPair("ECDH-ES");
        const backend = createJweBackend({ privateKey, keyManagementAlgorithms: ["ECDH-ES"] });
        const token = await new jose.EncryptJWT({ sub: "u-4" }).setProtectedHeader({ alg: "ECDH-ES", enc: "A256GCM" }).encrypt(publicKey);

        const identity = await backend.authenticate(req, token);

        assert.ok(identity && typeof identity === "object" && "sub" in identity);
        assert.strictEqual(identity.sub, "u-4");
    });

    it("should reject a secret with asymmetric key management", () => {
        assert.throws(() => createJweBackend({ secret: TEST_JWE_SECRET, keyManagementAlgorithms: ["RSA-OAEP-256"] }), {
            name: "ConfigurationError",
            message: "@portcullis/auth jwe backend: a secret can only decrypt dir, A*KW or A*GCMKW tokens",
        });
    });

    it("should reject a private key with symmetric key management", async () => {
        const { privateKey } = await jose.generateKeyPair("RSA-OAEP-256");

        assert.throws(() => createJweBackend({ privateKey, keyManagementAlgorithms: ["dir"] }), {
            name: "ConfigurationError",
            message: "@portcullis/auth jwe backend: a private key can only decrypt RSA-OAEP or ECDH-ES tokens",
        });
        assert.throws(() => createJweBackend({ privateKey }), {
            name: "ConfigurationError",
            message: "@portcullis/auth jwe backend: invalid options (keyManagementAlgorithms: keyManagementAlgorithms is required with privateKey)",
        });
    });
});
