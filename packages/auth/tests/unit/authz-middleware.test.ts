/**
 * Unit tests for the authorization middleware
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { Code, ConnectError } from "@connectrpc/connect";
import { composeMiddleware, createRequest, textResponse } from "@portcullis/core";
import { createAuthMiddleware } from "../../src/auth-middleware.ts";
import { createAuthorizationMiddleware, resolveUnauthorized } from "../../src/authz-middleware.ts";
import { withIdentity } from "../../src/context.ts";
import { raiseUnauthorized } from "../../src/errors.ts";
import type { AuthBackend } from "../../src/types.ts";
import { createRecordingLogger } from "../helpers/http.ts";

function createBackend(name: string, status: number): AuthBackend<string> {
    return {
        name,
        parse: (req) => req.header.get("x-user") ?? undefined,
        authenticate: (_req, user) => user,
        onUnauthorized: (_req, metadata) => textResponse(status, `${name}: ${metadata.message ?? "no message"}`),
    };
}

describe("resolveUnauthorized()", () => {
    const backend = createBackend("primary", 401);
    const fallback = createBackend("fallback", 407);

    it("should return a carried response as is", async () => {
        const response = textResponse(451, "gone");
        const req = withIdentity(createRequest("http://localhost/"), { identity: "u-1", backend });

        assert.strictEqual(await resolveUnauthorized(req, { response }), response);
    });

    it("should delegate to the authenticating backend", async () => {
        const req = withIdentity(createRequest("http://localhost/"), { identity: "u-1", backend });

        const res = await resolveUnauthorized(req, { message: "nope" }, fallback);

        assert.strictEqual(res.status, 401);
        assert.strictEqual(await res.text(), "primary: nope");
    });

    it("should use the fallback backend for unauthenticated requests", async () => {
        const res = await resolveUnauthorized(createRequest("http://localhost/"), {}, fallback);

        assert.strictEqual(res.status, 407);
        assert.strictEqual(await res.text(), "fallback: no message");
    });

    it("should answer 403 without any backend", async () => {
        const res = await resolveUnauthorized(createRequest("http://localhost/"), { message: "Admins only" });

        assert.strictEqual(res.status, 403);
        assert.strictEqual(await res.text(), "Admins only");
    });

    it("should default the 403 body", async () => {
        const res = await resolveUnauthorized(createRequest("http://localhost/"), {});
        assert.strictEqual(await res.text(), "Forbidden");
    });
});

describe("createAuthorizationMiddleware()", () => {
    it("should pass successful responses through", async () => {
        const handler = createAuthorizationMiddleware()(async () => textResponse(200, "ok"));

        const res = await handler(createRequest("http://localhost/"));

        assert.strictEqual(res.status, 200);
    });

    it("should answer the signal through the backend that authenticated", async () => {
        const backend = createBackend("primary", 401);
        const { logger, entries } = createRecordingLogger();
        const handler = composeMiddleware(
            createAuthMiddleware({ backends: [backend], logger }),
            createAuthorizationMiddleware({ logger }),
        )(async () => raiseUnauthorized({ message: "Admins only" }));

        const res = await handler(createRequest("http://localhost/admin", { headers: { "x-user": "bob" } }));

        assert.strictEqual(res.status, 401);
        assert.strictEqual(await res.text(), "primary: Admins only");
        assert.deepStrictEqual(entries.at(-1), {
            level: "debug",
            message: "unauthorized signal handled",
            attributes: { "url.path": "/admin", "http.response.status_code": 401, "auth.reason": "Admins only" },
        });
    });

    it("should catch signals raised in nested async code", async () => {
        const handler = createAuthorizationMiddleware()(async () => {
            await Promise.resolve();
            raiseUnauthorized();
        });

        const res = await handler(createRequest("http://localhost/"));

        assert.strictEqual(res.status, 403);
        assert.strictEqual(await res.text(), "Forbidden");
    });

    it("should rethrow ConnectErrors that are not the signal", async () => {
        const handler = createAuthorizationMiddleware()(async () => {
            throw new ConnectError("upstream down", Code.Unavailable);
        });

        await assert.rejects(() => handler(createRequest("http://localhost/")), (err: unknown) => {
            assert.ok(err instanceof ConnectError);
            assert.strictEqual(err.code, Code.Unavailable);
            return true;
        });
    });

    it("should rethrow other errors", async () => {
        const handler = createAuthorizationMiddleware()(async () => {
            throw new TypeError("bug");
        });

        await assert.rejects(() => handler(createRequest("http://localhost/")), TypeError);
    });
});
