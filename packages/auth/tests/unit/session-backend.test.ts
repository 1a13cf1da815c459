/**
 * Unit tests for the session backend
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import type { HttpRequest } from "@portcullis/core";
import { createRequest } from "@portcullis/core";
import { createSessionBackend } from "../../src/session-backend.ts";
import type { AuthBackend } from "../../src/types.ts";

async function authenticate<TData>(backend: AuthBackend<TData>, req: HttpRequest) {
    const data = await backend.parse(req);
    assert.ok(data !== undefined);
    return await backend.authenticate(req, data);
}

describe("createSessionBackend()", () => {
    it("should be named session", () => {
        assert.strictEqual(createSessionBackend().name, "session");
    });

    it("should read the identity from req.session", async () => {
        const backend = createSessionBackend();
        const req = createRequest("http://localhost/", { session: { identity: { id: "u-1" } } });

        const data = await backend.parse(req);
        assert.ok(data);
        assert.deepStrictEqual(data, { identity: { id: "u-1" } });
        assert.deepStrictEqual(await backend.authenticate(req, data), { id: "u-1" });
    });

    it("should parse an empty session when the request has none", async () => {
        const backend = createSessionBackend();
        const req = createRequest("http://localhost/");

        const data = await backend.parse(req);
        assert.ok(data);
        assert.deepStrictEqual(data, {});
        assert.strictEqual(await backend.authenticate(req, data), undefined);
    });

    it("should treat a falsy stored identity as unauthenticated", async () => {
        const backend = createSessionBackend();
        const req = createRequest("http://localhost/", { session: { identity: "" } });

        assert.strictEqual(await authenticate(backend, req), undefined);
    });

    it("should use a custom session key and loader", async () => {
        const store = new Map([["sid-1", { user: "alice" }]]);
        const backend = createSessionBackend({
            sessionKey: "user",
            getSession: async (req) => store.get(req.header.get("x-session-id") ?? ""),
        });
        const req = createRequest("http://localhost/", { headers: { "x-session-id": "sid-1" } });

        assert.strictEqual(await authenticate(backend, req), "alice");
    });

    it("should answer unauthorized with a plain 401", async () => {
        const res = await createSessionBackend().onUnauthorized(createRequest("http://localhost/"), { message: "Session expired" });

        assert.strictEqual(res.status, 401);
        assert.strictEqual(res.headers.get("www-authenticate"), null);
        assert.strictEqual(await res.text(), "Session expired");
    });
});
