/**
 * Unit tests for request matching
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { createRequest } from "@portcullis/core";
import { compileUrlPattern, matchesMethod, matchPath, matchRule } from "../../src/path-match.ts";
import type { CompiledAccessRule } from "../../src/types.ts";

function rule(overrides: Partial<CompiledAccessRule>): CompiledAccessRule {
    return { name: "test", patterns: [], handler: () => true, ...overrides };
}

describe("path-match", () => {
    describe("compileUrlPattern()", () => {
        it("should compile strings as regular expression sources", () => {
            const pattern = compileUrlPattern("^/admin/");
            assert.ok(pattern.test("/admin/users"));
            assert.ok(!pattern.test("/public/admin/"));
        });

        it("should keep RegExp objects without stateful flags", () => {
            const original = /^\/admin/i;
            assert.strictEqual(compileUrlPattern(original), original);
        });

        it("should drop the global and sticky flags", () => {
            const pattern = compileUrlPattern(/^\/admin/giy);
            assert.strictEqual(pattern.flags, "i");
        });

        it("should throw for invalid sources", () => {
            assert.throws(() => compileUrlPattern("^/(unclosed"), SyntaxError);
        });
    });

    describe("matchPath()", () => {
        it("should return named captures of the first matching pattern", () => {
            const patterns = [/^\/users\/(?<userId>\d+)$/, /^\/projects\/(?<projectId>[^/]+)\/tasks\/(?<taskId>\d+)$/];

            assert.deepStrictEqual(matchPath("/projects/apollo/tasks/7", patterns), { projectId: "apollo", taskId: "7" });
        });

        it("should return an empty object for patterns without groups", () => {
            assert.deepStrictEqual(matchPath("/health", [/^\/health$/]), {});
        });

        it("should search rather than anchor implicitly", () => {
            assert.deepStrictEqual(matchPath("/api/v1/admin/users", [/admin/]), {});
        });

        it("should skip unmatched optional groups", () => {
            assert.deepStrictEqual(matchPath("/files", [/^\/files(?:\/(?<name>.+))?$/]), {});
        });

        it("should return undefined when nothing matches", () => {
            assert.strictEqual(matchPath("/public", [/^\/admin/]), undefined);
        });

        it("should match repeatedly with a compiled global pattern", () => {
            const patterns = [compileUrlPattern(/^\/admin/g)];
            assert.deepStrictEqual(matchPath("/admin", patterns), {});
            assert.deepStrictEqual(matchPath("/admin", patterns), {});
        });
    });

    describe("matchesMethod()", () => {
        it("should accept any method without a filter", () => {
            assert.strictEqual(matchesMethod("PATCH", undefined), true);
        });

        it("should compare case-insensitively", () => {
            const methods = new Set(["PUT", "DELETE"]);
            assert.strictEqual(matchesMethod("delete", methods), true);
            assert.strictEqual(matchesMethod("GET", methods), false);
        });
    });

    describe("matchRule()", () => {
        it("should check the method before the path", () => {
            const putOnly = rule({ patterns: [/^\/projects/], methods: new Set(["PUT"]) });

            assert.strictEqual(matchRule(putOnly, createRequest("http://localhost/projects/1")), undefined);
            assert.deepStrictEqual(matchRule(putOnly, createRequest("http://localhost/projects/1", { method: "PUT" })), {});
        });

        it("should match against the path without the query", () => {
            const exact = rule({ patterns: [/^\/search$/] });
            assert.deepStrictEqual(matchRule(exact, createRequest("http://localhost/search?q=admin")), {});
        });

        it("should use a custom matcher", () => {
            const byHeader = rule({
                match: (req) => (req.header.get("x-tenant") ? { tenant: req.header.get("x-tenant") ?? "" } : false),
            });
            const flag = rule({ match: (req) => req.header.has("x-internal") });

            assert.deepStrictEqual(matchRule(byHeader, createRequest("http://localhost/", { headers: { "x-tenant": "acme" } })), { tenant: "acme" });
            assert.strictEqual(matchRule(byHeader, createRequest("http://localhost/")), undefined);
            assert.deepStrictEqual(matchRule(flag, createRequest("http://localhost/", { headers: { "x-internal": "1" } })), {});
            assert.strictEqual(matchRule(flag, createRequest("http://localhost/")), undefined);
        });
    });
});
