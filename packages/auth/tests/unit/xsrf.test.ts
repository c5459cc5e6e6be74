/**
 * Unit tests for the anti-forgery guard
 */

import assert from "node:assert";
import { describe, it, mock } from "node:test";
import { Code } from "@connectrpc/connect";
import { MemoryCache } from "../../src/cache.ts";
import { AuthCancelledError, DenyReason, UnauthorizedError } from "../../src/errors.ts";
import { PermissionLevel } from "../../src/types.ts";
import type { SharedCache } from "../../src/types.ts";
import { AntiForgeryGuard, generateXsrfToken } from "../../src/xsrf.ts";

function sequentialTokens(): () => string {
    let counter = 0;
    return () => `xsrf-${++counter}`;
}

function createGuard(cache: SharedCache = new MemoryCache()) {
    return new AntiForgeryGuard({ cache, ttlSeconds: 3600, generateToken: sequentialTokens() });
}

async function assertDenied(promise: Promise<unknown>, reason: DenyReason): Promise<void> {
    await assert.rejects(promise, (err: unknown) => {
        assert.ok(err instanceof UnauthorizedError);
        assert.strictEqual(err.code, Code.Unauthenticated);
        assert.strictEqual(err.reason, reason);
        return true;
    });
}

describe("AntiForgeryGuard", () => {
    it("should generate url-safe random tokens", () => {
        const a = generateXsrfToken();
        const b = generateXsrfToken();
        assert.match(a, /^[A-Za-z0-9_-]{43}$/);
        assert.notStrictEqual(a, b);
    });

    it("should key tokens by session id", () => {
        assert.strictEqual(createGuard().keyFor("session-1"), "session:xsrf:session-1");
    });

    describe("read requests", () => {
        it("should issue a token when the session has none", async () => {
            const guard = createGuard();
            const decision = await guard.evaluate("session-1", PermissionLevel.READ, null);
            assert.deepStrictEqual(decision, { token: "xsrf-1", issued: true });
        });

        it("should reuse the cached token", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            const decision = await createGuard(cache).evaluate("session-1", PermissionLevel.READ, null);
            assert.deepStrictEqual(decision, { token: "cached-token", issued: false });
        });

        it("should ignore a wrong header value", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            const decision = await createGuard(cache).evaluate("session-1", PermissionLevel.READ, "wrong");
            assert.deepStrictEqual(decision, { token: "cached-token", issued: false });
        });

        it("should not write to the cache while evaluating", async () => {
            const cache = new MemoryCache();
            await createGuard(cache).evaluate("session-1", PermissionLevel.READ, null);
            assert.strictEqual(cache.size, 0);
        });
    });

    describe("mutating requests", () => {
        it("should require the header", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            await assertDenied(createGuard(cache).evaluate("session-1", PermissionLevel.WRITE, null), DenyReason.XSRF_MISSING);
        });

        it("should treat an empty header as missing", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            await assertDenied(createGuard(cache).evaluate("session-1", PermissionLevel.WRITE, ""), DenyReason.XSRF_MISSING);
        });

        it("should deny when the session has no token", async () => {
            await assertDenied(createGuard().evaluate("session-1", PermissionLevel.WRITE, "any"), DenyReason.XSRF_UNKNOWN);
        });

        it("should deny a mismatching token", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            await assertDenied(createGuard(cache).evaluate("session-1", PermissionLevel.ADMIN, "other-token"), DenyReason.XSRF_MISMATCH);
        });

        it("should rotate the token after a match", async () => {
            const cache = new MemoryCache();
            await cache.set("session:xsrf:session-1", "cached-token", 60);
            const guard = createGuard(cache);

            const decision = await guard.evaluate("session-1", PermissionLevel.WRITE, "cached-token");
            assert.deepStrictEqual(decision, { token: "xsrf-1", issued: true });

            await guard.commit("session-1", decision);
            assert.strictEqual(await cache.get("session:xsrf:session-1"), "xsrf-1");

            // The consumed token no longer authorizes a mutation
            await assertDenied(guard.evaluate("session-1", PermissionLevel.WRITE, "cached-token"), DenyReason.XSRF_MISMATCH);
        });
    });

    describe("commit()", () => {
        it("should store issued tokens with the configured TTL", async () => {
            const set = mock.fn(async (_key: string, _value: string, _ttl: number) => {});
            const cache: SharedCache = { get: async () => undefined, set };
            const guard = createGuard(cache);

            await guard.commit("session-1", { token: "xsrf-9", issued: true });

            assert.deepStrictEqual(set.mock.calls[0]?.arguments.slice(0, 3), ["session:xsrf:session-1", "xsrf-9", 3600]);
        });

        it("should not write reused tokens", async () => {
            const set = mock.fn(async () => {});
            const guard = createGuard({ get: async () => "cached-token", set });
            await guard.commit("session-1", { token: "cached-token", issued: false });
            assert.strictEqual(set.mock.calls.length, 0);
        });
    });

    describe("cache failures", () => {
        it("should deny with a store error when the lookup fails", async () => {
            const cache: SharedCache = {
                get: async () => {
                    throw new Error("cache unreachable");
                },
                set: async () => {},
            };
            await assert.rejects(createGuard(cache).evaluate("session-1", PermissionLevel.READ, null), (err: unknown) => {
                assert.ok(err instanceof UnauthorizedError);
                assert.strictEqual(err.reason, DenyReason.STORE_ERROR);
                assert.strictEqual(err.details.storeError, "cache unreachable");
                assert.strictEqual(err.details.id, "session:xsrf:session-1");
                return true;
            });
        });

        it("should report cancellation instead of a denial", async () => {
            const controller = new AbortController();
            controller.abort();
            await assert.rejects(createGuard().evaluate("session-1", PermissionLevel.READ, null, controller.signal), AuthCancelledError);
        });
    });
});
