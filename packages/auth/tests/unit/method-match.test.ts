/**
 * Unit tests for method pattern matching
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { findRouteRule, matchesMethodPattern } from "../../src/method-match.ts";
import type { RouteAuthRule } from "../../src/types.ts";

describe("matchesMethodPattern", () => {
    it("should match exact method pattern", () => {
        assert.strictEqual(matchesMethodPattern("build.v1.BuildService", "StartBuild", ["build.v1.BuildService/StartBuild"]), true);
    });

    it("should not match a different method", () => {
        assert.strictEqual(matchesMethodPattern("build.v1.BuildService", "StartBuild", ["build.v1.BuildService/CancelBuild"]), false);
    });

    it("should match wildcard '*' for any method", () => {
        assert.strictEqual(matchesMethodPattern("any.Service", "AnyMethod", ["*"]), true);
    });

    it("should match 'Service/*' for any method of that service", () => {
        assert.strictEqual(matchesMethodPattern("build.v1.BuildService", "CancelBuild", ["build.v1.BuildService/*"]), true);
        assert.strictEqual(matchesMethodPattern("build.v1.OtherService", "CancelBuild", ["build.v1.BuildService/*"]), false);
    });

    it("should return false for empty patterns", () => {
        assert.strictEqual(matchesMethodPattern("build.v1.BuildService", "StartBuild", []), false);
    });
});

describe("findRouteRule", () => {
    const rules: RouteAuthRule[] = [
        { name: "status", methods: ["build.v1.BuildService/Status"], requirements: { needAuth: false } },
        { name: "builds", methods: ["build.v1.BuildService/*"], requirements: { scopes: ["build:read"] } },
        { name: "fallback", methods: ["*"], requirements: { needAdmin: true } },
    ];

    it("should return the first matching rule", () => {
        assert.strictEqual(findRouteRule("build.v1.BuildService", "Status", rules)?.name, "status");
        assert.strictEqual(findRouteRule("build.v1.BuildService", "StartBuild", rules)?.name, "builds");
        assert.strictEqual(findRouteRule("admin.v1.AdminService", "Purge", rules)?.name, "fallback");
    });

    it("should return undefined when nothing matches", () => {
        assert.strictEqual(findRouteRule("build.v1.BuildService", "Status", []), undefined);
    });
});
