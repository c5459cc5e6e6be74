/**
 * Unit tests for scope matching
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { matchScopes } from "../../src/scopes.ts";

describe("matchScopes", () => {
    it("should match when no scopes are required", () => {
        assert.deepStrictEqual(matchScopes(["build:read"], []), { matched: true });
    });

    it("should match when the consumer is unrestricted", () => {
        assert.deepStrictEqual(matchScopes([], ["build:write"]), { matched: true });
    });

    it("should match when both sets are empty", () => {
        assert.deepStrictEqual(matchScopes([], []), { matched: true });
    });

    it("should match when one scope overlaps", () => {
        assert.deepStrictEqual(matchScopes(["build:read", "deploy:read"], ["deploy:read", "deploy:write"]), { matched: true });
    });

    it("should match on an exact single scope", () => {
        assert.deepStrictEqual(matchScopes(["build:write"], ["build:write"]), { matched: true });
    });

    it("should report both sets on mismatch", () => {
        const result = matchScopes(["build:read"], ["build:write"]);
        assert.deepStrictEqual(result, { matched: false, granted: ["build:read"], required: ["build:write"] });
    });

    it("should compare scopes exactly", () => {
        const result = matchScopes(["build"], ["build:read"]);
        assert.strictEqual(result.matched, false);
    });

    it("should return copies of the input sets", () => {
        const granted = ["a"];
        const required = ["b"];
        const result = matchScopes(granted, required);
        assert.ok(!result.matched);
        assert.notStrictEqual(result.granted, granted);
        assert.notStrictEqual(result.required, required);
    });
});
