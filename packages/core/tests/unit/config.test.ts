/**
 * Unit tests for environment configuration
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { ZodError } from "zod";
import { parseEnvConfig, safeParseEnvConfig } from "../../src/config/index.ts";

describe("parseEnvConfig", () => {
    it("should apply wire defaults on an empty environment", () => {
        const config = parseEnvConfig({});

        assert.strictEqual(config.AUTH_SESSION_COOKIE, "jwt_token");
        assert.strictEqual(config.AUTH_XSRF_COOKIE, "xsrf_token");
        assert.strictEqual(config.AUTH_XSRF_HEADER, "X-XSRF-TOKEN");
        assert.strictEqual(config.AUTH_XSRF_TOKEN_TTL, 604800);
        assert.strictEqual(config.AUTH_COOKIE_SECURE, undefined);
        assert.strictEqual(config.AUTH_JWT_SECRET, undefined);
        assert.strictEqual(config.NODE_ENV, "development");
    });

    it("should coerce numeric and boolean strings", () => {
        const config = parseEnvConfig({
            AUTH_XSRF_TOKEN_TTL: "3600",
            AUTH_COOKIE_SECURE: "yes",
        });

        assert.strictEqual(config.AUTH_XSRF_TOKEN_TTL, 3600);
        assert.strictEqual(config.AUTH_COOKIE_SECURE, true);
    });

    it("should parse AUTH_COOKIE_SECURE=0 as false", () => {
        assert.strictEqual(parseEnvConfig({ AUTH_COOKIE_SECURE: "0" }).AUTH_COOKIE_SECURE, false);
    });

    it("should reject a short HMAC secret", () => {
        assert.throws(() => parseEnvConfig({ AUTH_JWT_SECRET: "test-secret" }), ZodError);
    });

    it("should reject cookie names with separators", () => {
        assert.throws(() => parseEnvConfig({ AUTH_SESSION_COOKIE: "jwt token" }), ZodError);
    });

    it("should reject a TTL below one minute", () => {
        const result = safeParseEnvConfig({ AUTH_XSRF_TOKEN_TTL: "10" });
        assert.strictEqual(result.success, false);
    });
});
