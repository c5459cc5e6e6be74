/**
 * Unit tests for gateway settings
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { DEFAULT_WIRE_SETTINGS, loadGatewaySettings } from "../../src/settings.ts";

describe("loadGatewaySettings", () => {
    it("should use the default wire names", () => {
        const { wire, verifier } = loadGatewaySettings({});

        assert.deepStrictEqual(wire, { ...DEFAULT_WIRE_SETTINGS, secureCookies: false });
        assert.deepStrictEqual(verifier, { secret: undefined, jwksUri: undefined, issuer: undefined });
    });

    it("should mark cookies secure in production", () => {
        assert.strictEqual(loadGatewaySettings({ NODE_ENV: "production" }).wire.secureCookies, true);
    });

    it("should let AUTH_COOKIE_SECURE override the environment default", () => {
        assert.strictEqual(loadGatewaySettings({ NODE_ENV: "production", AUTH_COOKIE_SECURE: "false" }).wire.secureCookies, false);
        assert.strictEqual(loadGatewaySettings({ NODE_ENV: "development", AUTH_COOKIE_SECURE: "1" }).wire.secureCookies, true);
    });

    it("should map custom names and verifier options", () => {
        const { wire, verifier } = loadGatewaySettings({
            AUTH_SESSION_COOKIE: "sid",
            AUTH_XSRF_COOKIE: "csrf",
            AUTH_XSRF_HEADER: "X-CSRF-Token",
            AUTH_XSRF_TOKEN_TTL: "3600",
            AUTH_JWT_SECRET: "test-secret-for-session-tokens-only",
            AUTH_JWT_ISSUER: "build-api",
        });

        assert.deepStrictEqual(wire, {
            sessionCookie: "sid",
            xsrfCookie: "csrf",
            xsrfHeader: "X-CSRF-Token",
            xsrfTokenTtl: 3600,
            secureCookies: false,
        });
        assert.deepStrictEqual(verifier, {
            secret: "test-secret-for-session-tokens-only",
            jwksUri: undefined,
            issuer: "build-api",
        });
    });

    it("should reject an invalid environment", () => {
        assert.throws(() => loadGatewaySettings({ AUTH_XSRF_TOKEN_TTL: "abc" }), { name: "ZodError" });
    });
});
