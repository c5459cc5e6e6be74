/**
 * Gateway settings from the environment
 *
 * @module settings
 */

import { parseEnvConfig } from "@authgate/core/config";
import type { GatewayWireSettings, JwtSessionVerifierOptions } from "./types.ts";

/**
 * Cookie and header names used when nothing else is configured.
 */
export const DEFAULT_WIRE_SETTINGS: GatewayWireSettings = {
    sessionCookie: "jwt_token",
    xsrfCookie: "xsrf_token",
    xsrfHeader: "X-XSRF-TOKEN",
    xsrfTokenTtl: 60 * 60 * 24 * 7,
    secureCookies: true,
};

export interface GatewaySettings {
    readonly wire: GatewayWireSettings;
    readonly verifier: JwtSessionVerifierOptions;
}

/**
 * Build gateway settings from environment variables.
 *
 * Cookies are marked Secure when `AUTH_COOKIE_SECURE` says so, or by
 * default when `NODE_ENV` is `production`.
 *
 * @throws ZodError when a variable is present but invalid
 *
 * @example
 * ```typescript
 * const { wire, verifier } = loadGatewaySettings();
 * const gateway = createAuthGateway({
 *     verifier: createJwtSessionVerifier(verifier),
 *     settings: wire,
 *     sessions, consumers, cache,
 * });
 * ```
 */
export function loadGatewaySettings(env: Record<string, string | undefined> = process.env): GatewaySettings {
    const config = parseEnvConfig(env);

    return {
        wire: {
            sessionCookie: config.AUTH_SESSION_COOKIE,
            xsrfCookie: config.AUTH_XSRF_COOKIE,
            xsrfHeader: config.AUTH_XSRF_HEADER,
            xsrfTokenTtl: config.AUTH_XSRF_TOKEN_TTL,
            secureCookies: config.AUTH_COOKIE_SECURE ?? config.NODE_ENV === "production",
        },
        verifier: {
            secret: config.AUTH_JWT_SECRET,
            jwksUri: config.AUTH_JWKS_URI,
            issuer: config.AUTH_JWT_ISSUER,
        },
    };
}
