/**
 * Static token authentication
 *
 * Routes may accept fixed shared-secret headers (monitoring probes,
 * internal services). The check is all-or-nothing.
 *
 * @module static-token
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { DenyReason, UnauthorizedError } from "./errors.ts";
import type { StaticToken } from "./types.ts";

export type StaticTokenResult = "not-applicable" | "granted";

/**
 * Compare two secrets in constant time.
 *
 * Both values are hashed first so inputs of different length can be compared
 * without leaking the expected length.
 */
export function secretsEqual(received: string, expected: string): boolean {
    const a = createHash("sha256").update(received).digest();
    const b = createHash("sha256").update(expected).digest();
    return timingSafeEqual(a, b);
}

/**
 * Check every configured static token against the request headers.
 *
 * @param allowedTokens - Header/value pairs configured on the route
 * @param headers - Request headers
 * @returns "not-applicable" when the route has no static tokens, "granted" when all pairs match
 * @throws UnauthorizedError at the first pair that does not match
 */
export function checkStaticTokens(allowedTokens: ReadonlyArray<StaticToken>, headers: Headers): StaticTokenResult {
    if (allowedTokens.length === 0) {
        return "not-applicable";
    }

    for (const token of allowedTokens) {
        const received = headers.get(token.header);
        if (received === null || !secretsEqual(received, token.value)) {
            throw new UnauthorizedError(DenyReason.STATIC_TOKEN_MISMATCH, `Static token denied on header ${token.header}`, {
                header: token.header,
                present: received !== null,
            });
        }
    }

    return "granted";
}

/**
 * Parse a `header-name:expected-value` route token declaration.
 *
 * Splits at the first colon so values may contain colons.
 *
 * @example parseStaticToken("X-Status-Token:test-secret") // { header: "X-Status-Token", value: "test-secret" }
 */
export function parseStaticToken(declaration: string): StaticToken {
    const separator = declaration.indexOf(":");
    if (separator <= 0 || separator === declaration.length - 1) {
        throw new Error(`@authgate/auth: invalid static token declaration, expected "header:value"`);
    }
    return {
        header: declaration.slice(0, separator).trim(),
        value: declaration.slice(separator + 1),
    };
}
