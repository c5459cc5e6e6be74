/**
 * Session token authentication
 *
 * Locates a signed session token in the session cookie or the
 * Authorization header and verifies it.
 *
 * @module session-token
 */

import { readCookie } from "./cookies.ts";
import { DenyReason, SessionTokenError, UnauthorizedError } from "./errors.ts";
import type { SessionTokenErrorKind } from "./errors.ts";
import type { SessionTokenVerifier, VerifiedClaims } from "./types.ts";

/**
 * Raw token and where it came from.
 */
export interface ExtractedSessionToken {
    readonly raw: string;
    /** Token came from the session cookie: anti-forgery checks apply */
    readonly cookieBased: boolean;
}

export type SessionTokenResult =
    | { readonly status: "absent" }
    | {
          readonly status: "verified";
          readonly claims: VerifiedClaims;
          readonly cookieBased: boolean;
      };

const BEARER_PATTERN = /^Bearer\s+(.+)$/i;

const REASON_BY_KIND: Record<SessionTokenErrorKind, typeof DenyReason.TOKEN_EXPIRED | typeof DenyReason.TOKEN_MALFORMED | typeof DenyReason.TOKEN_SIGNATURE> = {
    expired: DenyReason.TOKEN_EXPIRED,
    malformed: DenyReason.TOKEN_MALFORMED,
    signature: DenyReason.TOKEN_SIGNATURE,
};

/**
 * Find the session token: session cookie first, then Bearer header.
 *
 * An empty session cookie counts as absent, so a Bearer header on the same
 * request is still used.
 *
 * @returns The token, or undefined when neither source carries one
 */
export function extractSessionToken(headers: Headers, cookieName: string): ExtractedSessionToken | undefined {
    const fromCookie = readCookie(headers, cookieName);
    if (fromCookie) {
        return { raw: fromCookie, cookieBased: true };
    }

    const authHeader = headers.get("authorization");
    if (!authHeader) {
        return undefined;
    }
    const match = BEARER_PATTERN.exec(authHeader);
    const raw = match?.[1]?.trim();
    return raw ? { raw, cookieBased: false } : undefined;
}

/**
 * Extract and verify the session token of a request.
 *
 * A request without a token is not an error here: whether authentication
 * is mandatory is decided by the authorization stage.
 *
 * @throws UnauthorizedError when a token is present but fails verification
 */
export async function authenticateSessionToken(headers: Headers, cookieName: string, verifier: SessionTokenVerifier): Promise<SessionTokenResult> {
    const token = extractSessionToken(headers, cookieName);
    if (!token) {
        return { status: "absent" };
    }

    let claims: VerifiedClaims;
    try {
        claims = await verifier.verify(token.raw);
    } catch (err) {
        const kind: SessionTokenErrorKind = err instanceof SessionTokenError ? err.kind : "malformed";
        throw new UnauthorizedError(REASON_BY_KIND[kind], "Session token verification failed", { kind, cookieBased: token.cookieBased }, err);
    }

    return { status: "verified", claims, cookieBased: token.cookieBased };
}
