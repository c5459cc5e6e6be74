/**
 * JWT session token verifier
 *
 * Verifies signed session tokens with the jose library and returns typed
 * claims. Supports JWKS remote key sets, HMAC secrets and asymmetric
 * public keys.
 *
 * @module jwt-verifier
 */

import * as jose from "jose";
import { SessionTokenError } from "./errors.ts";
import type { JwtSessionVerifierOptions, SessionTokenVerifier, VerifiedClaims } from "./types.ts";

/**
 * Get minimum HMAC key size in bytes per RFC 7518.
 * HS256 requires 32 bytes, HS384 requires 48, HS512 requires 64.
 */
function getMinHmacKeyBytes(algorithms?: string[]): number {
    if (!algorithms) return 32;
    if (algorithms.includes("HS512")) return 64;
    if (algorithms.includes("HS384")) return 48;
    return 32;
}

/**
 * Build a JWT verification function from options.
 *
 * Priority: jwksUri > publicKey > secret
 */
function buildVerify(options: JwtSessionVerifierOptions, verifyOptions: jose.JWTVerifyOptions): (token: string) => Promise<jose.JWTVerifyResult> {
    if (options.jwksUri) {
        const jwks = jose.createRemoteJWKSet(new URL(options.jwksUri));
        return (token) => jose.jwtVerify(token, jwks, verifyOptions);
    }
    if (options.publicKey) {
        const key = options.publicKey;
        return (token) => jose.jwtVerify(token, key, verifyOptions);
    }
    if (options.secret) {
        const key = new TextEncoder().encode(options.secret);
        const minBytes = getMinHmacKeyBytes(options.algorithms);
        if (key.byteLength < minBytes) {
            throw new Error(`@authgate/auth: HMAC secret must be at least ${minBytes} bytes (${minBytes * 8} bits) per RFC 7518. Got ${key.byteLength} bytes.`);
        }
        return (token) => jose.jwtVerify(token, key, verifyOptions);
    }
    throw new Error("@authgate/auth: session token verifier requires one of: jwksUri, secret, or publicKey");
}

/**
 * Map a jose failure to a session token failure kind.
 *
 * JWTExpired extends JWTClaimValidationFailed, so it is tested first.
 */
function toSessionTokenError(err: unknown): SessionTokenError {
    if (err instanceof jose.errors.JWTExpired) {
        return new SessionTokenError("expired", "Session token expired", { cause: err });
    }
    if (err instanceof jose.errors.JWSSignatureVerificationFailed) {
        return new SessionTokenError("signature", "Session token signature verification failed", { cause: err });
    }
    return new SessionTokenError("malformed", "Session token malformed", { cause: err });
}

/**
 * Turn a verified payload into claims. `jti`, `iat` and `exp` are required
 * claims, so jose has already checked their presence.
 */
function toVerifiedClaims(payload: jose.JWTPayload): VerifiedClaims {
    const { jti, iat, exp } = payload;
    if (typeof jti !== "string" || jti.length === 0 || typeof iat !== "number" || typeof exp !== "number") {
        throw new SessionTokenError("malformed", "Session token missing jti, iat or exp claim");
    }
    return {
        sessionId: jti,
        subject: payload.sub,
        issuer: payload.iss,
        issuedAt: new Date(iat * 1000),
        expiresAt: new Date(exp * 1000),
    };
}

/**
 * Create a session token verifier backed by jose.
 *
 * @param options - Key material and claim expectations
 * @returns Verifier rejecting with SessionTokenError ("expired", "signature" or "malformed")
 *
 * @example HMAC secret
 * ```typescript
 * const verifier = createJwtSessionVerifier({
 *   secret: process.env.AUTH_JWT_SECRET,
 *   issuer: 'build-api',
 * });
 * const claims = await verifier.verify(rawToken);
 * console.log(claims.sessionId);
 * ```
 */
export function createJwtSessionVerifier(options: JwtSessionVerifierOptions): SessionTokenVerifier {
    const verifyOptions: jose.JWTVerifyOptions = {
        requiredClaims: ["jti", "iat", "exp"],
    };
    if (options.issuer) {
        verifyOptions.issuer = options.issuer;
    }
    if (options.audience) {
        verifyOptions.audience = options.audience;
    }
    if (options.algorithms) {
        verifyOptions.algorithms = options.algorithms;
    }
    if (options.clockTolerance !== undefined) {
        verifyOptions.clockTolerance = options.clockTolerance;
    }

    const verify = buildVerify(options, verifyOptions);

    return {
        async verify(rawToken: string): Promise<VerifiedClaims> {
            let result: jose.JWTVerifyResult;
            try {
                result = await verify(rawToken);
            } catch (err) {
                throw toSessionTokenError(err);
            }
            return toVerifiedClaims(result.payload);
        },
    };
}
