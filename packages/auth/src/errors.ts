/**
 * Auth gateway error types
 *
 * Every denial carries a machine-readable reason and server-side details
 * for audit logging, while exposing only the error kind to the caller
 * via the SanitizableError protocol.
 *
 * @module errors
 */

import type { SanitizableError } from "@authgate/core";
import { Code, ConnectError } from "@connectrpc/connect";

/**
 * Why a request was denied.
 */
export const DenyReason = {
    STATIC_TOKEN_MISMATCH: "static_token_mismatch",
    TOKEN_MALFORMED: "token_malformed",
    TOKEN_SIGNATURE: "token_signature",
    TOKEN_EXPIRED: "token_expired",
    XSRF_MISSING: "xsrf_missing",
    XSRF_UNKNOWN: "xsrf_unknown",
    XSRF_MISMATCH: "xsrf_mismatch",
    SESSION_NOT_FOUND: "session_not_found",
    SESSION_EXPIRED: "session_expired",
    CONSUMER_NOT_FOUND: "consumer_not_found",
    STORE_ERROR: "store_error",
    SCOPE_MISMATCH: "scope_mismatch",
    PERMISSION_DENIED: "permission_denied",
    AUTH_REQUIRED: "auth_required",
    ADMIN_REQUIRED: "admin_required",
    INTERNAL: "internal",
} as const;

export type DenyReason = (typeof DenyReason)[keyof typeof DenyReason];

/**
 * Reasons that mean "identity known but insufficient".
 */
export type ForbiddenReason = typeof DenyReason.PERMISSION_DENIED | typeof DenyReason.ADMIN_REQUIRED;

/**
 * Reasons that mean "no or invalid credential".
 */
export type UnauthorizedReason = Exclude<DenyReason, ForbiddenReason>;

/**
 * Missing, invalid or unresolvable credential.
 *
 * Maps to `Code.Unauthenticated`; the caller only sees "Unauthorized".
 */
export class UnauthorizedError extends ConnectError implements SanitizableError {
    readonly clientMessage = "Unauthorized";
    readonly reason: UnauthorizedReason;
    readonly details: Readonly<Record<string, unknown>>;

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { reason: this.reason, ...this.details };
    }

    constructor(reason: UnauthorizedReason, message: string, details: Readonly<Record<string, unknown>> = {}, cause?: unknown) {
        super(message, Code.Unauthenticated, undefined, undefined, cause);
        this.name = "UnauthorizedError";
        this.reason = reason;
        this.details = details;
    }
}

/**
 * Identity resolved but not allowed.
 *
 * Maps to `Code.PermissionDenied`; the caller only sees "Forbidden".
 */
export class ForbiddenError extends ConnectError implements SanitizableError {
    readonly clientMessage = "Forbidden";
    readonly reason: ForbiddenReason;
    readonly details: Readonly<Record<string, unknown>>;

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { reason: this.reason, ...this.details };
    }

    constructor(reason: ForbiddenReason, message: string, details: Readonly<Record<string, unknown>> = {}) {
        super(message, Code.PermissionDenied);
        this.name = "ForbiddenError";
        this.reason = reason;
        this.details = details;
    }
}

/**
 * The enclosing request was cancelled or hit its deadline mid-pipeline.
 *
 * Not an authorization decision.
 */
export class AuthCancelledError extends ConnectError implements SanitizableError {
    readonly clientMessage: string;
    readonly stage: string;

    get serverDetails(): Readonly<Record<string, unknown>> {
        return { stage: this.stage };
    }

    constructor(stage: string, timedOut: boolean, cause?: unknown) {
        const clientMessage = timedOut ? "Request timed out" : "Request cancelled";
        super(`${clientMessage} during ${stage}`, timedOut ? Code.DeadlineExceeded : Code.Canceled, undefined, undefined, cause);
        this.name = "AuthCancelledError";
        this.clientMessage = clientMessage;
        this.stage = stage;
    }
}

/**
 * Terminal error of the gateway pipeline.
 */
export type AuthGatewayError = UnauthorizedError | ForbiddenError | AuthCancelledError;

/**
 * Session token verification failure kind.
 */
export type SessionTokenErrorKind = "expired" | "malformed" | "signature";

/**
 * Raised by a SessionTokenVerifier.
 */
export class SessionTokenError extends Error {
    readonly kind: SessionTokenErrorKind;

    constructor(kind: SessionTokenErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SessionTokenError";
        this.kind = kind;
    }
}

/**
 * Check whether an error is one of the gateway's terminal errors.
 */
export function isAuthGatewayError(err: unknown): err is AuthGatewayError {
    return err instanceof UnauthorizedError || err instanceof ForbiddenError || err instanceof AuthCancelledError;
}
