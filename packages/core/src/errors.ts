/**
 * Sanitizable error protocol
 *
 * Errors that carry server-side diagnostics (audit details, wrapped store
 * failures) while exposing only a safe message to the caller.
 *
 * @module errors
 */

import { Code, ConnectError } from "@connectrpc/connect";

/**
 * Sanitizable error interface.
 *
 * `clientMessage` is what the caller sees; `serverDetails` is for logs only.
 */
export interface SanitizableError {
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;
}

/**
 * Type guard for SanitizableError.
 *
 * Checks for a string clientMessage, a non-null serverDetails object and a
 * numeric code.
 */
export function isSanitizableError(err: unknown): err is Error & SanitizableError & { code: Code } {
    if (err == null || typeof err !== "object") return false;
    return (
        "clientMessage" in err &&
        typeof err.clientMessage === "string" &&
        "serverDetails" in err &&
        typeof err.serverDetails === "object" &&
        err.serverDetails !== null &&
        "code" in err &&
        typeof err.code === "number"
    );
}

/**
 * Convert any error into the ConnectError a caller is allowed to see.
 *
 * - SanitizableError: its client message and code, nothing else.
 * - ConnectError: its raw message and code, without metadata or details.
 * - Anything else: `Code.Internal` with a generic message.
 *
 * @param err - Error thrown somewhere below the transport boundary
 * @returns ConnectError safe to return to the caller
 *
 * @example
 * ```typescript
 * try {
 *   await handler(req);
 * } catch (err) {
 *   logger.warn("request failed", { error: String(err) });
 *   throw toClientError(err);
 * }
 * ```
 */
export function toClientError(err: unknown): ConnectError {
    if (isSanitizableError(err)) {
        return new ConnectError(err.clientMessage, err.code);
    }
    if (err instanceof ConnectError) {
        return new ConnectError(err.rawMessage, err.code);
    }
    return new ConnectError("Internal error", Code.Internal);
}
