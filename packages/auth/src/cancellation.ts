/**
 * Request cancellation helpers
 *
 * Bounds every stage of the pipeline by the ambient signal of the
 * enclosing request, and tells cancellation apart from store failures.
 *
 * @module cancellation
 */

import { AuthCancelledError, DenyReason, UnauthorizedError } from "./errors.ts";

/**
 * Whether an abort reason is a deadline rather than a cancellation.
 *
 * `AbortSignal.timeout()` aborts with a DOMException named "TimeoutError".
 */
function isTimeoutReason(reason: unknown): boolean {
    return reason instanceof Error && reason.name === "TimeoutError";
}

/**
 * Build the cancellation error for an aborted signal.
 */
export function cancelledError(signal: AbortSignal, stage: string): AuthCancelledError {
    return new AuthCancelledError(stage, isTimeoutReason(signal.reason), signal.reason);
}

/**
 * Throw AuthCancelledError if the signal has fired.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
        throw cancelledError(signal, stage);
    }
}

/**
 * Race an external call against the request signal.
 *
 * The call itself also receives the signal; this only guarantees the
 * pipeline stops waiting once the signal fires, even if the callee ignores it.
 *
 * @param stage - Pipeline stage name, reported on cancellation
 * @param signal - Ambient request signal
 * @param run - External call
 */
export async function withSignal<T>(stage: string, signal: AbortSignal | undefined, run: () => Promise<T>): Promise<T> {
    if (!signal) {
        return await run();
    }
    throwIfCancelled(signal, stage);

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
        onAbort = () => reject(cancelledError(signal, stage));
        signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
        return await Promise.race([run(), aborted]);
    } finally {
        if (onAbort) {
            signal.removeEventListener("abort", onAbort);
        }
    }
}

/**
 * Wrap a failed store or cache call. Cancellation is reported as such;
 * anything else becomes a denial that keeps the store error for the logs only.
 *
 * @param operation - Store operation, e.g. "loadSession"
 * @param id - Key or id the operation was called with
 */
export function storeFailure(err: unknown, operation: string, id: string, signal: AbortSignal | undefined): AuthCancelledError | UnauthorizedError {
    if (err instanceof AuthCancelledError) {
        return err;
    }
    if (signal?.aborted) {
        return cancelledError(signal, operation);
    }
    const message = err instanceof Error ? err.message : String(err);
    return new UnauthorizedError(DenyReason.STORE_ERROR, `${operation} failed`, { operation, id, storeError: message }, err);
}
