/**
 * Anti-forgery (XSRF) guard
 *
 * Double-submit protection for cookie-carried sessions. The current token
 * of each session lives in the shared cache; the browser receives it in a
 * readable cookie and echoes it in a request header on mutating calls.
 *
 * - Read requests never need the header. They reuse the cached token, or
 *   issue one when the session has none yet.
 * - Mutating requests must echo the cached token. Once accepted it is
 *   replaced by a fresh one, so each token authorizes a single mutation.
 *
 * Rotation is last-write-wins between concurrent requests of one session.
 *
 * @module xsrf
 */

import { randomBytes } from "node:crypto";
import { storeFailure, withSignal } from "./cancellation.ts";
import { DenyReason, UnauthorizedError } from "./errors.ts";
import { secretsEqual } from "./static-token.ts";
import type { SharedCache } from "./types.ts";
import { PermissionLevel } from "./types.ts";

/**
 * Token to hand back to the client, and whether it must be stored first.
 */
export interface XsrfDecision {
    readonly token: string;
    /** A new token that is not in the cache yet */
    readonly issued: boolean;
}

export interface AntiForgeryGuardOptions {
    readonly cache: SharedCache;
    /** Token lifetime in seconds */
    readonly ttlSeconds: number;
    /**
     * Cache key prefix, followed by the session id.
     * @default "session:xsrf:"
     */
    readonly keyPrefix?: string | undefined;
    /** Token generator, for tests */
    readonly generateToken?: (() => string) | undefined;
}

/**
 * Generate a cryptographically secure anti-forgery token
 */
export function generateXsrfToken(): string {
    return randomBytes(32).toString("base64url");
}

export class AntiForgeryGuard {
    readonly #cache: SharedCache;
    readonly #ttlSeconds: number;
    readonly #keyPrefix: string;
    readonly #generateToken: () => string;

    constructor(options: AntiForgeryGuardOptions) {
        this.#cache = options.cache;
        this.#ttlSeconds = options.ttlSeconds;
        this.#keyPrefix = options.keyPrefix ?? "session:xsrf:";
        this.#generateToken = options.generateToken ?? generateXsrfToken;
    }

    get ttlSeconds(): number {
        return this.#ttlSeconds;
    }

    /**
     * Cache key of a session's current token.
     */
    keyFor(sessionId: string): string {
        return `${this.#keyPrefix}${sessionId}`;
    }

    /**
     * Decide which token the response carries, enforcing the header on
     * mutating requests. Does not write to the cache.
     *
     * @param sessionId - Session of the cookie-carried token
     * @param permission - Minimum permission level of the route
     * @param presented - Value of the anti-forgery request header, if any
     * @throws UnauthorizedError when a mutating request lacks a matching token, or the cache fails
     */
    async evaluate(sessionId: string, permission: PermissionLevel, presented: string | null, signal?: AbortSignal): Promise<XsrfDecision> {
        const key = this.keyFor(sessionId);
        let current: string | undefined;
        try {
            current = await withSignal("xsrf-lookup", signal, () => this.#cache.get(key, { signal }));
        } catch (err) {
            throw storeFailure(err, "cacheGet", key, signal);
        }

        if (permission > PermissionLevel.READ) {
            if (!presented) {
                throw new UnauthorizedError(DenyReason.XSRF_MISSING, "Anti-forgery header missing", { sessionId });
            }
            if (current === undefined) {
                throw new UnauthorizedError(DenyReason.XSRF_UNKNOWN, "No anti-forgery token for session", { sessionId });
            }
            if (!secretsEqual(presented, current)) {
                throw new UnauthorizedError(DenyReason.XSRF_MISMATCH, "Anti-forgery token mismatch", { sessionId });
            }
            return { token: this.#generateToken(), issued: true };
        }

        if (current !== undefined) {
            return { token: current, issued: false };
        }
        return { token: this.#generateToken(), issued: true };
    }

    /**
     * Store an issued token as the session's current one, replacing the
     * previous token.
     */
    async commit(sessionId: string, decision: XsrfDecision, signal?: AbortSignal): Promise<void> {
        if (!decision.issued) {
            return;
        }
        const key = this.keyFor(sessionId);
        try {
            await withSignal("xsrf-store", signal, () => this.#cache.set(key, decision.token, this.#ttlSeconds, { signal }));
        } catch (err) {
            throw storeFailure(err, "cacheSet", key, signal);
        }
    }
}
