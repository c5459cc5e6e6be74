/**
 * Identity resolution
 *
 * Loads the session referenced by verified claims and the consumer owning
 * it. One store read each per request; caching belongs to the stores.
 *
 * @module identity
 */

import { storeFailure, withSignal } from "./cancellation.ts";
import { DenyReason, UnauthorizedError } from "./errors.ts";
import type { Consumer, ConsumerStore, Session, SessionStore, VerifiedClaims } from "./types.ts";

export interface ResolvedIdentity {
    readonly session: Session;
    readonly consumer: Consumer;
}

export interface IdentityResolverOptions {
    readonly sessions: SessionStore;
    readonly consumers: ConsumerStore;
    /** Clock, for tests */
    readonly now?: (() => Date) | undefined;
}

export class IdentityResolver {
    readonly #sessions: SessionStore;
    readonly #consumers: ConsumerStore;
    readonly #now: () => Date;

    constructor(options: IdentityResolverOptions) {
        this.#sessions = options.sessions;
        this.#consumers = options.consumers;
        this.#now = options.now ?? (() => new Date());
    }

    /**
     * Load session and consumer for verified claims.
     *
     * @throws UnauthorizedError when the session is missing or expired, the consumer is missing, or a store fails
     * @throws AuthCancelledError when the signal fires while waiting on a store
     */
    async resolve(claims: VerifiedClaims, signal?: AbortSignal): Promise<ResolvedIdentity> {
        const session = await this.#loadSession(claims.sessionId, signal);
        const consumer = await this.#loadConsumer(session.consumerId, signal);
        return { session, consumer };
    }

    async #loadSession(id: string, signal: AbortSignal | undefined): Promise<Session> {
        let session: Session | undefined;
        try {
            session = await withSignal("session-load", signal, () => this.#sessions.loadSession(id, { signal }));
        } catch (err) {
            throw storeFailure(err, "loadSession", id, signal);
        }

        if (!session) {
            throw new UnauthorizedError(DenyReason.SESSION_NOT_FOUND, "Session not found", { sessionId: id });
        }
        const expiresAt = session.expiresAt.getTime();
        // NaN (invalid date) never compares greater, so it counts as expired.
        if (!(expiresAt > this.#now().getTime())) {
            throw new UnauthorizedError(DenyReason.SESSION_EXPIRED, "Session expired", {
                sessionId: id,
                expiredAt: Number.isNaN(expiresAt) ? "invalid" : session.expiresAt.toISOString(),
            });
        }
        return session;
    }

    async #loadConsumer(id: string, signal: AbortSignal | undefined): Promise<Consumer> {
        let consumer: Consumer | undefined;
        try {
            consumer = await withSignal("consumer-load", signal, () => this.#consumers.loadConsumer(id, { withLinkedIdentity: true, signal }));
        } catch (err) {
            throw storeFailure(err, "loadConsumer", id, signal);
        }

        if (!consumer) {
            throw new UnauthorizedError(DenyReason.CONSUMER_NOT_FOUND, "Consumer not found", { consumerId: id });
        }
        return consumer;
    }
}
