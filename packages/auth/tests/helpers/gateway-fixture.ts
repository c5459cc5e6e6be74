/**
 * Shared gateway setup for integration tests.
 *
 * One session ("session-1") owned by consumer "consumer-1", a deterministic
 * anti-forgery token sequence and a logger that records every call.
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { MemoryCache } from "../../src/cache.ts";
import { createAuthGateway } from "../../src/gateway.ts";
import { createJwtSessionVerifier } from "../../src/jwt-verifier.ts";
import type { Logger } from "../../src/logger.ts";
import { TEST_SESSION_SECRET, createMemoryIdentityStore, createTestSessionToken } from "../../src/testing/index.ts";
import type { Consumer, Session } from "../../src/types.ts";

export const FIXED_NOW = new Date("2026-03-01T12:00:00Z");

export const SESSION: Session = {
    id: "session-1",
    consumerId: "consumer-1",
    createdAt: new Date("2026-03-01T00:00:00Z"),
    expiresAt: new Date("2026-03-02T00:00:00Z"),
};

export const CONSUMER: Consumer = {
    id: "consumer-1",
    name: "web-console",
    scopes: ["build:read"],
    user: { id: "user-1", username: "alice", ring: "user" },
};

export interface LogEntry {
    level: "debug" | "info" | "warn" | "error";
    message: string;
    attributes: AnyValueMap;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    const record = (level: LogEntry["level"]) => (message: string, attributes: AnyValueMap = {}) => {
        entries.push({ level, message, attributes });
    };
    return {
        entries,
        debug: record("debug"),
        info: record("info"),
        warn: record("warn"),
        error: record("error"),
    };
}

export function createGatewayFixture(consumer: Consumer = CONSUMER) {
    const store = createMemoryIdentityStore({ sessions: [SESSION], consumers: [consumer] });
    const cache = new MemoryCache();
    const logger = createRecordingLogger();
    let counter = 0;

    const gateway = createAuthGateway({
        verifier: createJwtSessionVerifier({ secret: TEST_SESSION_SECRET }),
        sessions: store,
        consumers: store,
        cache,
        logger,
        now: () => FIXED_NOW,
        generateXsrfToken: () => `xsrf-${++counter}`,
        settings: { secureCookies: false },
    });

    return { gateway, store, cache, logger };
}

export async function sessionToken(sessionId = SESSION.id): Promise<string> {
    return await createTestSessionToken({ sessionId });
}

export async function cookieHeaders(extra: Record<string, string> = {}): Promise<Headers> {
    return new Headers({ cookie: `jwt_token=${await sessionToken()}`, ...extra });
}

export async function bearerHeaders(extra: Record<string, string> = {}): Promise<Headers> {
    return new Headers({ authorization: `Bearer ${await sessionToken()}`, ...extra });
}
