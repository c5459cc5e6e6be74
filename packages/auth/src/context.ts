/**
 * Request auth context storage
 *
 * Uses AsyncLocalStorage to make the gateway's decision available to
 * handlers without passing it through function parameters.
 *
 * @module context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { Code, ConnectError } from "@connectrpc/connect";
import type { ConsumerAuthContext, RequestAuthContext } from "./types.ts";

/**
 * Set by the gateway interceptor for the duration of the handler call.
 */
export const requestAuthStorage = new AsyncLocalStorage<RequestAuthContext>();

/**
 * Get the current request auth context.
 *
 * Returns undefined outside a request handled by the gateway interceptor.
 *
 * @example Usage in a service handler
 * ```typescript
 * import { getRequestAuthContext } from '@authgate/auth';
 *
 * const handler = {
 *   async listProjects() {
 *     const auth = getRequestAuthContext();
 *     if (auth?.grant === 'consumer') {
 *       return { projects: await db.projectsOf(auth.consumer.id) };
 *     }
 *     return { projects: [] };
 *   },
 * };
 * ```
 */
export function getRequestAuthContext(): RequestAuthContext | undefined {
    return requestAuthStorage.getStore();
}

/**
 * Get the authenticated consumer context or throw.
 *
 * @throws ConnectError with Code.Unauthenticated when the request was not
 *   authorized as a consumer (no context, static token, or anonymous)
 */
export function requireConsumer(): ConsumerAuthContext {
    const context = requestAuthStorage.getStore();
    if (context?.grant !== "consumer") {
        throw new ConnectError("Authentication required", Code.Unauthenticated);
    }
    return context;
}
