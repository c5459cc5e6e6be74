/**
 * Auth gateway interceptor
 *
 * Puts an {@link AuthGateway} in front of ConnectRPC handlers.
 *
 * @module gateway-interceptor
 */

import type { Interceptor, StreamRequest, UnaryRequest } from "@connectrpc/connect";
import { ConnectError } from "@connectrpc/connect";
import { toClientError } from "@authgate/core";
import { requestAuthStorage } from "./context.ts";
import { applyResponseCookies } from "./cookies.ts";
import type { AuthGateway } from "./gateway.ts";
import type { Logger } from "./logger.ts";
import { getLogger } from "./logger.ts";
import { findRouteRule } from "./method-match.ts";
import type { RouteAuthRule, RouteRequirements } from "./types.ts";

export interface AuthGatewayInterceptorOptions {
    readonly gateway: AuthGateway;
    /** Per-method requirements; the first matching rule applies */
    readonly routes?: ReadonlyArray<RouteAuthRule> | undefined;
    /**
     * Requirements of methods no rule matches.
     * @default { needAuth: true }
     */
    readonly defaultRequirements?: RouteRequirements | undefined;
    readonly logger?: Logger | undefined;
}

/**
 * Create the gateway interceptor.
 *
 * Denied requests fail with the client-safe error only (`Unauthorized`,
 * `Forbidden`, or the cancellation message). Allowed requests run with the
 * auth context available through {@link getRequestAuthContext}, and the
 * gateway's cookies are appended to the response headers, or to the error
 * metadata when the handler fails.
 *
 * @example
 * ```typescript
 * const interceptor = createAuthGatewayInterceptor({
 *     gateway,
 *     routes: [
 *         { name: 'health', methods: ['grpc.health.v1.Health/*'], requirements: { needAuth: false } },
 *         { name: 'admin', methods: ['admin.v1.AdminService/*'], requirements: { needAdmin: true, permission: PermissionLevel.ADMIN } },
 *     ],
 * });
 * ```
 */
export function createAuthGatewayInterceptor(options: AuthGatewayInterceptorOptions): Interceptor {
    const { gateway, routes = [], defaultRequirements = { needAuth: true } } = options;
    const logger = options.logger ?? getLogger("auth-gateway-interceptor");

    return (next) => async (req: UnaryRequest | StreamRequest) => {
        const serviceName: string = req.service.typeName;
        const methodName: string = req.method.name;

        const rule = findRouteRule(serviceName, methodName, routes);
        const requirements = rule?.requirements ?? defaultRequirements;

        const outcome = await gateway.authenticate({ headers: req.header, signal: req.signal }, requirements);
        if (!outcome.ok) {
            logger.debug("Rejecting call", {
                "rpc.service": serviceName,
                "rpc.method": methodName,
                "auth.rule": rule?.name ?? "default",
            });
            throw toClientError(outcome.error);
        }

        try {
            const res = await requestAuthStorage.run(outcome.context, () => next(req));
            applyResponseCookies(res.header, outcome.cookies);
            return res;
        } catch (err) {
            // A rotated anti-forgery token is already stored; the client must receive it.
            const error = ConnectError.from(err);
            applyResponseCookies(error.metadata, outcome.cookies);
            throw error;
        }
    };
}
