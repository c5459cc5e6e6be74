/**
 * Auth gateway
 *
 * Runs the whole authentication and authorization pipeline for one request:
 * static tokens, session token, anti-forgery guard, identity, authorization.
 * Returns a decision and the cookies to set; writing them is left to the
 * transport (see {@link applyResponseCookies}).
 *
 * @module gateway
 */

import { Code } from "@connectrpc/connect";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { authorize } from "./authz.ts";
import { cancelledError, throwIfCancelled, withSignal } from "./cancellation.ts";
import type { AuthGatewayError } from "./errors.ts";
import { AuthCancelledError, DenyReason, UnauthorizedError, isAuthGatewayError } from "./errors.ts";
import { IdentityResolver } from "./identity.ts";
import type { Logger } from "./logger.ts";
import { getLogger, toLogAttributes } from "./logger.ts";
import { authenticateSessionToken } from "./session-token.ts";
import { DEFAULT_WIRE_SETTINGS } from "./settings.ts";
import { checkStaticTokens } from "./static-token.ts";
import type {
    ConsumerStore,
    GatewayRequest,
    GatewayWireSettings,
    RequestAuthContext,
    ResponseCookie,
    RouteRequirements,
    SessionStore,
    SessionTokenVerifier,
    SharedCache,
} from "./types.ts";
import { PermissionLevel } from "./types.ts";
import { AntiForgeryGuard } from "./xsrf.ts";

/**
 * Result of {@link AuthGateway.authenticate}.
 *
 * On denial no context and no cookies are produced.
 */
export type AuthOutcome =
    | {
          readonly ok: true;
          readonly context: RequestAuthContext;
          readonly cookies: ReadonlyArray<ResponseCookie>;
      }
    | {
          readonly ok: false;
          readonly error: AuthGatewayError;
      };

export interface AuthGatewayOptions {
    readonly verifier: SessionTokenVerifier;
    readonly sessions: SessionStore;
    readonly consumers: ConsumerStore;
    /** Shared cache holding the current anti-forgery token of each session */
    readonly cache: SharedCache;
    /** Overrides of the default cookie/header names and token lifetime */
    readonly settings?: Partial<GatewayWireSettings> | undefined;
    /** Audit logger (default: OpenTelemetry logger named "auth-gateway") */
    readonly logger?: Logger | undefined;
    /** Clock, for tests */
    readonly now?: (() => Date) | undefined;
    /** Anti-forgery token generator, for tests */
    readonly generateXsrfToken?: (() => string) | undefined;
}

export interface AuthGateway {
    readonly settings: GatewayWireSettings;
    /**
     * Authenticate and authorize a request against a route's requirements.
     *
     * Never throws: every failure is returned as `{ ok: false, error }`.
     */
    authenticate(request: GatewayRequest, requirements: RouteRequirements): Promise<AuthOutcome>;
}

interface PipelineResult {
    readonly context: RequestAuthContext;
    readonly cookies: ReadonlyArray<ResponseCookie>;
}

const NO_COOKIES: ReadonlyArray<ResponseCookie> = [];

function toGatewayError(err: unknown, signal: AbortSignal | undefined): AuthGatewayError {
    if (isAuthGatewayError(err)) {
        return err;
    }
    if (signal?.aborted) {
        return cancelledError(signal, "pipeline");
    }
    const message = err instanceof Error ? err.message : String(err);
    return new UnauthorizedError(DenyReason.INTERNAL, "Unexpected error in auth pipeline", { error: message }, err);
}

/**
 * Create an auth gateway.
 *
 * @example
 * ```typescript
 * const gateway = createAuthGateway({
 *     verifier: createJwtSessionVerifier({ secret: process.env.AUTH_JWT_SECRET }),
 *     sessions,
 *     consumers,
 *     cache: new MemoryCache(),
 * });
 *
 * const outcome = await gateway.authenticate({ headers, signal }, {
 *     permission: PermissionLevel.WRITE,
 *     scopes: ['build:write'],
 * });
 * if (!outcome.ok) throw toClientError(outcome.error);
 * applyResponseCookies(responseHeaders, outcome.cookies);
 * ```
 */
export function createAuthGateway(options: AuthGatewayOptions): AuthGateway {
    const settings: GatewayWireSettings = { ...DEFAULT_WIRE_SETTINGS, ...options.settings };
    const logger = options.logger ?? getLogger("auth-gateway");
    const now = options.now ?? (() => new Date());
    const { verifier } = options;

    const resolver = new IdentityResolver({
        sessions: options.sessions,
        consumers: options.consumers,
        now,
    });
    const guard = new AntiForgeryGuard({
        cache: options.cache,
        ttlSeconds: settings.xsrfTokenTtl,
        generateToken: options.generateXsrfToken,
    });

    async function runPipeline(request: GatewayRequest, requirements: RouteRequirements): Promise<PipelineResult> {
        const { headers, signal } = request;
        throwIfCancelled(signal, "static-token");

        if (checkStaticTokens(requirements.allowedTokens ?? [], headers) === "granted") {
            return { context: await authorize({ staticTokenGranted: true }, requirements, signal), cookies: NO_COOKIES };
        }

        const token = await withSignal("session-token", signal, () => authenticateSessionToken(headers, settings.sessionCookie, verifier));
        if (token.status === "absent") {
            return { context: await authorize({ staticTokenGranted: false }, requirements, signal), cookies: NO_COOKIES };
        }

        const { claims, cookieBased } = token;
        const permission = requirements.permission ?? PermissionLevel.READ;
        const xsrf = cookieBased ? await guard.evaluate(claims.sessionId, permission, headers.get(settings.xsrfHeader), signal) : undefined;

        const { session, consumer } = await resolver.resolve(claims, signal);
        const context = await authorize({ staticTokenGranted: false, identity: { claims, session, consumer, cookieBased } }, requirements, signal);

        if (!xsrf) {
            return { context, cookies: NO_COOKIES };
        }

        throwIfCancelled(signal, "xsrf-store");
        await guard.commit(claims.sessionId, xsrf, signal);
        const cookie: ResponseCookie = {
            name: settings.xsrfCookie,
            value: xsrf.token,
            expires: new Date(now().getTime() + settings.xsrfTokenTtl * 1000),
            path: "/",
            secure: settings.secureCookies,
        };
        return { context, cookies: [cookie] };
    }

    function logDenial(error: AuthGatewayError): void {
        const attributes = {
            "auth.code": Code[error.code],
            "auth.message": error.rawMessage,
            ...toLogAttributes(error.serverDetails),
        };

        if (error instanceof AuthCancelledError) {
            logger.info("Auth pipeline cancelled", attributes);
        } else if (error.reason === DenyReason.STORE_ERROR || error.reason === DenyReason.INTERNAL) {
            logger.error("Request denied: auth pipeline failure", attributes);
        } else {
            logger.warn("Request denied", attributes);
        }
    }

    return {
        settings,

        authenticate(request, requirements) {
            const tracer = trace.getTracer("@authgate/auth");

            return tracer.startActiveSpan("auth.gateway", async (span): Promise<AuthOutcome> => {
                try {
                    const { context, cookies } = await runPipeline(request, requirements);
                    span.setAttribute("auth.grant", context.grant);
                    span.setStatus({ code: SpanStatusCode.OK });

                    logger.debug("Request authorized", {
                        "auth.grant": context.grant,
                        ...(context.grant === "consumer"
                            ? {
                                  "auth.consumer_id": context.consumer.id,
                                  "auth.session_id": context.session.id,
                                  "auth.cookie_based": context.cookieBased,
                              }
                            : {}),
                    });
                    return { ok: true, context, cookies };
                } catch (err) {
                    const error = toGatewayError(err, request.signal);
                    span.setAttribute("auth.denied", error.name);
                    span.setStatus({ code: SpanStatusCode.ERROR, message: error.rawMessage });
                    logDenial(error);
                    return { ok: false, error };
                } finally {
                    span.end();
                }
            });
        },
    };
}
