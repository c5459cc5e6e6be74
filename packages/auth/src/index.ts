/**
 * @authgate/auth
 *
 * Request authentication and authorization gateway.
 *
 * - createAuthGateway(): static tokens, session tokens, anti-forgery guard,
 *   identity resolution and authorization in one pipeline
 * - createAuthGatewayInterceptor(): the gateway in front of ConnectRPC handlers
 * - createJwtSessionVerifier(): session token verification with jose
 *
 * Plus context propagation via AsyncLocalStorage.
 *
 * @module @authgate/auth
 */

// Gateway
export type { AuthGateway, AuthGatewayOptions, AuthOutcome } from "./gateway.ts";
export { createAuthGateway } from "./gateway.ts";
export type { AuthGatewayInterceptorOptions } from "./gateway-interceptor.ts";
export { createAuthGatewayInterceptor } from "./gateway-interceptor.ts";

// Pipeline stages
export type { AuthorizationInput } from "./authz.ts";
export { authorize, isAdmin } from "./authz.ts";
export type { ResolvedIdentity, IdentityResolverOptions } from "./identity.ts";
export { IdentityResolver } from "./identity.ts";
export { createJwtSessionVerifier } from "./jwt-verifier.ts";
export type { ScopeMatch } from "./scopes.ts";
export { matchScopes } from "./scopes.ts";
export type { ExtractedSessionToken, SessionTokenResult } from "./session-token.ts";
export { authenticateSessionToken, extractSessionToken } from "./session-token.ts";
export type { StaticTokenResult } from "./static-token.ts";
export { checkStaticTokens, parseStaticToken, secretsEqual } from "./static-token.ts";
export type { AntiForgeryGuardOptions, XsrfDecision } from "./xsrf.ts";
export { AntiForgeryGuard, generateXsrfToken } from "./xsrf.ts";

// Cache
export type { MemoryCacheOptions } from "./cache.ts";
export { MemoryCache } from "./cache.ts";

// Context management
export { getRequestAuthContext, requestAuthStorage, requireConsumer } from "./context.ts";

// Cookies
export { applyResponseCookies, readCookie, serializeResponseCookie } from "./cookies.ts";

// Errors
export type { AuthGatewayError, ForbiddenReason, SessionTokenErrorKind, UnauthorizedReason } from "./errors.ts";
export { AuthCancelledError, DenyReason, ForbiddenError, SessionTokenError, UnauthorizedError, isAuthGatewayError } from "./errors.ts";

// Logging
export type { Logger } from "./logger.ts";
export { getLogger } from "./logger.ts";

// Method pattern matching
export { findRouteRule, matchesMethodPattern } from "./method-match.ts";

// Settings
export type { GatewaySettings } from "./settings.ts";
export { DEFAULT_WIRE_SETTINGS, loadGatewaySettings } from "./settings.ts";

// Types and constants
export type {
    AuthenticatedUser,
    CallOptions,
    Consumer,
    ConsumerAuthContext,
    ConsumerStore,
    GatewayRequest,
    GatewayWireSettings,
    JwtSessionVerifierOptions,
    PermissionCheckInput,
    PermissionChecker,
    RequestAuthContext,
    ResponseCookie,
    RouteAuthRule,
    RouteRequirements,
    Session,
    SessionStore,
    SessionTokenVerifier,
    SharedCache,
    StaticToken,
    VerifiedClaims,
} from "./types.ts";
export { PermissionLevel, UserRing } from "./types.ts";
