/**
 * Shared types for @authgate/auth
 *
 * @module types
 */

import type { KeyLike } from "jose";

/**
 * Minimum permission level a route demands.
 *
 * Ordered: READ < WRITE < ADMIN. Anything above READ is a mutating
 * operation and is subject to anti-forgery checks on cookie sessions.
 */
export const PermissionLevel = {
    READ: 1,
    WRITE: 2,
    ADMIN: 3,
} as const;

export type PermissionLevel = (typeof PermissionLevel)[keyof typeof PermissionLevel];

/**
 * Ring of an authenticated user. Only ADMIN satisfies `needAdmin`.
 */
export const UserRing = {
    ADMIN: "admin",
    MAINTAINER: "maintainer",
    USER: "user",
} as const;

export type UserRing = (typeof UserRing)[keyof typeof UserRing];

/**
 * Static shared-secret header a route accepts (e.g. a status probe token).
 */
export interface StaticToken {
    readonly header: string;
    readonly value: string;
}

/**
 * Input of a route-level permission check.
 */
export interface PermissionCheckInput {
    readonly consumer: Consumer;
    readonly session: Session;
    readonly permission: PermissionLevel;
    readonly signal?: AbortSignal | undefined;
}

/**
 * Route-level permission check. Resolves true when the consumer may access
 * the route's resource at the requested level.
 */
export type PermissionChecker = (input: PermissionCheckInput) => boolean | Promise<boolean>;

/**
 * Authentication and authorization requirements declared by a route.
 */
export interface RouteRequirements {
    /**
     * Static tokens; when non-empty every pair must match and a match
     * bypasses session and scope checks.
     */
    readonly allowedTokens?: ReadonlyArray<StaticToken> | undefined;
    /** Scopes accepted by the route ("any-of"); empty means unrestricted */
    readonly scopes?: ReadonlyArray<string> | undefined;
    /**
     * Minimum permission level.
     * @default PermissionLevel.READ
     */
    readonly permission?: PermissionLevel | undefined;
    /**
     * Deny requests without a resolved consumer.
     * @default true
     */
    readonly needAuth?: boolean | undefined;
    /**
     * Deny consumers whose user is not in the admin ring.
     * @default false
     */
    readonly needAdmin?: boolean | undefined;
    /** Route permission check, run once a consumer is resolved */
    readonly checkPermission?: PermissionChecker | undefined;
}

/**
 * Signature-checked payload of a session token.
 */
export interface VerifiedClaims {
    /** Session identifier (`jti`) */
    readonly sessionId: string;
    /** Token subject (`sub`), usually the consumer id */
    readonly subject?: string | undefined;
    /** Token issuer (`iss`) */
    readonly issuer?: string | undefined;
    readonly issuedAt: Date;
    readonly expiresAt: Date;
}

/**
 * Server-tracked session referenced by a session token.
 */
export interface Session {
    readonly id: string;
    readonly consumerId: string;
    readonly createdAt: Date;
    readonly expiresAt: Date;
}

/**
 * User behind a consumer.
 */
export interface AuthenticatedUser {
    readonly id: string;
    readonly username: string;
    readonly ring: UserRing;
}

/**
 * Identity bound to a session.
 */
export interface Consumer {
    readonly id: string;
    readonly name: string;
    /** Granted scopes; empty means unrestricted */
    readonly scopes: ReadonlyArray<string>;
    readonly user?: AuthenticatedUser | undefined;
    /** Linked identity data, present when loaded with `withLinkedIdentity` */
    readonly linkedIdentity?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Result of the pipeline for one authorized request.
 *
 * - `static-token`: a route static token matched; no identity is attached.
 * - `anonymous`: no credential, and the route does not require one.
 * - `consumer`: a verified token, its session and its consumer.
 */
export type RequestAuthContext =
    | { readonly grant: "static-token" }
    | { readonly grant: "anonymous" }
    | {
          readonly grant: "consumer";
          readonly claims: VerifiedClaims;
          readonly session: Session;
          readonly consumer: Consumer;
          /** Token came from the session cookie (anti-forgery applied) */
          readonly cookieBased: boolean;
      };

/**
 * Context with a resolved consumer.
 */
export type ConsumerAuthContext = Extract<RequestAuthContext, { grant: "consumer" }>;

/**
 * Options accepted by every external store and cache call.
 */
export interface CallOptions {
    readonly signal?: AbortSignal | undefined;
}

/**
 * Session store (external).
 */
export interface SessionStore {
    /** Resolves undefined when no session has this id */
    loadSession(id: string, options?: CallOptions): Promise<Session | undefined>;
}

/**
 * Consumer store (external).
 */
export interface ConsumerStore {
    /** Resolves undefined when no consumer has this id */
    loadConsumer(id: string, options: CallOptions & { readonly withLinkedIdentity: boolean }): Promise<Consumer | undefined>;
}

/**
 * Shared key/value cache (external) holding anti-forgery tokens.
 */
export interface SharedCache {
    /** Resolves undefined when the key is absent or expired */
    get(key: string, options?: CallOptions): Promise<string | undefined>;
    set(key: string, value: string, ttlSeconds: number, options?: CallOptions): Promise<void>;
}

/**
 * Session token verifier. Rejects with SessionTokenError on failure.
 */
export interface SessionTokenVerifier {
    verify(rawToken: string): Promise<VerifiedClaims>;
}

/**
 * Cookie the gateway wants set on the response.
 */
export interface ResponseCookie {
    readonly name: string;
    readonly value: string;
    readonly expires: Date;
    readonly path: string;
    readonly secure: boolean;
}

/**
 * Cookie and header names plus anti-forgery token lifetime.
 *
 * These names are part of the wire contract with browser clients.
 */
export interface GatewayWireSettings {
    readonly sessionCookie: string;
    readonly xsrfCookie: string;
    readonly xsrfHeader: string;
    /** Anti-forgery token lifetime in seconds */
    readonly xsrfTokenTtl: number;
    readonly secureCookies: boolean;
}

/**
 * Options for the JWT session token verifier
 */
export interface JwtSessionVerifierOptions {
    /** JWKS endpoint URL for remote key set */
    jwksUri?: string | undefined;
    /** HMAC symmetric secret (HS256/HS384/HS512) */
    secret?: string | undefined;
    /** Asymmetric public key (RSA, EC, EdDSA) */
    publicKey?: KeyLike | undefined;
    /** Expected issuer(s) */
    issuer?: string | string[] | undefined;
    /** Expected audience(s) */
    audience?: string | string[] | undefined;
    /** Allowed algorithms */
    algorithms?: string[] | undefined;
    /**
     * Tolerated clock skew.
     * Number (seconds) or string (e.g., "30s").
     */
    clockTolerance?: number | string | undefined;
}

/**
 * Incoming request as seen by the gateway.
 */
export interface GatewayRequest {
    readonly headers: Headers;
    /** Ambient cancellation/deadline signal of the enclosing request */
    readonly signal?: AbortSignal | undefined;
}

/**
 * Route rule for the gateway interceptor.
 */
export interface RouteAuthRule {
    /** Rule name for logging */
    readonly name: string;
    /** Method patterns: "*", "Service/*" or "Service/Method" */
    readonly methods: ReadonlyArray<string>;
    readonly requirements: RouteRequirements;
}
