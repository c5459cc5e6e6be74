/**
 * Environment configuration validation with Zod
 *
 * Type-safe gateway configuration from environment variables.
 *
 * @module @authgate/core/config
 */

import { z } from "zod";

/**
 * Node environment schema
 */
export const NodeEnvSchema = z.enum(["development", "production", "test"]).default("development");

/**
 * Boolean from string schema (for ENV variables), undefined when unset
 */
export const OptionalBooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === "true" || v === "1" || v === "yes"));

/**
 * Cookie or header name: RFC 7230 token characters only
 */
export const WireNameSchema = z.string().regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, "must be a valid cookie/header name");

/**
 * Gateway environment configuration schema
 *
 * @example
 * ```typescript
 * const config = AuthEnvSchema.parse(process.env);
 * console.log(config.AUTH_SESSION_COOKIE); // 'jwt_token' (default)
 * ```
 */
export const AuthEnvSchema = z.object({
    /**
     * Cookie carrying the signed session token
     * @default 'jwt_token'
     */
    AUTH_SESSION_COOKIE: WireNameSchema.default("jwt_token"),

    /**
     * Response cookie carrying the anti-forgery token
     * @default 'xsrf_token'
     */
    AUTH_XSRF_COOKIE: WireNameSchema.default("xsrf_token"),

    /**
     * Request header echoing the anti-forgery token
     * @default 'X-XSRF-TOKEN'
     */
    AUTH_XSRF_HEADER: WireNameSchema.default("X-XSRF-TOKEN"),

    /**
     * Anti-forgery token lifetime in seconds (cache TTL and cookie expiry)
     * @default 604800 (7 days)
     */
    AUTH_XSRF_TOKEN_TTL: z.coerce
        .number()
        .int()
        .min(60)
        .max(60 * 60 * 24 * 30)
        .default(60 * 60 * 24 * 7),

    /**
     * Mark gateway cookies Secure. Defaults to true in production.
     */
    AUTH_COOKIE_SECURE: OptionalBooleanFromStringSchema,

    /**
     * HMAC secret for session token verification (HS256, >= 32 bytes)
     */
    AUTH_JWT_SECRET: z.string().min(32).optional(),

    /**
     * Expected session token issuer
     */
    AUTH_JWT_ISSUER: z.string().min(1).optional(),

    /**
     * JWKS endpoint for asymmetric session tokens
     */
    AUTH_JWKS_URI: z.string().url().optional(),

    /**
     * Node environment
     * @default 'development'
     */
    NODE_ENV: NodeEnvSchema,
});

/**
 * Gateway environment configuration type
 */
export type AuthEnv = z.infer<typeof AuthEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @throws ZodError when a variable is present but invalid
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ AUTH_XSRF_TOKEN_TTL: '3600' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): AuthEnv {
    return AuthEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return AuthEnvSchema.safeParse(env);
}
