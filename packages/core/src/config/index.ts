/**
 * Configuration module
 *
 * Environment configuration for the auth gateway, validated with Zod.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig } from '@authgate/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`XSRF header: ${config.AUTH_XSRF_HEADER}`);
 * ```
 *
 * @module @authgate/core/config
 */

export {
    AuthEnvSchema,
    NodeEnvSchema,
    OptionalBooleanFromStringSchema,
    WireNameSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type AuthEnv,
} from "./envSchema.ts";
