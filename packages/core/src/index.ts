/**
 * @authgate/core
 *
 * Shared building blocks for the auth gateway packages:
 * - SanitizableError protocol and client-safe error conversion
 * - Environment configuration (12-Factor App)
 *
 * @module @authgate/core
 */

export type { SanitizableError } from "./errors.ts";
export { isSanitizableError, toClientError } from "./errors.ts";

export {
    AuthEnvSchema,
    NodeEnvSchema,
    OptionalBooleanFromStringSchema,
    WireNameSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type AuthEnv,
} from "./config/index.ts";
