/**
 * Authorization decision
 *
 * Renders the final allow/deny for a request once every credential
 * mechanism has run. Denial is the default; only the last step allows.
 *
 * @module authz
 */

import { withSignal } from "./cancellation.ts";
import { AuthCancelledError, DenyReason, ForbiddenError, UnauthorizedError } from "./errors.ts";
import { matchScopes } from "./scopes.ts";
import type { ConsumerAuthContext, Consumer, RequestAuthContext, RouteRequirements } from "./types.ts";
import { PermissionLevel, UserRing } from "./types.ts";

/**
 * What the authentication stages established.
 */
export interface AuthorizationInput {
    /** A route static token matched */
    readonly staticTokenGranted: boolean;
    /** Verified token, session and consumer, when a token was presented */
    readonly identity?: Omit<ConsumerAuthContext, "grant"> | undefined;
}

/**
 * Whether the consumer's user is in the admin ring.
 */
export function isAdmin(consumer: Consumer): boolean {
    return consumer.user?.ring === UserRing.ADMIN;
}

/**
 * Decide whether a request may proceed.
 *
 * 1. A matched static token allows immediately.
 * 2. Required scopes must intersect the consumer's scopes.
 * 3. The route's permission check must pass.
 * 4. `needAuth` requires a consumer.
 * 5. `needAdmin` requires an admin consumer.
 *
 * @returns The request context to hand to the handler
 * @throws UnauthorizedError for scope mismatch or missing authentication
 * @throws ForbiddenError for a failed permission check or missing admin ring
 */
export async function authorize(input: AuthorizationInput, requirements: RouteRequirements, signal?: AbortSignal): Promise<RequestAuthContext> {
    if (input.staticTokenGranted) {
        return { grant: "static-token" };
    }

    const { identity } = input;
    const requiredScopes = requirements.scopes ?? [];
    const permission = requirements.permission ?? PermissionLevel.READ;
    const needAuth = requirements.needAuth ?? true;

    if (identity) {
        if (requiredScopes.length > 0) {
            const match = matchScopes(identity.consumer.scopes, requiredScopes);
            if (!match.matched) {
                throw new UnauthorizedError(DenyReason.SCOPE_MISMATCH, `Consumer scopes [${match.granted.join(", ")}] do not match [${match.required.join(", ")}]`, {
                    consumerId: identity.consumer.id,
                    grantedScopes: match.granted,
                    requiredScopes: match.required,
                });
            }
        }

        const { checkPermission } = requirements;
        if (checkPermission) {
            let allowed: boolean;
            try {
                allowed = await withSignal("permission-check", signal, async () => await checkPermission({ consumer: identity.consumer, session: identity.session, permission, signal }));
            } catch (err) {
                if (err instanceof AuthCancelledError) throw err;
                throw new UnauthorizedError(DenyReason.STORE_ERROR, "Permission check failed", { consumerId: identity.consumer.id, storeError: err instanceof Error ? err.message : String(err) }, err);
            }
            if (!allowed) {
                throw new ForbiddenError(DenyReason.PERMISSION_DENIED, "Permission check denied", {
                    consumerId: identity.consumer.id,
                    permission,
                });
            }
        }
    }

    if (needAuth && !identity) {
        throw new UnauthorizedError(DenyReason.AUTH_REQUIRED, "Authentication required");
    }

    if (requirements.needAdmin && !(identity && isAdmin(identity.consumer))) {
        throw new ForbiddenError(DenyReason.ADMIN_REQUIRED, "Admin ring required", {
            consumerId: identity?.consumer.id,
        });
    }

    return identity ? { grant: "consumer", ...identity } : { grant: "anonymous" };
}
