/**
 * Scope matching
 *
 * @module scopes
 */

/**
 * Outcome of a scope match. A mismatch carries both sets for audit logs.
 */
export type ScopeMatch =
    | { readonly matched: true }
    | {
          readonly matched: false;
          readonly granted: ReadonlyArray<string>;
          readonly required: ReadonlyArray<string>;
      };

/**
 * Compare a consumer's granted scopes with a route's accepted scopes.
 *
 * - Empty `required`: the route imposes no restriction.
 * - Empty `granted`: the consumer holds a wildcard grant.
 * - Otherwise "any-of": at least one granted scope must be accepted by the route.
 *
 * @example
 * ```typescript
 * matchScopes(["build:read"], ["build:read", "build:write"]); // { matched: true }
 * matchScopes(["build:read"], ["build:write"]).matched;       // false
 * ```
 */
export function matchScopes(granted: ReadonlyArray<string>, required: ReadonlyArray<string>): ScopeMatch {
    if (granted.length === 0 || required.length === 0) {
        return { matched: true };
    }

    const accepted = new Set(required);
    if (granted.some((scope) => accepted.has(scope))) {
        return { matched: true };
    }

    return { matched: false, granted: [...granted], required: [...required] };
}
