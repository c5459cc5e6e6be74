/**
 * Method pattern matching
 *
 * Resolves which route rule applies to an RPC method.
 *
 * @module method-match
 */

import type { RouteAuthRule } from "./types.ts";

/**
 * Check if a method matches any of the given patterns.
 *
 * Patterns:
 * - "*" matches all methods
 * - "Service/*" matches all methods of a service
 * - "Service/Method" matches one method
 *
 * @param serviceName - Fully-qualified service name (e.g., "project.v1.ProjectService")
 * @param methodName - Method name (e.g., "UpdateProject")
 */
export function matchesMethodPattern(serviceName: string, methodName: string, patterns: readonly string[]): boolean {
    const fullMethod = `${serviceName}/${methodName}`;

    for (const pattern of patterns) {
        if (pattern === "*" || pattern === fullMethod) {
            return true;
        }
        if (pattern.endsWith("/*") && serviceName === pattern.slice(0, -2)) {
            return true;
        }
    }

    return false;
}

/**
 * Find the first rule whose patterns match the method.
 *
 * Rules are evaluated in order; put specific rules before wildcards.
 */
export function findRouteRule(serviceName: string, methodName: string, rules: readonly RouteAuthRule[]): RouteAuthRule | undefined {
    return rules.find((rule) => matchesMethodPattern(serviceName, methodName, rule.methods));
}
