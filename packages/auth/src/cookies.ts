/**
 * Cookie helpers
 *
 * Reads request cookies from the Cookie header and renders the
 * gateway's response cookies as Set-Cookie headers.
 *
 * @module cookies
 */

import { parse, serialize } from "hono/utils/cookie";
import type { ResponseCookie } from "./types.ts";

/**
 * Read a single cookie value from request headers.
 *
 * @returns The decoded value, or undefined when the cookie is absent or empty
 */
export function readCookie(headers: Headers, name: string): string | undefined {
    const header = headers.get("cookie");
    if (!header) {
        return undefined;
    }
    const value = parse(header, name)[name];
    return value ? value : undefined;
}

/**
 * Render a response cookie as a Set-Cookie header value.
 *
 * Gateway cookies are readable by scripts: the anti-forgery token has to be
 * echoed back by the page in a request header.
 */
export function serializeResponseCookie(cookie: ResponseCookie): string {
    return serialize(cookie.name, cookie.value, {
        path: cookie.path,
        expires: cookie.expires,
        secure: cookie.secure,
        httpOnly: false,
        sameSite: "Strict",
    });
}

/**
 * Append the gateway's cookies to a response header sink.
 *
 * This is the "apply" half of the gateway: `authenticate()` decides which
 * cookies to set, the transport calls this to write them.
 */
export function applyResponseCookies(headers: Headers, cookies: ReadonlyArray<ResponseCookie>): void {
    for (const cookie of cookies) {
        headers.append("set-cookie", serializeResponseCookie(cookie));
    }
}
