/**
 * csrf.ts
 *
 * Per-user CSRF token: an HMAC of the user id under the session secret.
 * Pages embed it; state-changing requests echo it back in the
 * `X-CSRF-Token` header or the `csrf` form field.
 */

import {createHmac, timingSafeEqual} from "node:crypto";
import {getConfig} from "../config.js";

export const CSRF_HEADER = "x-csrf-token";
export const CSRF_FIELD = "csrf";

export function csrfTokenFor(userId: number): string {
    return createHmac("sha256", getConfig().JWT_SECRET).update(`csrf:${userId}`).digest("hex");
}

export function isValidCsrfToken(userId: number, token: string | undefined): boolean {
    if (!token) return false;
    const expected = Buffer.from(csrfTokenFor(userId));
    const given = Buffer.from(token);
    return given.length === expected.length && timingSafeEqual(given, expected);
}
