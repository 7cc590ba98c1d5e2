/**
 * httpAuth.ts
 *
 * Resolves the signed-in user from the `session` cookie and provides the
 * pre-handlers that guard pages: `requireUser` redirects anonymous visitors
 * to the login page, `requireAdmin` answers 403 for non-admins, and
 * `requireCsrf` rejects POSTs without a valid token.
 */

import type {FastifyReply, FastifyRequest} from "fastify";
import {verifySessionToken} from "./jwt.js";
import {CSRF_FIELD, CSRF_HEADER, isValidCsrfToken} from "./csrf.js";
import {findUserById} from "../repositories/users.js";
import type {User} from "../tracker/types.js";
import {getConfig} from "../config.js";

export const SESSION_COOKIE = "session";
const SESSION_MAX_AGE_SECONDS = 7 * 24 * 60 * 60;

declare module "fastify" {
    interface FastifyRequest {
        user: User | null;
    }
}

/**
 * Read and verify the session cookie and load the user. Returns `null`
 * when the cookie is missing, the token is invalid or the user is gone.
 */
export async function getUserFromRequest(req: FastifyRequest): Promise<User | null> {
    const token = req.cookies[SESSION_COOKIE];
    if (!token) return null;
    try {
        const payload = verifySessionToken(token);
        return await findUserById(payload.userId);
    } catch (err) {
        req.log.debug({err}, "session cookie rejected");
        return null;
    }
}

export function setSessionCookie(reply: FastifyReply, token: string) {
    reply.setCookie(SESSION_COOKIE, token, {
        path: "/",
        httpOnly: true,
        sameSite: "lax",
        secure: getConfig().COOKIE_SECURE,
        maxAge: SESSION_MAX_AGE_SECONDS,
    });
}

export function clearSessionCookie(reply: FastifyReply) {
    reply.clearCookie(SESSION_COOKIE, {path: "/"});
}

export function loginRedirectUrl(req: FastifyRequest): string {
    return `/login?next=${encodeURIComponent(req.url)}`;
}

/**
 * The user resolved by `requireUser`/`requireAdmin`.
 */
export function signedInUser(req: FastifyRequest): User {
    if (!req.user) throw new Error("NOT_SIGNED_IN");
    return req.user;
}

export async function requireUser(req: FastifyRequest, reply: FastifyReply) {
    req.user = await getUserFromRequest(req);
    if (!req.user) {
        return reply.redirect(loginRedirectUrl(req), 302);
    }
}

export async function requireAdmin(req: FastifyRequest, reply: FastifyReply) {
    req.user = await getUserFromRequest(req);
    if (!req.user) {
        return reply.redirect(loginRedirectUrl(req), 302);
    }
    if (!req.user.isAdmin) {
        req.log.warn({userId: req.user.id, url: req.url}, "non-admin access to admin page");
        return reply.code(403).type("text/plain").send("Forbidden");
    }
}

function csrfFromBody(body: unknown): string | undefined {
    if (typeof body !== "object" || body === null || !(CSRF_FIELD in body)) return undefined;
    const value: unknown = body[CSRF_FIELD];
    return typeof value === "string" ? value : undefined;
}

/**
 * Must run after `requireUser`/`requireAdmin`.
 */
export async function requireCsrf(req: FastifyRequest, reply: FastifyReply) {
    if (!req.user) return;
    const header = req.headers[CSRF_HEADER];
    const token = typeof header === "string" ? header : csrfFromBody(req.body);
    if (!isValidCsrfToken(req.user.id, token)) {
        req.log.warn({userId: req.user.id, url: req.url}, "csrf token rejected");
        return reply.code(403).type("text/plain").send("CSRF token missing or invalid");
    }
}
