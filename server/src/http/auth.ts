/**
 * auth.ts
 *
 * Login, registration and logout pages. Service error codes are mapped to
 * form errors; on success the session cookie is set and the user is sent on
 * to `next` (local paths only) or the start page.
 */

import type {FastifyInstance} from "fastify";
import {ZodError} from "zod";
import {loginUser, registerUser} from "../auth/service.js";
import {
    clearSessionCookie,
    getUserFromRequest,
    requireCsrf,
    requireUser,
    setSessionCookie,
    signedInUser,
} from "../auth/httpAuth.js";
import {renderLogin, renderRegister} from "../views/auth.js";
import {errorCode, formValues, sendPage, zodMessages} from "./pages.js";

/**
 * Only same-site absolute paths are accepted as redirect targets.
 */
export function safeNext(next: string | undefined): string {
    if (!next || !next.startsWith("/") || next.startsWith("//") || next.startsWith("/\\")) return "/";
    return next;
}

export async function registerAuthRoutes(app: FastifyInstance) {
    app.get("/login", async (req, reply) => {
        req.user = await getUserFromRequest(req);
        const next = safeNext(formValues(req.query)["next"]);
        if (req.user) return reply.redirect(next, 302);
        return sendPage(req, reply, {page: "login", title: "Log in", body: renderLogin({next})});
    });

    app.post("/login", async (req, reply) => {
        const values = formValues(req.body);
        const next = safeNext(values["next"]);
        try {
            const result = await loginUser(req.body);
            req.log.info({userId: result.user.id}, "user logged in");
            setSessionCookie(reply, result.token);
            return reply.redirect(next, 303);
        } catch (err) {
            let errors: string[];
            let status = 400;
            if (errorCode(err) === "INVALID_CREDENTIALS") {
                req.log.warn("login failed");
                errors = ["Invalid username/email or password."];
                status = 401;
            } else if (err instanceof ZodError) {
                errors = zodMessages(err);
            } else {
                throw err;
            }
            return sendPage(req, reply, {
                page: "login",
                title: "Log in",
                status,
                body: renderLogin({next, usernameOrEmail: values["usernameOrEmail"], errors}),
            });
        }
    });

    app.get("/register", async (req, reply) => {
        req.user = await getUserFromRequest(req);
        if (req.user) return reply.redirect("/", 302);
        return sendPage(req, reply, {page: "register", title: "Register", body: renderRegister({})});
    });

    app.post("/register", async (req, reply) => {
        const values = formValues(req.body);
        try {
            const result = await registerUser(req.body);
            req.log.info({userId: result.user.id}, "new user registered");
            setSessionCookie(reply, result.token);
            return reply.redirect("/", 303);
        } catch (err) {
            let errors: string[];
            let status = 400;
            if (errorCode(err) === "USERNAME_OR_EMAIL_TAKEN") {
                errors = ["Username or email already in use."];
                status = 409;
            } else if (err instanceof ZodError) {
                errors = zodMessages(err);
            } else {
                throw err;
            }
            return sendPage(req, reply, {
                page: "register",
                title: "Register",
                status,
                body: renderRegister({username: values["username"], email: values["email"], errors}),
            });
        }
    });

    app.post("/logout", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        req.log.info({userId: signedInUser(req).id}, "user logged out");
        clearSessionCookie(reply);
        return reply.redirect("/login", 303);
    });
}
