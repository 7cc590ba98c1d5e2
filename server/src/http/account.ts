/**
 * account.ts
 *
 * `GET/POST /account`: password change and account deletion, told apart
 * by the `password_change` / `delete_account` field of the submitted form.
 * `GET/POST /profile`: own profile settings, friends and pending requests.
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from "fastify";
import {ZodError} from "zod";
import {csrfTokenFor} from "../auth/csrf.js";
import {clearSessionCookie, requireCsrf, requireUser, signedInUser} from "../auth/httpAuth.js";
import {changePassword, deleteAccount} from "../auth/service.js";
import {findProfile, listFriendRequests, listFriends, updateProfile} from "../repositories/profiles.js";
import {profileSchema} from "../schemas/account.js";
import type {User} from "../tracker/types.js";
import {renderAccount, renderProfile, type ProfileView} from "../views/account.js";
import {errorCode, formValues, sendPage, zodMessages} from "./pages.js";

async function sendProfile(
    req: FastifyRequest,
    reply: FastifyReply,
    user: User,
    state: Pick<ProfileView, "errors" | "saved" | "values"> & {status?: number},
) {
    const [profile, friends, requests] = await Promise.all([
        findProfile(user.id),
        listFriends(user.id),
        listFriendRequests(user.id),
    ]);
    // Accounts created before profiles existed get the defaults
    const shown = profile ?? {userId: user.id, username: user.username, public: true, friendCode: null};
    return sendPage(req, reply, {
        page: "profile",
        title: "Profile",
        status: state.status,
        body: renderProfile({
            profile: shown,
            friends,
            pending: requests.filter((r) => r.toUserId === user.id && !r.accepted),
            csrfToken: csrfTokenFor(user.id),
            errors: state.errors,
            saved: state.saved,
            values: state.values,
        }),
    });
}

export async function registerAccountRoutes(app: FastifyInstance) {
    app.get("/account", {preHandler: requireUser}, async (req, reply) => {
        const user = signedInUser(req);
        return sendPage(req, reply, {page: "account", title: "Account", body: renderAccount({csrfToken: csrfTokenFor(user.id)})});
    });

    app.post("/account", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        const user = signedInUser(req);
        const values = formValues(req.body);
        const page = (status: number, view: {errors?: string[]; passwordChanged?: boolean}) =>
            sendPage(req, reply, {
                page: "account",
                title: "Account",
                status,
                body: renderAccount({csrfToken: csrfTokenFor(user.id), ...view}),
            });

        if ("delete_account" in values) {
            await deleteAccount(user.id);
            req.log.info({userId: user.id}, "account deleted");
            clearSessionCookie(reply);
            return reply.redirect("/login", 303);
        }
        if (!("password_change" in values)) {
            return page(400, {errors: ["Unknown account action."]});
        }
        try {
            await changePassword(user.id, req.body);
            req.log.info({userId: user.id}, "password changed");
            return page(200, {passwordChanged: true});
        } catch (err) {
            if (err instanceof ZodError) return page(400, {errors: zodMessages(err)});
            if (errorCode(err) === "INVALID_OLD_PASSWORD") {
                req.log.warn({userId: user.id}, "password change with wrong current password");
                return page(400, {errors: ["oldPassword: Your current password is incorrect."]});
            }
            throw err;
        }
    });

    app.get("/profile", {preHandler: requireUser}, async (req, reply) => {
        return sendProfile(req, reply, signedInUser(req), {});
    });

    app.post("/profile", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        const user = signedInUser(req);
        const values = formValues(req.body);
        try {
            const form = profileSchema.parse(req.body);
            await updateProfile(user.id, {public: form.public, friendCode: form.friend_code});
            req.log.info({userId: user.id, public: form.public}, "profile saved");
            return sendProfile(req, reply, user, {saved: true});
        } catch (err) {
            if (err instanceof ZodError) {
                return sendProfile(req, reply, user, {
                    errors: zodMessages(err),
                    values: {friendCode: values["friend_code"] ?? "", public: "public" in values},
                    status: 400,
                });
            }
            throw err;
        }
    });
}
