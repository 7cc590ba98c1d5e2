/**
 * friends.ts
 *
 * User search, friend requests and public profiles. Only public profiles
 * can be found, viewed or sent a request.
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from "fastify";
import {z} from "zod";
import {csrfTokenFor} from "../auth/csrf.js";
import {getUserFromRequest, requireCsrf, requireUser, signedInUser} from "../auth/httpAuth.js";
import {
    acceptFriendRequest,
    findPublicProfile,
    listFriendRequests,
    searchPublicProfiles,
    sendFriendRequest,
} from "../repositories/profiles.js";
import {idSchema} from "../schemas/collect.js";
import {friendStateOf, relationTo} from "../tracker/friends.js";
import {renderPublicProfile, renderUserSearch} from "../views/account.js";
import {renderNotFound} from "../views/errors.js";
import {safeNext} from "./auth.js";
import {searchQueryOf} from "./home.js";
import {formValues, sendPage} from "./pages.js";

const idParams = z.object({id: idSchema});

function notFound(req: FastifyRequest, reply: FastifyReply, what: string) {
    return sendPage(req, reply, {page: "not_found", title: "Not found", status: 404, body: renderNotFound(what)});
}

/**
 * Redirect target from the form's `next` field, or `fallback` without one.
 */
function nextOr(body: unknown, fallback: string): string {
    const next = formValues(body)["next"];
    return next ? safeNext(next) : fallback;
}

export async function registerFriendRoutes(app: FastifyInstance) {
    app.get("/users/search", {preHandler: requireUser}, async (req, reply) => {
        const user = signedInUser(req);
        const query = searchQueryOf(req.query);
        const [profiles, requests] = await Promise.all([
            query ? searchPublicProfiles(query, user.id) : Promise.resolve([]),
            listFriendRequests(user.id),
        ]);
        const state = friendStateOf(user.id, requests);
        return sendPage(req, reply, {
            page: "user_search",
            title: "Find users",
            body: renderUserSearch({
                query,
                results: profiles.map((profile) => ({profile, relation: relationTo(user.id, profile.userId, state)})),
                csrfToken: csrfTokenFor(user.id),
            }),
        });
    });

    app.post("/users/:id/friend-request", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        const user = signedInUser(req);
        const {id} = idParams.parse(req.params);
        const next = nextOr(req.body, "/users/search");
        if (id === user.id) return reply.redirect(next, 303);

        if (!(await sendFriendRequest(user.id, id))) return notFound(req, reply, "User");
        req.log.info({from: user.id, to: id}, "friend request sent");
        return reply.redirect(next, 303);
    });

    app.post("/friends/accept/:id", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        const user = signedInUser(req);
        const {id} = idParams.parse(req.params);
        const accepted = await acceptFriendRequest(id, user.id);
        if (!accepted) return notFound(req, reply, "Friend request");
        req.log.info({requestId: id, from: accepted.fromUserId, to: user.id}, "friend request accepted");
        return reply.redirect(nextOr(req.body, "/profile"), 303);
    });

    app.get<{Params: {username: string}}>("/profile/:username", async (req, reply) => {
        req.user = await getUserFromRequest(req);
        const profile = await findPublicProfile(req.params.username);
        if (!profile) return notFound(req, reply, "Profile");

        const viewer = req.user;
        const relation = viewer
            ? relationTo(viewer.id, profile.userId, friendStateOf(viewer.id, await listFriendRequests(viewer.id)))
            : null;
        return sendPage(req, reply, {
            page: "public_profile",
            title: profile.username,
            body: renderPublicProfile({profile, relation, csrfToken: viewer ? csrfTokenFor(viewer.id) : ""}),
        });
    });
}
