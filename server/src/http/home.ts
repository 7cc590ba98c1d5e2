/**
 * home.ts
 *
 * `GET /` lists every set with its progress and runs the card search;
 * `POST /` collects or uncollects a search result and redirects back to the
 * same search.
 */

import type {FastifyInstance} from "fastify";
import {ZodError} from "zod";
import {requireCsrf, requireUser, signedInUser} from "../auth/httpAuth.js";
import {csrfTokenFor} from "../auth/csrf.js";
import {
    cardCountsByRarity,
    listRarities,
    listSetsNewestFirst,
    searchCards,
} from "../repositories/catalog.js";
import {collectedCountsByRarity, ownedCardIds} from "../repositories/collection.js";
import {collectSchema} from "../schemas/collect.js";
import {buildRarityGroups, computeSetProgress} from "../tracker/progress.js";
import {renderHome} from "../views/home.js";
import {renderNotFound} from "../views/errors.js";
import {applyCollectAction} from "./collect.js";
import {errorCode, sendPage} from "./pages.js";

const MAX_QUERY_LENGTH = 100;

export function searchQueryOf(query: unknown): string {
    if (typeof query !== "object" || query === null || !("q" in query)) return "";
    const q: unknown = query.q;
    return typeof q === "string" ? q.trim().slice(0, MAX_QUERY_LENGTH) : "";
}

export function homeRedirectUrl(q: string | undefined): string {
    return q ? `/?q=${encodeURIComponent(q)}` : "/";
}

export async function registerHomeRoutes(app: FastifyInstance) {
    app.get("/", {preHandler: requireUser}, async (req, reply) => {
        const user = signedInUser(req);
        const q = searchQueryOf(req.query);

        const [rarities, sets, totals, collected, results, owned] = await Promise.all([
            listRarities(),
            listSetsNewestFirst(),
            cardCountsByRarity(),
            collectedCountsByRarity(user.id),
            q ? searchCards(q) : Promise.resolve([]),
            ownedCardIds(user.id),
        ]);
        const groups = buildRarityGroups(rarities);

        return sendPage(req, reply, {
            page: "home",
            title: "Sets",
            body: renderHome({
                sets: sets.map((set) => ({set, progress: computeSetProgress(set.id, groups, totals, collected)})),
                searchQuery: q,
                searchResults: results,
                owned,
                rarities: new Map(rarities.map((r) => [r.name, r])),
                csrfToken: csrfTokenFor(user.id),
            }),
        });
    });

    app.post("/", {preHandler: [requireUser, requireCsrf]}, async (req, reply) => {
        const user = signedInUser(req);
        try {
            const form = collectSchema.parse(req.body);
            const result = await applyCollectAction(user.id, form.card_id, form.action);
            req.log.info({userId: user.id, cardId: result.card.id, collected: result.collected}, "collection changed");
            return reply.redirect(homeRedirectUrl(form.q), 303);
        } catch (err) {
            if (errorCode(err) === "CARD_NOT_FOUND") {
                return sendPage(req, reply, {page: "not_found", title: "Not found", status: 404, body: renderNotFound("Card")});
            }
            if (err instanceof ZodError) {
                req.log.warn({issues: err.issues}, "invalid collect form");
                return reply.code(400).send({ok: false, error: "VALIDATION_ERROR", issues: err.issues});
            }
            throw err;
        }
    });
}
