/**
 * setDetail.ts
 *
 * Set page routes:
 * - `GET /set/:number` renders the page, or only the rarity progress block
 *   when `?fragment=rarity_progress` is given
 * - `POST /set/:number` collects or uncollects a card; XHR callers get JSON,
 *   plain form posts are redirected back to the page
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from "fastify";
import {ZodError} from "zod";
import {type CollectResponse, RARITY_PROGRESS_FRAGMENT} from "../../../shared/types/collection.js";
import {requireCsrf, requireUser, signedInUser} from "../auth/httpAuth.js";
import {cardCountsByRarity, findSetByNumber, listCardsInSet, listRarities} from "../repositories/catalog.js";
import {collectedCountsByRarity, ownedCardIds} from "../repositories/collection.js";
import {collectSchema} from "../schemas/collect.js";
import {buildRarityGroups, computeSetProgress} from "../tracker/progress.js";
import type {CardSet} from "../tracker/types.js";
import {renderNotFound} from "../views/errors.js";
import {renderRarityProgress, renderSetDetail} from "../views/setDetail.js";
import {applyCollectAction} from "./collect.js";
import {errorCode, isXhr, sendPage} from "./pages.js";

type SetParams = {number: string};
type SetQuery = {fragment?: string};

export function setUrl(set: Pick<CardSet, "number">): string {
    return `/set/${encodeURIComponent(set.number)}`;
}

async function progressOf(setId: number, userId: number) {
    const [rarities, totals, collected] = await Promise.all([
        listRarities(),
        cardCountsByRarity([setId]),
        collectedCountsByRarity(userId, [setId]),
    ]);
    return {
        rarities: new Map(rarities.map((r) => [r.name, r])),
        progress: computeSetProgress(setId, buildRarityGroups(rarities), totals, collected),
    };
}

function notFound(req: FastifyRequest, reply: FastifyReply, what: string) {
    if (isXhr(req)) {
        return reply.code(404).send({status: "error", error: `${what.toUpperCase()}_NOT_FOUND`});
    }
    return sendPage(req, reply, {page: "not_found", title: "Not found", status: 404, body: renderNotFound(what)});
}

export async function registerSetDetailRoutes(app: FastifyInstance) {
    app.get<{Params: SetParams; Querystring: SetQuery}>(
        "/set/:number",
        {preHandler: requireUser},
        async (req, reply) => {
            const user = signedInUser(req);
            const set = await findSetByNumber(req.params.number);
            if (!set) return notFound(req, reply, "Set");

            if (req.query.fragment === RARITY_PROGRESS_FRAGMENT) {
                const {progress, rarities} = await progressOf(set.id, user.id);
                return reply.type("text/html; charset=utf-8").send(renderRarityProgress(progress, rarities).value);
            }

            const [cards, owned, {progress, rarities}] = await Promise.all([
                listCardsInSet(set.id),
                ownedCardIds(user.id),
                progressOf(set.id, user.id),
            ]);
            return sendPage(req, reply, {
                page: "set_detail",
                title: set.name,
                body: renderSetDetail({set, cards, owned, rarities, progress}),
            });
        },
    );

    app.post<{Params: SetParams}>(
        "/set/:number",
        {preHandler: [requireUser, requireCsrf]},
        async (req, reply) => {
            const user = signedInUser(req);
            const set = await findSetByNumber(req.params.number);
            if (!set) return notFound(req, reply, "Set");

            try {
                const form = collectSchema.parse(req.body);
                const result = await applyCollectAction(user.id, form.card_id, form.action);
                req.log.info({userId: user.id, cardId: result.card.id, collected: result.collected}, "collection changed");

                if (isXhr(req)) {
                    const body: CollectResponse = {status: "success", collected: result.collected};
                    return reply.send(body);
                }
                return reply.redirect(setUrl(set), 303);
            } catch (err) {
                if (errorCode(err) === "CARD_NOT_FOUND") return notFound(req, reply, "Card");
                if (err instanceof ZodError) {
                    req.log.warn({issues: err.issues}, "invalid collect form");
                    return reply.code(400).send({status: "error", error: "VALIDATION_ERROR", issues: err.issues});
                }
                throw err;
            }
        },
    );
}
