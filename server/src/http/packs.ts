/**
 * packs.ts
 *
 * `GET /packs`: every pack of an available set with the chance of pulling a
 * card the user does not own yet.
 */

import type {FastifyInstance} from "fastify";
import {requireUser, signedInUser} from "../auth/httpAuth.js";
import {cardCountsByRarity, listAvailablePacks} from "../repositories/catalog.js";
import {ownedCardIds} from "../repositories/collection.js";
import {listPackTypes, listRarityProbabilities} from "../repositories/probabilities.js";
import {buildPackList} from "../tracker/odds.js";
import {isoDate, type RarityCount} from "../tracker/types.js";
import {renderPacks} from "../views/packs.js";
import {sendPage} from "./pages.js";

export function rarityCountsBySet(counts: RarityCount[]): Map<number, Map<string, number>> {
    const bySet = new Map<number, Map<string, number>>();
    for (const c of counts) {
        let rarities = bySet.get(c.setId);
        if (!rarities) {
            rarities = new Map();
            bySet.set(c.setId, rarities);
        }
        rarities.set(c.rarity, (rarities.get(c.rarity) ?? 0) + c.count);
    }
    return bySet;
}

export async function registerPackRoutes(app: FastifyInstance) {
    app.get("/packs", {preHandler: requireUser}, async (req, reply) => {
        const user = signedInUser(req);
        const packs = await listAvailablePacks(isoDate(new Date()));
        const setIds = [...new Set(packs.map((p) => p.set.id))];

        const [owned, packTypes, probabilities, counts] = await Promise.all([
            ownedCardIds(user.id),
            listPackTypes(),
            listRarityProbabilities(),
            setIds.length > 0 ? cardCountsByRarity(setIds) : Promise.resolve([]),
        ]);
        const groups = buildPackList(packs, owned, packTypes, probabilities, rarityCountsBySet(counts));

        return sendPage(req, reply, {page: "packs", title: "Packs", body: renderPacks(groups)});
    });
}
