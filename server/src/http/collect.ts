/**
 * collect.ts
 *
 * Collect/uncollect shared by the home page and the set page. Unknown cards
 * raise `CARD_NOT_FOUND`.
 */

import type {CollectAction} from "../../../shared/types/collection.js";
import {findCard} from "../repositories/catalog.js";
import {collectCard, uncollectCard} from "../repositories/collection.js";
import {cardsCollectedCounter, cardsUncollectedCounter} from "../observability/metrics.js";
import type {Card} from "../tracker/types.js";

export type CollectResult = {
    card: Card;
    collected: boolean;
};

export async function applyCollectAction(userId: number, cardId: number, action: CollectAction): Promise<CollectResult> {
    const card = await findCard(cardId);
    if (!card) throw new Error("CARD_NOT_FOUND");

    if (action === "collect") {
        await collectCard(userId, card.id);
        cardsCollectedCounter.inc({rarity: card.rarity});
        return {card, collected: true};
    }
    await uncollectCard(userId, card.id);
    cardsUncollectedCounter.inc({rarity: card.rarity});
    return {card, collected: false};
}
