/**
 * collection.ts
 *
 * Queries over `user_cards`, the cards a user marked as collected.
 */

import {getPool} from "../db/pg.js";
import type {RarityCount} from "../tracker/types.js";

/**
 * Collected cards of a user per (set, rarity). Restricted to `setIds` when
 * given.
 */
export async function collectedCountsByRarity(userId: number, setIds?: number[]): Promise<RarityCount[]> {
    const res = await getPool().query<{set_id: number; rarity: string; count: string}>(
        `SELECT c.set_id, c.rarity, count(*) AS count
         FROM user_cards uc JOIN cards c ON c.id = uc.card_id
         WHERE uc.user_id = $1 AND ($2::int[] IS NULL OR c.set_id = ANY($2::int[]))
         GROUP BY c.set_id, c.rarity`,
        [userId, setIds ?? null],
    );
    return res.rows.map((r) => ({setId: r.set_id, rarity: r.rarity, count: Number(r.count)}));
}

export async function ownedCardIds(userId: number): Promise<Set<number>> {
    const res = await getPool().query<{card_id: number}>(
        `SELECT card_id FROM user_cards WHERE user_id = $1`,
        [userId],
    );
    return new Set(res.rows.map((r) => r.card_id));
}

/**
 * Mark a card as collected. Collecting an already collected card keeps the
 * stored quantity.
 */
export async function collectCard(userId: number, cardId: number): Promise<void> {
    await getPool().query(
        `INSERT INTO user_cards (user_id, card_id, quantity) VALUES ($1, $2, 1)
         ON CONFLICT (user_id, card_id) DO NOTHING`,
        [userId, cardId],
    );
}

export async function uncollectCard(userId: number, cardId: number): Promise<void> {
    await getPool().query(
        `DELETE FROM user_cards WHERE user_id = $1 AND card_id = $2`,
        [userId, cardId],
    );
}
