/**
 * catalog.ts
 *
 * Read queries over the card catalog: rarities, sets, cards and packs.
 * Rows are mapped to the camel-cased shapes of `tracker/types.ts`.
 */

import {getPool} from "../db/pg.js";
import type {Card, CardSearchResult, CardSet, PackWithCards, Rarity, RarityCount} from "../tracker/types.js";

type RarityRow = {
    name: string;
    display_name: string;
    sort_order: number;
    image_name: string | null;
    repeat_count: number;
};

type SetRow = {
    id: number;
    number: string;
    name: string;
    release_date: string;
    available_until: string | null;
    generation: string | null;
};

type CardRow = {
    id: number;
    set_id: number;
    number: string;
    name: string;
    rarity: string;
};

const SET_COLUMNS = `s.id, s.number, s.name,
    to_char(s.release_date, 'YYYY-MM-DD') AS release_date,
    to_char(s.available_until, 'YYYY-MM-DD') AS available_until,
    s.generation`;

// Numeric part first so "2" sorts before "10"; letters break ties
const CARD_NUMBER_ORDER = `NULLIF(regexp_replace(c.number, '\\D', '', 'g'), '')::int NULLS LAST, c.number`;

function toSet(r: SetRow): CardSet {
    return {
        id: r.id,
        number: r.number,
        name: r.name,
        releaseDate: r.release_date,
        availableUntil: r.available_until,
        generation: r.generation,
    };
}

function toCard(r: CardRow): Card {
    return {id: r.id, setId: r.set_id, number: r.number, name: r.name, rarity: r.rarity};
}

/**
 * Escape LIKE wildcards so user input matches literally.
 */
export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export async function listRarities(): Promise<Rarity[]> {
    const res = await getPool().query<RarityRow>(
        `SELECT name, display_name, sort_order, image_name, repeat_count
         FROM rarities ORDER BY sort_order`,
    );
    return res.rows.map((r) => ({
        name: r.name,
        displayName: r.display_name,
        order: r.sort_order,
        imageName: r.image_name,
        repeatCount: r.repeat_count,
    }));
}

export async function listSetsNewestFirst(): Promise<CardSet[]> {
    const res = await getPool().query<SetRow>(
        `SELECT ${SET_COLUMNS} FROM card_sets s ORDER BY s.release_date DESC, s.name`,
    );
    return res.rows.map(toSet);
}

export async function findSetByNumber(number: string): Promise<CardSet | null> {
    const res = await getPool().query<SetRow>(
        `SELECT ${SET_COLUMNS} FROM card_sets s WHERE s.number = $1`,
        [number],
    );
    const row = res.rows[0];
    return row ? toSet(row) : null;
}

export async function listCardsInSet(setId: number): Promise<Card[]> {
    const res = await getPool().query<CardRow>(
        `SELECT c.id, c.set_id, c.number, c.name, c.rarity
         FROM cards c WHERE c.set_id = $1 ORDER BY ${CARD_NUMBER_ORDER}`,
        [setId],
    );
    return res.rows.map(toCard);
}

export async function findCard(cardId: number): Promise<Card | null> {
    const res = await getPool().query<CardRow>(
        `SELECT c.id, c.set_id, c.number, c.name, c.rarity FROM cards c WHERE c.id = $1`,
        [cardId],
    );
    const row = res.rows[0];
    return row ? toCard(row) : null;
}

/**
 * Case-insensitive substring search over card names, ordered by set
 * release date, set name and card number.
 */
export async function searchCards(query: string, limit = 200): Promise<CardSearchResult[]> {
    const res = await getPool().query<CardRow & {set_number: string; set_name: string}>(
        `SELECT c.id, c.set_id, c.number, c.name, c.rarity, s.number AS set_number, s.name AS set_name
         FROM cards c JOIN card_sets s ON s.id = c.set_id
         WHERE c.name ILIKE '%' || $1 || '%'
         ORDER BY s.release_date, s.name, ${CARD_NUMBER_ORDER}
         LIMIT $2`,
        [escapeLike(query), limit],
    );
    return res.rows.map((r) => ({...toCard(r), setNumber: r.set_number, setName: r.set_name}));
}

/**
 * Number of cards per (set, rarity). Restricted to `setIds` when given.
 */
export async function cardCountsByRarity(setIds?: number[]): Promise<RarityCount[]> {
    const res = await getPool().query<{set_id: number; rarity: string; count: string}>(
        `SELECT c.set_id, c.rarity, count(*) AS count
         FROM cards c
         WHERE $1::int[] IS NULL OR c.set_id = ANY($1::int[])
         GROUP BY c.set_id, c.rarity`,
        [setIds ?? null],
    );
    return res.rows.map((r) => ({setId: r.set_id, rarity: r.rarity, count: Number(r.count)}));
}

/**
 * Packs whose set is still available on `today`, each with its cards.
 */
export async function listAvailablePacks(today: string): Promise<PackWithCards[]> {
    const pool = getPool();
    const packs = await pool.query<SetRow & {pack_id: number; pack_name: string; pack_generation: string}>(
        `SELECT p.id AS pack_id, p.name AS pack_name, p.generation AS pack_generation, ${SET_COLUMNS}
         FROM packs p JOIN card_sets s ON s.id = p.set_id
         WHERE s.available_until IS NULL OR s.available_until >= $1::date
         ORDER BY s.release_date, p.name`,
        [today],
    );
    if (packs.rows.length === 0) return [];

    const cards = await pool.query<{pack_id: number; id: number; rarity: string}>(
        `SELECT cp.pack_id, c.id, c.rarity
         FROM card_packs cp JOIN cards c ON c.id = cp.card_id
         WHERE cp.pack_id = ANY($1::int[])`,
        [packs.rows.map((r) => r.pack_id)],
    );
    const byPack = new Map<number, {id: number; rarity: string}[]>();
    for (const row of cards.rows) {
        const list = byPack.get(row.pack_id) ?? [];
        list.push({id: row.id, rarity: row.rarity});
        byPack.set(row.pack_id, list);
    }

    return packs.rows.map((r) => ({
        id: r.pack_id,
        name: r.pack_name,
        generation: r.pack_generation,
        set: toSet(r),
        cards: byPack.get(r.pack_id) ?? [],
    }));
}
