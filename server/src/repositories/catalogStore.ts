/**
 * catalogStore.ts
 *
 * `CatalogStore` on top of a pg client, used by the catalog import script.
 * Every write is an upsert keyed by the natural key of the record.
 */

import type pg from "pg";
import type {
    CatalogGeneration,
    CatalogPackType,
    CatalogRarity,
    CatalogSet,
    CatalogStore,
} from "../tracker/catalogImport.js";

type Queryable = Pick<pg.PoolClient, "query">;

export class PgCatalogStore implements CatalogStore {
    constructor(private readonly db: Queryable) {
    }

    private async id(sql: string, params: unknown[]): Promise<number | null> {
        const res = await this.db.query<{id: number}>(sql, params);
        return res.rows[0]?.id ?? null;
    }

    private async requireId(sql: string, params: unknown[]): Promise<number> {
        const id = await this.id(sql, params);
        if (id === null) throw new Error("UPSERT_RETURNED_NO_ROW");
        return id;
    }

    async upsertRarity(r: CatalogRarity) {
        await this.db.query(
            `INSERT INTO rarities (name, display_name, sort_order, image_name, repeat_count)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (name) DO UPDATE SET display_name = EXCLUDED.display_name,
                sort_order = EXCLUDED.sort_order, image_name = EXCLUDED.image_name,
                repeat_count = EXCLUDED.repeat_count`,
            [r.name, r.displayName, r.order, r.imageName ?? null, r.repeatCount],
        );
    }

    async hasRarity(name: string) {
        const res = await this.db.query("SELECT 1 FROM rarities WHERE name = $1", [name]);
        return res.rows.length > 0;
    }

    async upsertGeneration(g: CatalogGeneration) {
        await this.db.query(
            `INSERT INTO generations (name, display_name, description) VALUES ($1, $2, $3)
             ON CONFLICT (name) DO UPDATE SET display_name = EXCLUDED.display_name,
                description = EXCLUDED.description`,
            [g.name, g.displayName, g.description],
        );
    }

    async hasGeneration(name: string) {
        const res = await this.db.query("SELECT 1 FROM generations WHERE name = $1", [name]);
        return res.rows.length > 0;
    }

    async newestGeneration() {
        const res = await this.db.query<{name: string}>("SELECT name FROM generations ORDER BY name DESC LIMIT 1");
        return res.rows[0]?.name ?? null;
    }

    upsertPackType(p: CatalogPackType) {
        return this.requireId(
            `INSERT INTO pack_types (generation, name, display_name, slot_count, occurrence_probability, description)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (generation, name) DO UPDATE SET display_name = EXCLUDED.display_name,
                slot_count = EXCLUDED.slot_count, occurrence_probability = EXCLUDED.occurrence_probability,
                description = EXCLUDED.description
             RETURNING id`,
            [p.generation, p.name, p.displayName, p.slotCount, p.occurrenceProbability, p.description],
        );
    }

    findPackTypeId(generation: string, name: string) {
        return this.id("SELECT id FROM pack_types WHERE generation = $1 AND name = $2", [generation, name]);
    }

    async upsertRarityProbability(row: {rarity: string; generation: string; packTypeId: number; slots: number[]}) {
        await this.db.query(
            `INSERT INTO rarity_probabilities (rarity, generation, pack_type, slot1, slot2, slot3, slot4, slot5, slot6)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             ON CONFLICT (generation, pack_type, rarity) DO UPDATE SET
                slot1 = EXCLUDED.slot1, slot2 = EXCLUDED.slot2, slot3 = EXCLUDED.slot3,
                slot4 = EXCLUDED.slot4, slot5 = EXCLUDED.slot5, slot6 = EXCLUDED.slot6`,
            [row.rarity, row.generation, row.packTypeId, ...row.slots],
        );
    }

    upsertSet(s: CatalogSet) {
        return this.requireId(
            `INSERT INTO card_sets (number, name, release_date, available_until, generation)
             VALUES ($1, $2, $3::date, $4::date, $5)
             ON CONFLICT (number) DO UPDATE SET name = EXCLUDED.name, release_date = EXCLUDED.release_date,
                available_until = EXCLUDED.available_until, generation = EXCLUDED.generation
             RETURNING id`,
            [s.number, s.name, s.releaseDate, s.availableUntil ?? null, s.generation ?? null],
        );
    }

    findSetId(number: string) {
        return this.id("SELECT id FROM card_sets WHERE number = $1", [number]);
    }

    upsertCard(setId: number, c: {number: string; name: string; rarity: string}) {
        return this.requireId(
            `INSERT INTO cards (set_id, number, name, rarity) VALUES ($1, $2, $3, $4)
             ON CONFLICT (set_id, number) DO UPDATE SET name = EXCLUDED.name, rarity = EXCLUDED.rarity
             RETURNING id`,
            [setId, c.number, c.name, c.rarity],
        );
    }

    findPackId(setId: number, name: string) {
        return this.id("SELECT id FROM packs WHERE set_id = $1 AND name = $2", [setId, name]);
    }

    createPack(setId: number, name: string, generation: string) {
        return this.requireId(
            "INSERT INTO packs (set_id, name, generation) VALUES ($1, $2, $3) RETURNING id",
            [setId, name, generation],
        );
    }

    async linkCardToPack(cardId: number, packId: number) {
        await this.db.query(
            "INSERT INTO card_packs (card_id, pack_id) VALUES ($1, $2) ON CONFLICT DO NOTHING",
            [cardId, packId],
        );
    }
}
