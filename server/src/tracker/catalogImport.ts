/**
 * catalogImport.ts
 *
 * Loads a JSON catalog (rarities, generations, pack types, rarity
 * probabilities, sets and cards) into the database. Records are upserted in
 * dependency order; a record referencing something that does not exist is
 * skipped with a warning. Probabilities of god pack types are never stored
 * since they are derived when the odds are computed.
 *
 * Storage goes through `CatalogStore` so the import rules can be exercised
 * without a database.
 */

import {z} from "zod";
import type {InfraLogger} from "../logging.js";
import {isGodPack} from "./odds.js";
import {SLOT_COUNT_MAX} from "./types.js";

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");
const probability = z.number().min(0).max(1);

export const catalogSchema = z.object({
    rarities: z.array(z.object({
        name: z.string().min(1).max(20),
        displayName: z.string().min(1).max(4),
        order: z.number().int().min(0),
        imageName: z.string().nullish(),
        repeatCount: z.number().int().min(1).default(1),
    })).default([]),
    generations: z.array(z.object({
        name: z.string().min(1).max(3),
        displayName: z.string().min(1),
        description: z.string().default(""),
    })).default([]),
    packTypes: z.array(z.object({
        generation: z.string(),
        name: z.string().min(1).max(20),
        displayName: z.string().min(1),
        slotCount: z.number().int().min(0).max(SLOT_COUNT_MAX).default(5),
        occurrenceProbability: probability,
        description: z.string().default(""),
    })).default([]),
    rarityProbabilities: z.array(z.object({
        rarity: z.string(),
        generation: z.string(),
        packType: z.string(),
        slots: z.array(probability).max(SLOT_COUNT_MAX),
    })).default([]),
    sets: z.array(z.object({
        number: z.string().min(1).max(10),
        name: z.string().min(1),
        releaseDate: isoDay,
        availableUntil: isoDay.nullish(),
        generation: z.string().nullish(),
    })).default([]),
    cards: z.array(z.object({
        setNumber: z.string(),
        number: z.string().min(1).max(10),
        name: z.string().min(1),
        rarity: z.string(),
        packs: z.array(z.string()).default([]),
    })).default([]),
});

export type Catalog = z.infer<typeof catalogSchema>;
export type CatalogRarity = Catalog["rarities"][number];
export type CatalogGeneration = Catalog["generations"][number];
export type CatalogPackType = Catalog["packTypes"][number];
export type CatalogSet = Catalog["sets"][number];
export type CatalogCard = Catalog["cards"][number];

export interface CatalogStore {
    upsertRarity(rarity: CatalogRarity): Promise<void>;
    hasRarity(name: string): Promise<boolean>;
    upsertGeneration(generation: CatalogGeneration): Promise<void>;
    hasGeneration(name: string): Promise<boolean>;
    // Highest generation name, e.g. "G3"
    newestGeneration(): Promise<string | null>;
    upsertPackType(packType: CatalogPackType): Promise<number>;
    findPackTypeId(generation: string, name: string): Promise<number | null>;
    upsertRarityProbability(row: {rarity: string; generation: string; packTypeId: number; slots: number[]}): Promise<void>;
    upsertSet(set: CatalogSet): Promise<number>;
    findSetId(number: string): Promise<number | null>;
    upsertCard(setId: number, card: Pick<CatalogCard, "number" | "name" | "rarity">): Promise<number>;
    findPackId(setId: number, name: string): Promise<number | null>;
    createPack(setId: number, name: string, generation: string): Promise<number>;
    linkCardToPack(cardId: number, packId: number): Promise<void>;
}

export type ImportSummary = {
    rarities: number;
    generations: number;
    packTypes: number;
    rarityProbabilities: number;
    sets: number;
    cards: number;
    packsCreated: number;
    skipped: number;
};

export function parseCatalog(raw: unknown): Catalog {
    return catalogSchema.parse(raw);
}

function padSlots(slots: number[]): number[] {
    return Array.from({length: SLOT_COUNT_MAX}, (_, i) => slots[i] ?? 0);
}

export async function importCatalog(store: CatalogStore, catalog: Catalog, log: InfraLogger): Promise<ImportSummary> {
    const summary: ImportSummary = {
        rarities: 0,
        generations: 0,
        packTypes: 0,
        rarityProbabilities: 0,
        sets: 0,
        cards: 0,
        packsCreated: 0,
        skipped: 0,
    };
    const skip = (what: object, reason: string) => {
        summary.skipped++;
        log.warn(what, `skipped: ${reason}`);
    };

    for (const rarity of catalog.rarities) {
        await store.upsertRarity(rarity);
        summary.rarities++;
    }

    for (const generation of catalog.generations) {
        await store.upsertGeneration(generation);
        summary.generations++;
    }

    for (const packType of catalog.packTypes) {
        if (!(await store.hasGeneration(packType.generation))) {
            skip({packType: packType.name, generation: packType.generation}, "generation not found");
            continue;
        }
        await store.upsertPackType(packType);
        summary.packTypes++;
    }

    for (const row of catalog.rarityProbabilities) {
        const where = {rarity: row.rarity, generation: row.generation, packType: row.packType};
        if (isGodPack({name: row.packType})) {
            skip(where, "god pack probabilities are derived");
            continue;
        }
        const packTypeId = await store.findPackTypeId(row.generation, row.packType);
        if (packTypeId === null) {
            skip(where, "pack type not found");
            continue;
        }
        if (!(await store.hasRarity(row.rarity))) {
            skip(where, "rarity not found");
            continue;
        }
        await store.upsertRarityProbability({
            rarity: row.rarity,
            generation: row.generation,
            packTypeId,
            slots: padSlots(row.slots),
        });
        summary.rarityProbabilities++;
    }

    for (const set of catalog.sets) {
        if (set.generation && !(await store.hasGeneration(set.generation))) {
            skip({set: set.number, generation: set.generation}, "generation not found");
            continue;
        }
        await store.upsertSet(set);
        summary.sets++;
    }

    const setIds = new Map<string, number | null>();
    for (const card of catalog.cards) {
        const where = {set: card.setNumber, card: card.number};
        if (!setIds.has(card.setNumber)) setIds.set(card.setNumber, await store.findSetId(card.setNumber));
        const setId = setIds.get(card.setNumber) ?? null;
        if (setId === null) {
            skip(where, "set not found");
            continue;
        }
        if (!(await store.hasRarity(card.rarity))) {
            skip(where, "rarity not found");
            continue;
        }
        const cardId = await store.upsertCard(setId, card);
        summary.cards++;

        for (const rawName of card.packs) {
            const packName = rawName.trim();
            if (!packName) continue;
            let packId = await store.findPackId(setId, packName);
            if (packId === null) {
                const generation = await store.newestGeneration();
                if (!generation) {
                    skip({...where, pack: packName}, "no generation to create the pack under");
                    continue;
                }
                packId = await store.createPack(setId, packName, generation);
                summary.packsCreated++;
                log.info({set: card.setNumber, pack: packName, generation}, "created pack");
            }
            await store.linkCardToPack(cardId, packId);
        }
    }

    return summary;
}
