/**
 * odds.ts
 *
 * Chance that opening a pack yields at least one card the user does not own
 * yet, and the pack list built from it.
 *
 * Per slot, the chance of drawing an owned card is the sum over rarities of
 * `P(rarity in slot) * owned(rarity) / total(rarity)` for the cards of that
 * pack. Slots are independent, so the chance of nothing new is the product
 * over the active slots. God packs have no stored probabilities: their
 * rarities are weighted by how many eligible cards the set contains.
 */

import {isBaseRarity} from "../../../shared/types/collection.js";
import {percent, roundTo} from "./progress.js";
import type {Card, PackType, PackWithCards, RarityProbability} from "./types.js";
import {SLOT_COUNT_MAX} from "./types.js";

export type SlotTable = ReadonlyMap<string, readonly number[]>;

const GOD_PACK_RARITIES = ["illustration_rare", "special_art", "immersive_rare", "crown_rare"];
const SHINY_RARITIES = ["shiny_rare", "double_shiny_rare"];
const SHINY_GOD_PACK_GENERATIONS = new Set(["G2", "G3"]);

export function isGodPack(packType: Pick<PackType, "name">): boolean {
    return packType.name.toLowerCase().includes("god");
}

export function godPackEligibleRarities(generation: string): string[] {
    return SHINY_GOD_PACK_GENERATIONS.has(generation)
        ? [...GOD_PACK_RARITIES, ...SHINY_RARITIES]
        : [...GOD_PACK_RARITIES];
}

/**
 * Derived slot probabilities of a god pack. Each eligible rarity with at
 * least one card in the set gets `cards / eligibleCards` in every active
 * slot; inactive slots are zero.
 */
export function godPackProbabilities(
    generation: string,
    slotCount: number,
    setRarityCounts: ReadonlyMap<string, number>,
): Map<string, number[]> {
    const eligible = godPackEligibleRarities(generation);
    const totalEligible = eligible.reduce((acc, r) => acc + (setRarityCounts.get(r) ?? 0), 0);
    const table = new Map<string, number[]>();
    if (totalEligible === 0) return table;

    for (const rarity of eligible) {
        const count = setRarityCounts.get(rarity) ?? 0;
        if (count === 0) continue;
        const p = count / totalEligible;
        table.set(rarity, Array.from({length: SLOT_COUNT_MAX}, (_, i) => (i < slotCount ? p : 0)));
    }
    return table;
}

export function slotTableFor(rows: RarityProbability[]): Map<string, number[]> {
    return new Map(rows.map((r) => [r.rarity, r.slots]));
}

/**
 * Probability (0..1, four decimals) that at least one of the first
 * `slotCount` slots yields a card not in `owned`. A pack without cards has
 * nothing new to offer and yields 0.
 */
export function probAtLeastOneNewCard(
    cards: Pick<Card, "id" | "rarity">[],
    owned: ReadonlySet<number>,
    slotTable: SlotTable,
    slotCount: number,
): number {
    if (cards.length === 0) return 0;

    const totalByRarity = new Map<string, number>();
    const ownedByRarity = new Map<string, number>();
    for (const card of cards) {
        totalByRarity.set(card.rarity, (totalByRarity.get(card.rarity) ?? 0) + 1);
        if (owned.has(card.id)) {
            ownedByRarity.set(card.rarity, (ownedByRarity.get(card.rarity) ?? 0) + 1);
        }
    }

    let probNoNew = 1;
    const slots = Math.min(Math.max(slotCount, 0), SLOT_COUNT_MAX);
    for (let slot = 0; slot < slots; slot++) {
        let slotNoNew = 0;
        for (const [rarity, probabilities] of slotTable) {
            const total = totalByRarity.get(rarity) ?? 0;
            if (total === 0) continue;
            slotNoNew += (probabilities[slot] ?? 0) * ((ownedByRarity.get(rarity) ?? 0) / total);
        }
        probNoNew *= slotNoNew;
    }
    return roundTo(1 - probNoNew, 4);
}

export type PackChanceInput = {
    cards: Pick<Card, "id" | "rarity">[];
    owned: ReadonlySet<number>;
    generation: string;
    // Pack types of the pack's generation
    packTypes: PackType[];
    // Stored probabilities of the pack's generation
    probabilities: RarityProbability[];
    // Card count per rarity in the pack's set (god pack weighting)
    setRarityCounts: ReadonlyMap<string, number>;
};

export const DEFAULT_SLOT_COUNT = 5;

/**
 * Expected chance over all pack types of the generation, each weighted by
 * how often that pack type occurs. Without pack types the generation's
 * stored probabilities are applied to a plain five-slot pack.
 */
export function packChance(input: PackChanceInput): number {
    if (input.packTypes.length === 0) {
        return probAtLeastOneNewCard(input.cards, input.owned, slotTableFor(input.probabilities), DEFAULT_SLOT_COUNT);
    }
    let expected = 0;
    for (const packType of input.packTypes) {
        const table = isGodPack(packType)
            ? godPackProbabilities(input.generation, packType.slotCount, input.setRarityCounts)
            : slotTableFor(input.probabilities.filter((p) => p.packTypeId === packType.id));
        const chance = probAtLeastOneNewCard(input.cards, input.owned, table, packType.slotCount);
        expected += chance * packType.occurrenceProbability;
    }
    return expected;
}

export type PackSummary = {
    packId: number;
    packName: string;
    chancePercent: number;
    owned: number;
    total: number;
    progressPercent: number;
    // Some common..double_rare card of the pack is still missing
    incompleteBase: boolean;
    isBest: boolean;
};

export type PackGroup = {
    setNumber: string;
    setName: string;
    packs: PackSummary[];
};

function rarityCountsOfSets(packs: PackWithCards[]): Map<number, Map<string, number>> {
    const bySet = new Map<number, Map<string, Set<number>>>();
    for (const pack of packs) {
        let rarities = bySet.get(pack.set.id);
        if (!rarities) {
            rarities = new Map();
            bySet.set(pack.set.id, rarities);
        }
        for (const card of pack.cards) {
            let ids = rarities.get(card.rarity);
            if (!ids) {
                ids = new Set();
                rarities.set(card.rarity, ids);
            }
            ids.add(card.id);
        }
    }
    return new Map([...bySet].map(([setId, rarities]) => [
        setId,
        new Map([...rarities].map(([rarity, ids]) => [rarity, ids.size])),
    ]));
}

/**
 * Summaries of every pack, grouped by set. Packs still missing base cards
 * come first, then by chance (highest first), then by name. The pack with
 * the highest chance overall is flagged `isBest`.
 *
 * `setRarityCounts` overrides the per-set card counts used for god packs;
 * by default they are derived from the cards of the given packs.
 */
export function buildPackList(
    packs: PackWithCards[],
    owned: ReadonlySet<number>,
    packTypes: PackType[],
    probabilities: RarityProbability[],
    setRarityCounts: ReadonlyMap<number, ReadonlyMap<string, number>> = rarityCountsOfSets(packs),
): PackGroup[] {
    const entries = packs.map((pack) => {
        const total = pack.cards.length;
        const ownedCount = pack.cards.filter((c) => owned.has(c.id)).length;
        const base = pack.cards.filter((c) => isBaseRarity(c.rarity));
        const chance = packChance({
            cards: pack.cards,
            owned,
            generation: pack.generation,
            packTypes: packTypes.filter((t) => t.generation === pack.generation),
            probabilities: probabilities.filter((p) => p.generation === pack.generation),
            setRarityCounts: setRarityCounts.get(pack.set.id) ?? new Map(),
        });
        const summary: PackSummary = {
            packId: pack.id,
            packName: pack.name,
            chancePercent: roundTo(chance * 100, 2),
            owned: ownedCount,
            total,
            progressPercent: percent(ownedCount, total),
            incompleteBase: base.some((c) => !owned.has(c.id)),
            isBest: false,
        };
        return {pack, summary};
    });

    let best: PackSummary | null = null;
    for (const {summary} of entries) {
        if (!best || summary.chancePercent > best.chancePercent) best = summary;
    }
    if (best) best.isBest = true;

    entries.sort((a, b) =>
        Number(b.summary.incompleteBase) - Number(a.summary.incompleteBase)
        || b.summary.chancePercent - a.summary.chancePercent
        || a.summary.packName.localeCompare(b.summary.packName));

    const groups = new Map<number, PackGroup>();
    for (const {pack, summary} of entries) {
        let group = groups.get(pack.set.id);
        if (!group) {
            group = {setNumber: pack.set.number, setName: pack.set.name, packs: []};
            groups.set(pack.set.id, group);
        }
        group.packs.push(summary);
    }
    return [...groups.values()];
}
