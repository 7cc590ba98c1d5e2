/**
 * progress.ts
 *
 * Collection progress per set. Rarities that share a symbol image are
 * grouped (e.g. the one- and two-shiny rarities) and each group gets its own
 * collected/total counter next to the overall set percentage.
 */

import type {Rarity, RarityCount} from "./types.js";

export type RarityGroup = {
    key: string;
    // Lowest order of the member rarities
    order: number;
    rarities: string[];
};

export type GroupProgress = {
    group: RarityGroup;
    collected: number;
    total: number;
};

export type SetProgress = {
    collected: number;
    total: number;
    progressPercent: number;
    rarityProgress: GroupProgress[];
};

export function roundTo(value: number, decimals: number): number {
    const f = 10 ** decimals;
    return Math.round(value * f) / f;
}

export function percent(part: number, whole: number): number {
    return whole > 0 ? roundTo((part / whole) * 100, 2) : 0;
}

/**
 * Group rarities by symbol image. A rarity without an image forms a group
 * of its own keyed by its name. Groups are ordered by their lowest member
 * order.
 */
export function buildRarityGroups(rarities: Pick<Rarity, "name" | "order" | "imageName">[]): RarityGroup[] {
    const groups = new Map<string, RarityGroup>();
    for (const r of rarities) {
        const key = r.imageName ?? r.name;
        const group = groups.get(key);
        if (group) {
            group.rarities.push(r.name);
            group.order = Math.min(group.order, r.order);
        } else {
            groups.set(key, {key, order: r.order, rarities: [r.name]});
        }
    }
    return [...groups.values()].sort((a, b) => a.order - b.order || a.key.localeCompare(b.key));
}

function countsFor(setId: number, counts: RarityCount[]): Map<string, number> {
    const out = new Map<string, number>();
    for (const c of counts) {
        if (c.setId !== setId) continue;
        out.set(c.rarity, (out.get(c.rarity) ?? 0) + c.count);
    }
    return out;
}

function sum(values: Iterable<number>): number {
    let s = 0;
    for (const v of values) s += v;
    return s;
}

/**
 * Progress of one set from per-rarity card totals and per-rarity collected
 * counts (both may contain rows for other sets; they are ignored).
 */
export function computeSetProgress(
    setId: number,
    groups: RarityGroup[],
    totals: RarityCount[],
    collected: RarityCount[],
): SetProgress {
    const totalByRarity = countsFor(setId, totals);
    const collectedByRarity = countsFor(setId, collected);
    const total = sum(totalByRarity.values());
    const owned = sum(collectedByRarity.values());

    return {
        collected: owned,
        total,
        progressPercent: percent(owned, total),
        rarityProgress: groups.map((group) => ({
            group,
            collected: sum(group.rarities.map((r) => collectedByRarity.get(r) ?? 0)),
            total: sum(group.rarities.map((r) => totalByRarity.get(r) ?? 0)),
        })),
    };
}
