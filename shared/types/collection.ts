/**
 * collection.ts
 *
 * Wire shapes shared by the server routes and the browser scripts of the set
 * page: the collect/uncollect form action, its JSON answer and the fixed
 * rarity ranking the card table sorts by.
 */

export type CollectAction = "collect" | "uncollect";

export type CollectResponse = {
    status: "success";
    collected: boolean;
};

// Query parameter value that asks the set page for its progress fragment only
export const RARITY_PROGRESS_FRAGMENT = "rarity_progress";

// Rarities treated as the "base" of a set (bulk collect, pack sorting)
export const BASE_RARITIES = ["common", "uncommon", "rare", "double_rare"] as const;

export type BaseRarity = (typeof BASE_RARITIES)[number];

/**
 * Display rank of every known rarity. Lower ranks sort first; anything not
 * listed sorts after all of these.
 */
export const RARITY_ORDER: Readonly<Record<string, number>> = {
    common: 1,
    uncommon: 2,
    rare: 3,
    double_rare: 4,
    illustration_rare: 5,
    special_art: 6,
    immersive_rare: 7,
    crown_rare: 8,
    shiny_rare: 9,
    double_shiny_rare: 10,
};

export const UNKNOWN_RARITY_RANK = 99;

const BASE_RARITY_NAMES: readonly string[] = BASE_RARITIES;

export function isBaseRarity(name: string): name is BaseRarity {
    return BASE_RARITY_NAMES.includes(name);
}
