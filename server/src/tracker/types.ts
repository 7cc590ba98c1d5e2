/**
 * types.ts
 *
 * Row shapes of the card catalog and the per-user collection as the
 * repositories return them. Dates are ISO `YYYY-MM-DD` strings.
 */

export type Rarity = {
    name: string;
    displayName: string;
    order: number;
    // Rarities sharing a symbol image are grouped together in progress views
    imageName: string | null;
    repeatCount: number;
};

export type Generation = {
    name: string;
    displayName: string;
    description: string;
};

export type PackType = {
    id: number;
    generation: string;
    name: string;
    displayName: string;
    slotCount: number;
    occurrenceProbability: number;
    description: string;
};

export const SLOT_COUNT_MAX = 6;

export type RarityProbability = {
    id: number;
    rarity: string;
    generation: string;
    packTypeId: number;
    // Always SLOT_COUNT_MAX entries, slot 1 first
    slots: number[];
};

export type CardSet = {
    id: number;
    number: string;
    name: string;
    releaseDate: string;
    availableUntil: string | null;
    generation: string | null;
};

export type Card = {
    id: number;
    setId: number;
    number: string;
    name: string;
    rarity: string;
};

export type CardSearchResult = Card & {
    setNumber: string;
    setName: string;
};

export type PackWithCards = {
    id: number;
    name: string;
    generation: string;
    set: CardSet;
    cards: Pick<Card, "id" | "rarity">[];
};

export type User = {
    id: number;
    username: string;
    email: string;
    isAdmin: boolean;
    createdAt: string;
};

// Card count of one rarity inside one set
export type RarityCount = {
    setId: number;
    rarity: string;
    count: number;
};

export function isSetAvailable(set: Pick<CardSet, "availableUntil">, today: string): boolean {
    return set.availableUntil === null || today <= set.availableUntil;
}

export function isoDate(d: Date): string {
    return d.toISOString().slice(0, 10);
}

export type Profile = {
    userId: number;
    username: string;
    public: boolean;
    friendCode: string | null;
};

export type FriendRequest = {
    id: number;
    fromUserId: number;
    fromUsername: string;
    toUserId: number;
    accepted: boolean;
    createdAt: string;
};
