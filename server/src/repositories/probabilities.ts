/**
 * probabilities.ts
 *
 * Pack types and rarity probabilities, read by the pack odds and the
 * validation command and written by the admin form.
 */

import {getPool} from "../db/pg.js";
import type {PackType, RarityProbability} from "../tracker/types.js";

type PackTypeRow = {
    id: number;
    generation: string;
    name: string;
    display_name: string;
    slot_count: number;
    occurrence_probability: number;
    description: string;
};

type ProbabilityRow = {
    id: number;
    rarity: string;
    generation: string;
    pack_type: number;
    slot1: number;
    slot2: number;
    slot3: number;
    slot4: number;
    slot5: number;
    slot6: number;
};

export type ProbabilityInput = {
    rarity: string;
    packTypeId: number;
    slots: number[];
};

function toPackType(r: PackTypeRow): PackType {
    return {
        id: r.id,
        generation: r.generation,
        name: r.name,
        displayName: r.display_name,
        slotCount: r.slot_count,
        occurrenceProbability: r.occurrence_probability,
        description: r.description,
    };
}

function toProbability(r: ProbabilityRow): RarityProbability {
    return {
        id: r.id,
        rarity: r.rarity,
        generation: r.generation,
        packTypeId: r.pack_type,
        slots: [r.slot1, r.slot2, r.slot3, r.slot4, r.slot5, r.slot6],
    };
}

export async function listPackTypes(): Promise<PackType[]> {
    const res = await getPool().query<PackTypeRow>(
        `SELECT id, generation, name, display_name, slot_count, occurrence_probability, description
         FROM pack_types ORDER BY generation, occurrence_probability DESC`,
    );
    return res.rows.map(toPackType);
}

export async function findPackType(id: number): Promise<PackType | null> {
    const res = await getPool().query<PackTypeRow>(
        `SELECT id, generation, name, display_name, slot_count, occurrence_probability, description
         FROM pack_types WHERE id = $1`,
        [id],
    );
    const row = res.rows[0];
    return row ? toPackType(row) : null;
}

export async function listRarityProbabilities(): Promise<RarityProbability[]> {
    const res = await getPool().query<ProbabilityRow>(
        `SELECT id, rarity, generation, pack_type, slot1, slot2, slot3, slot4, slot5, slot6
         FROM rarity_probabilities ORDER BY generation, pack_type, rarity`,
    );
    return res.rows.map(toProbability);
}

/**
 * Insert or replace the probabilities of one rarity within a pack type. The
 * generation is taken from the pack type.
 */
export async function upsertRarityProbability(input: ProbabilityInput): Promise<void> {
    const [s1 = 0, s2 = 0, s3 = 0, s4 = 0, s5 = 0, s6 = 0] = input.slots;
    await getPool().query(
        `INSERT INTO rarity_probabilities (rarity, generation, pack_type, slot1, slot2, slot3, slot4, slot5, slot6)
         SELECT $1, pt.generation, pt.id, $3, $4, $5, $6, $7, $8 FROM pack_types pt WHERE pt.id = $2
         ON CONFLICT (generation, pack_type, rarity) DO UPDATE SET
            slot1 = EXCLUDED.slot1, slot2 = EXCLUDED.slot2, slot3 = EXCLUDED.slot3,
            slot4 = EXCLUDED.slot4, slot5 = EXCLUDED.slot5, slot6 = EXCLUDED.slot6`,
        [input.rarity, input.packTypeId, s1, s2, s3, s4, s5, s6],
    );
}
