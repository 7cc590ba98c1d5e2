/**
 * probability.ts
 *
 * Admin form for one rarity probability row. Slot fields are named
 * `probability_slot1`..`probability_slot6`; empty fields count as 0.
 */

import {z} from "zod";
import {idSchema} from "./collect.js";

const slot = z.preprocess(
    (v) => (v === "" || v === undefined ? 0 : v),
    z.coerce.number().min(0, {message: "Must be at least 0."}).max(1, {message: "Cannot exceed 1 (100%)."}),
);

export const probabilitySchema = z.object({
    pack_type: idSchema,
    rarity: z.string().trim().min(1).max(20),
    probability_slot1: slot,
    probability_slot2: slot,
    probability_slot3: slot,
    probability_slot4: slot,
    probability_slot5: slot,
    probability_slot6: slot,
});

export type ProbabilityForm = z.infer<typeof probabilitySchema>;

export function slotsOf(form: ProbabilityForm): number[] {
    return [
        form.probability_slot1,
        form.probability_slot2,
        form.probability_slot3,
        form.probability_slot4,
        form.probability_slot5,
        form.probability_slot6,
    ];
}
