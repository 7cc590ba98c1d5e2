/**
 * collect.ts
 *
 * Form body of a collect/uncollect request: `card_id` and `action`, plus
 * the optional search query the home page round-trips.
 */

import {z} from "zod";

// Largest value of a Postgres `integer` column (all ids are SERIAL)
export const PG_INT_MAX = 2147483647;

export const idSchema = z.coerce.number().int().positive().max(PG_INT_MAX);

export const collectSchema = z.object({
    card_id: idSchema,
    action: z.enum(["collect", "uncollect"]),
    q: z.string().trim().max(100).optional(),
});

export type CollectForm = z.infer<typeof collectSchema>;
