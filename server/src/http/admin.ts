/**
 * admin.ts
 *
 * Admin-only form for maintaining rarity probabilities. After every save the
 * slot sums of all pack types are re-checked and failures are shown as
 * warnings; saving is never blocked by them.
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from "fastify";
import {ZodError} from "zod";
import {requireAdmin, requireCsrf, signedInUser} from "../auth/httpAuth.js";
import {csrfTokenFor} from "../auth/csrf.js";
import {listRarities} from "../repositories/catalog.js";
import {
    findPackType,
    listPackTypes,
    listRarityProbabilities,
    upsertRarityProbability,
} from "../repositories/probabilities.js";
import {probabilitySchema, slotsOf} from "../schemas/probability.js";
import {validateProbabilitySums} from "../tracker/probabilities.js";
import {renderProbabilityForm} from "../views/admin.js";
import {errorCode, formValues, sendPage, zodMessages} from "./pages.js";

export const PROBABILITY_FORM_URL = "/admin/rarity-probabilities/new";

async function renderForm(
    req: FastifyRequest,
    reply: FastifyReply,
    state: {values?: Record<string, string>; errors?: string[]; saved?: boolean; status?: number},
) {
    const user = signedInUser(req);
    const [packTypes, rarities, rows] = await Promise.all([
        listPackTypes(),
        listRarities(),
        listRarityProbabilities(),
    ]);
    return sendPage(req, reply, {
        page: "admin_probability",
        title: "Rarity probability",
        scripts: ["admin.js"],
        status: state.status,
        body: renderProbabilityForm({
            packTypes,
            rarities,
            csrfToken: csrfTokenFor(user.id),
            values: state.values,
            errors: state.errors,
            saved: state.saved,
            sumIssues: validateProbabilitySums(rows, packTypes),
        }),
    });
}

export async function registerAdminRoutes(app: FastifyInstance) {
    app.get(PROBABILITY_FORM_URL, {preHandler: requireAdmin}, async (req, reply) => {
        return renderForm(req, reply, {});
    });

    app.post(PROBABILITY_FORM_URL, {preHandler: [requireAdmin, requireCsrf]}, async (req, reply) => {
        const values = formValues(req.body);
        try {
            const form = probabilitySchema.parse(req.body);
            const packType = await findPackType(form.pack_type);
            if (!packType) throw new Error("PACK_TYPE_NOT_FOUND");
            const rarities = await listRarities();
            if (!rarities.some((r) => r.name === form.rarity)) throw new Error("RARITY_NOT_FOUND");

            await upsertRarityProbability({rarity: form.rarity, packTypeId: packType.id, slots: slotsOf(form)});
            req.log.info({packType: packType.name, generation: packType.generation, rarity: form.rarity}, "rarity probability saved");
            return renderForm(req, reply, {values, saved: true});
        } catch (err) {
            if (err instanceof ZodError) {
                return renderForm(req, reply, {values, errors: zodMessages(err), status: 400});
            }
            const code = errorCode(err);
            if (code === "PACK_TYPE_NOT_FOUND") {
                return renderForm(req, reply, {values, errors: ["pack_type: Select a valid pack type."], status: 400});
            }
            if (code === "RARITY_NOT_FOUND") {
                return renderForm(req, reply, {values, errors: ["rarity: Select a valid rarity."], status: 400});
            }
            throw err;
        }
    });
}
