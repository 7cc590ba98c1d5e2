/**
 * admin.ts
 *
 * Form for adding or replacing the per-slot probabilities of one rarity in
 * one pack type. Each pack type option carries its slot count so the admin
 * script can hide the slots the pack type does not have.
 */

import type {SlotSumCheck} from "../tracker/probabilities.js";
import {formatCheck} from "../tracker/probabilities.js";
import type {PackType, Rarity} from "../tracker/types.js";
import {SLOT_COUNT_MAX} from "../tracker/types.js";
import type {FormErrors} from "./auth.js";
import {html, type Html} from "./html.js";

export type ProbabilityFormView = {
    packTypes: PackType[];
    rarities: Rarity[];
    csrfToken: string;
    values?: Record<string, string>;
    errors?: FormErrors;
    saved?: boolean;
    sumIssues: SlotSumCheck[];
};

function slotRow(i: number, value: string): Html {
    return html`<div class="form-row field-probability_slot${i}">
    <label for="id_probability_slot${i}">Slot ${i}</label>
    <input id="id_probability_slot${i}" name="probability_slot${i}" type="number" min="0" max="1" step="0.00001" value="${value}">
  </div>`;
}

export function renderProbabilityForm(view: ProbabilityFormView): Html {
    const values = view.values ?? {};
    const selectedPackType = values["pack_type"] ?? "";
    const selectedRarity = values["rarity"] ?? "";
    const slots = Array.from({length: SLOT_COUNT_MAX}, (_, i) => i + 1);

    return html`<h1>Rarity probability</h1>
${view.saved && html`<p class="flash success">Probabilities saved.</p>`}
${(view.errors ?? []).length > 0 && html`<ul class="form-errors">${(view.errors ?? []).map((e) => html`<li>${e}</li>`)}</ul>`}
<form method="post" action="/admin/rarity-probabilities/new" class="admin-form">
  <input type="hidden" name="csrf" value="${view.csrfToken}">
  <div class="form-row field-pack_type">
    <label for="id_pack_type">Pack type</label>
    <select id="id_pack_type" name="pack_type">
      <option value="">---------</option>
      ${view.packTypes.map((t) => html`<option value="${t.id}" data-slot-count="${t.slotCount}"${String(t.id) === selectedPackType && html` selected`}>${t.generation} · ${t.displayName}</option>`)}
    </select>
  </div>
  <div class="form-row field-rarity">
    <label for="id_rarity">Rarity</label>
    <select id="id_rarity" name="rarity">
      ${view.rarities.map((r) => html`<option value="${r.name}"${r.name === selectedRarity && html` selected`}>${r.displayName}</option>`)}
    </select>
  </div>
  ${slots.map((i) => slotRow(i, values[`probability_slot${i}`] ?? ""))}
  <button type="submit">Save</button>
</form>
<section class="sum-check">
  <h2>Slot sums</h2>
  ${view.sumIssues.length === 0
        ? html`<p>All pack types sum to 1 in every slot.</p>`
        : html`<ul>${view.sumIssues.map((c) => html`<li class="warning">${formatCheck(c)}</li>`)}</ul>`}
</section>`;
}
