/**
 * setDetail.ts
 *
 * The set page: progress header, the per-rarity progress fragment and the
 * card table enhanced by the `<collection-table>` element. Row markup
 * (`data-card-id`, `data-rarity`, `data-action`, `.status-cell`) is the
 * contract the client scripts work against.
 */

import type {CollectAction} from "../../../shared/types/collection.js";
import type {SetProgress} from "../tracker/progress.js";
import type {Card, CardSet, Rarity} from "../tracker/types.js";
import {html, type Html} from "./html.js";

export const COLLECTED_ICON = "✅";
export const UNCOLLECTED_ICON = "❌";
export const JUMP_RARITY = "illustration_rare";

export type SetDetailView = {
    set: CardSet;
    cards: Card[];
    owned: ReadonlySet<number>;
    rarities: Map<string, Rarity>;
    progress: SetProgress;
};

export function rarityLabel(rarities: Map<string, Rarity>, name: string): string {
    return rarities.get(name)?.displayName ?? name;
}

/**
 * `<div id="rarity-progress">` with one counter per rarity group present in
 * the set. Served alone for `?fragment=rarity_progress`.
 */
export function renderRarityProgress(progress: SetProgress, rarities: Map<string, Rarity>): Html {
    const items = progress.rarityProgress.filter((g) => g.total > 0);
    return html`<div id="rarity-progress" class="rarity-progress">
  ${items.map((g) => html`<div class="rarity-progress-item" data-rarity-group="${g.group.key}">
    <span class="rarity-label">${g.group.rarities.map((r) => rarityLabel(rarities, r)).join(" / ")}</span>
    <span class="rarity-count">${g.collected}/${g.total}</span>
  </div>`)}
</div>`;
}

export function progressBar(percent: number): Html {
    return html`<div class="progress" role="progressbar" aria-valuenow="${percent}" aria-valuemin="0" aria-valuemax="100">
  <div class="progress-bar" style="width: ${percent}%"></div>
</div>`;
}

function cardRow(card: Card, collected: boolean, rarities: Map<string, Rarity>): Html {
    const action: CollectAction = collected ? "uncollect" : "collect";
    return html`<tr class="clickable-row" data-card-id="${card.id}" data-rarity="${card.rarity}" data-action="${action}">
      <td>${card.number}</td>
      <td>${card.name}</td>
      <td>${rarityLabel(rarities, card.rarity)}</td>
      <td class="status-cell">${collected ? COLLECTED_ICON : UNCOLLECTED_ICON}</td>
    </tr>`;
}

function sortableHeader(key: string, label: string): Html {
    return html`<th class="sortable" data-sort="${key}">${label} <span class="sort-arrow"></span></th>`;
}

export function renderSetDetail(view: SetDetailView): Html {
    const {set, cards, owned, rarities, progress} = view;
    return html`<section class="set-header">
  <h1>${set.name} <small class="set-number">${set.number}</small></h1>
  <p class="set-progress-summary">${progress.collected}/${progress.total} collected (${progress.progressPercent}%)</p>
  ${progressBar(progress.progressPercent)}
  ${renderRarityProgress(progress, rarities)}
</section>

<collection-table jump-rarity="${JUMP_RARITY}">
  <div class="table-tools">
    <input id="table-filter" type="search" placeholder="Filter cards…" aria-label="Filter cards">
    <button id="collect-base-btn" type="button">Collect all base cards</button>
    <button id="jump-to-illustration-rare-btn" type="button">Jump to illustration rares</button>
  </div>
  <table class="card-table">
    <thead>
      <tr>
        ${sortableHeader("number", "#")}
        ${sortableHeader("name", "Name")}
        ${sortableHeader("rarity", "Rarity")}
        ${sortableHeader("status", "Status")}
      </tr>
    </thead>
    <tbody>
    ${cards.map((c) => cardRow(c, owned.has(c.id), rarities))}
    </tbody>
  </table>
</collection-table>

<floating-buttons>
  <div id="floating-btns" class="floating-btns" style="display: none">
    <a id="floating-back-btn" class="btn" href="/">← Back</a>
    <button id="scroll-to-top-btn" class="btn" type="button">↑ Top</button>
  </div>
</floating-buttons>`;
}
