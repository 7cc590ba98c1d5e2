/**
 * packs.ts
 *
 * Pack list grouped by set, ordered by how likely each pack is to contain a
 * card the user is missing.
 */

import type {PackGroup, PackSummary} from "../tracker/odds.js";
import {html, type Html} from "./html.js";
import {progressBar} from "./setDetail.js";

function packRow(pack: PackSummary): Html {
    return html`<tr class="${pack.isBest ? "best-pack" : ""}" data-pack-id="${pack.packId}">
      <td>${pack.packName}${pack.isBest && html` <span class="badge">Best odds</span>`}</td>
      <td class="chance">${pack.chancePercent}%</td>
      <td>${pack.owned}/${pack.total}</td>
      <td>${progressBar(pack.progressPercent)}</td>
      <td>${pack.incompleteBase ? "Base cards missing" : "Base complete"}</td>
    </tr>`;
}

export function renderPacks(groups: PackGroup[]): Html {
    if (groups.length === 0) {
        return html`<h1>Packs</h1>
<p class="empty">No packs are available right now.</p>`;
    }
    return html`<h1>Packs</h1>
${groups.map((g) => html`<section class="pack-group">
  <h2><a href="/set/${encodeURIComponent(g.setNumber)}">${g.setName}</a> <small>${g.setNumber}</small></h2>
  <table class="pack-table">
    <thead><tr><th>Pack</th><th>Chance of a new card</th><th>Owned</th><th>Progress</th><th>Base</th></tr></thead>
    <tbody>${g.packs.map(packRow)}</tbody>
  </table>
</section>`)}`;
}
