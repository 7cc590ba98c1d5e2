/**
 * home.ts
 *
 * Start page: card search and every set with its collection progress.
 * Search results carry plain forms so collecting works without scripts.
 */

import type {CollectAction} from "../../../shared/types/collection.js";
import type {SetProgress} from "../tracker/progress.js";
import type {CardSearchResult, CardSet, Rarity} from "../tracker/types.js";
import {html, type Html} from "./html.js";
import {COLLECTED_ICON, UNCOLLECTED_ICON, progressBar, rarityLabel} from "./setDetail.js";

export type HomeView = {
    sets: {set: CardSet; progress: SetProgress}[];
    searchQuery: string;
    searchResults: CardSearchResult[];
    owned: ReadonlySet<number>;
    rarities: Map<string, Rarity>;
    csrfToken: string;
};

function searchResultRow(card: CardSearchResult, view: HomeView): Html {
    const collected = view.owned.has(card.id);
    const action: CollectAction = collected ? "uncollect" : "collect";
    return html`<tr>
      <td><a href="/set/${encodeURIComponent(card.setNumber)}">${card.setName}</a></td>
      <td>${card.number}</td>
      <td>${card.name}</td>
      <td>${rarityLabel(view.rarities, card.rarity)}</td>
      <td>
        <form method="post" action="/" class="inline-form">
          <input type="hidden" name="csrf" value="${view.csrfToken}">
          <input type="hidden" name="card_id" value="${card.id}">
          <input type="hidden" name="action" value="${action}">
          <input type="hidden" name="q" value="${view.searchQuery}">
          <button type="submit" class="link-button" title="${action}">${collected ? COLLECTED_ICON : UNCOLLECTED_ICON}</button>
        </form>
      </td>
    </tr>`;
}

function searchSection(view: HomeView): Html {
    const results = view.searchQuery
        ? view.searchResults.length > 0
            ? html`<table class="search-results">
    <thead><tr><th>Set</th><th>#</th><th>Name</th><th>Rarity</th><th>Status</th></tr></thead>
    <tbody>${view.searchResults.map((c) => searchResultRow(c, view))}</tbody>
  </table>`
            : html`<p class="empty">No cards match “${view.searchQuery}”.</p>`
        : null;
    return html`<section class="search">
  <form method="get" action="/" class="search-form">
    <input type="search" name="q" value="${view.searchQuery}" placeholder="Search cards…" aria-label="Search cards">
    <button type="submit">Search</button>
  </form>
  ${results}
</section>`;
}

function setCard(entry: HomeView["sets"][number], rarities: Map<string, Rarity>): Html {
    const {set, progress} = entry;
    return html`<article class="set-card">
  <h2><a href="/set/${encodeURIComponent(set.number)}">${set.name}</a> <small>${set.number}</small></h2>
  <p>${progress.collected}/${progress.total} (${progress.progressPercent}%)</p>
  ${progressBar(progress.progressPercent)}
  <ul class="rarity-summary">
    ${progress.rarityProgress.filter((g) => g.total > 0).map((g) => html`<li>
      <span class="rarity-label">${g.group.rarities.map((r) => rarityLabel(rarities, r)).join(" / ")}</span>
      <span class="rarity-count">${g.collected}/${g.total}</span>
    </li>`)}
  </ul>
</article>`;
}

export function renderHome(view: HomeView): Html {
    return html`${searchSection(view)}
<section class="sets">
  ${view.sets.length === 0 ? html`<p class="empty">No sets imported yet.</p>` : view.sets.map((s) => setCard(s, view.rarities))}
</section>`;
}
