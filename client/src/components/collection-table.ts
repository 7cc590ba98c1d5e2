/**
 * collection-table.ts
 *
 * `<collection-table>` wraps the server-rendered card table of a set page:
 * - sortable headers (`th.sortable[data-sort]`), sorted by number on load
 * - live filter through `#table-filter`
 * - row click toggles collected/uncollected over AJAX and refreshes the
 *   rarity progress block
 * - `#collect-base-btn` collects every missing base-rarity card
 * - `#jump-to-illustration-rare-btn` scrolls to the first row of the rarity
 *   named in the `jump-rarity` attribute
 */

import {type CollectAction, isBaseRarity} from '../../../shared/types/collection.js';
import type {PageConfig} from '../../../shared/types/page-config.js';
import {getPageConfig} from '../core/config.js';
import * as log from '../core/log.js';
import {filterRows, isSortKey, SORT_ARROWS, type SortDirection, type SortKey, sortRows} from '../core/table.js';
import {type FetchFn, fetchRarityProgress, postCollect} from '../net/collection.js';

export const COLLECTED_ICON = '✅';
export const UNCOLLECTED_ICON = '❌';
export const HIGHLIGHT_MS = 2000;
const DEFAULT_JUMP_RARITY = 'illustration_rare';

export type CollectionTableDeps = {
    fetch: FetchFn;
    confirm: (message: string) => boolean;
    config: PageConfig;
    // Page path the POST and fragment requests go to
    path: string;
};

function defaultDeps(): CollectionTableDeps {
    return {
        fetch: (input, init) => window.fetch(input, init),
        confirm: (message) => window.confirm(message),
        config: getPageConfig(),
        path: window.location.pathname,
    };
}

function actionOf(row: HTMLTableRowElement): CollectAction {
    return row.dataset.action === 'uncollect' ? 'uncollect' : 'collect';
}

export class CollectionTable extends HTMLElement {
    // Replaceable before the element is connected
    deps: CollectionTableDeps | null = null;
    private directions = new Map<SortKey, SortDirection>();

    connectedCallback() {
        this.deps ??= defaultDeps();
        this.sortBy('number', 'asc');
        this.bind();
    }

    private get tbody(): HTMLTableSectionElement | null {
        return this.querySelector('tbody');
    }

    rows(): HTMLTableRowElement[] {
        return Array.from(this.tbody?.querySelectorAll<HTMLTableRowElement>('tr.clickable-row') ?? []);
    }

    private bind() {
        this.querySelectorAll<HTMLTableCellElement>('th.sortable').forEach((th) => {
            th.addEventListener('click', () => {
                const key = th.dataset.sort;
                if (!isSortKey(key)) return;
                this.sortBy(key, this.directions.get(key) === 'asc' ? 'desc' : 'asc');
            });
        });

        const filter = this.querySelector<HTMLInputElement>('#table-filter');
        filter?.addEventListener('input', () => filterRows(this.rows(), filter.value));

        this.tbody?.addEventListener('click', (ev) => {
            if (!(ev.target instanceof Element)) return;
            const row = ev.target.closest<HTMLTableRowElement>('tr.clickable-row');
            if (row) void this.toggleRow(row);
        });

        this.querySelector('#collect-base-btn')?.addEventListener('click', () => {
            void this.collectBase();
        });
        this.querySelector('#jump-to-illustration-rare-btn')?.addEventListener('click', () => {
            this.jumpToRarity(this.getAttribute('jump-rarity') ?? DEFAULT_JUMP_RARITY);
        });
    }

    /**
     * Reorder the rows and move the arrow to the header of `key`.
     */
    sortBy(key: SortKey, direction: SortDirection) {
        const tbody = this.tbody;
        if (!tbody) return;
        this.directions.set(key, direction);
        for (const row of sortRows(this.rows(), key, direction)) tbody.appendChild(row);

        this.querySelectorAll('.sort-arrow').forEach((span) => {
            span.textContent = '';
        });
        const arrow = this.querySelector(`th.sortable[data-sort="${key}"] .sort-arrow`);
        if (arrow) arrow.textContent = SORT_ARROWS[direction];
    }

    private setCollected(row: HTMLTableRowElement, collected: boolean) {
        const cell = row.querySelector('.status-cell');
        if (cell) cell.textContent = collected ? COLLECTED_ICON : UNCOLLECTED_ICON;
        row.dataset.action = collected ? 'uncollect' : 'collect';
    }

    /**
     * Flip one row. Uncollecting asks for confirmation first. Failures are
     * logged and leave the row as it was.
     */
    async toggleRow(row: HTMLTableRowElement): Promise<void> {
        const deps = this.deps ?? defaultDeps();
        const cardId = row.dataset.cardId;
        if (!cardId) return;
        const action = actionOf(row);
        if (action === 'uncollect' && !deps.confirm(deps.config.uncollectConfirmText)) return;

        try {
            const res = await postCollect(deps.fetch, deps.path, cardId, action, deps.config.csrfToken);
            this.setCollected(row, res.collected);
            log.debug('[collection-table] toggled', cardId, res.collected);
            await this.refreshProgress(deps);
        } catch (e) {
            log.error('[collection-table] toggle failed', cardId, e);
        }
    }

    private async refreshProgress(deps: CollectionTableDeps) {
        const inner = await fetchRarityProgress(deps.fetch, deps.path);
        const target = document.getElementById('rarity-progress');
        if (inner !== null && target) target.innerHTML = inner;
    }

    /**
     * One POST per uncollected base-rarity row, all started at once. Rows
     * flip as their answers arrive; failed rows stay unchanged.
     */
    async collectBase(): Promise<void> {
        const deps = this.deps ?? defaultDeps();
        if (!deps.confirm(deps.config.collectBaseConfirmText)) return;

        const pending = this.rows()
            .filter((row) => isBaseRarity(row.dataset.rarity ?? '') && actionOf(row) === 'collect')
            .map(async (row) => {
                const cardId = row.dataset.cardId;
                if (!cardId) return;
                const res = await postCollect(deps.fetch, deps.path, cardId, 'collect', deps.config.csrfToken);
                if (res.collected) this.setCollected(row, true);
            });
        const results = await Promise.allSettled(pending);
        const failed = results.filter((r) => r.status === 'rejected').length;
        if (failed > 0) log.error(`[collection-table] ${failed} of ${results.length} base collects failed`);
        log.debug('[collection-table] bulk collect done', results.length);
    }

    jumpToRarity(rarity: string): HTMLTableRowElement | null {
        const row = this.rows().find((r) => r.dataset.rarity === rarity) ?? null;
        if (!row) return null;
        row.scrollIntoView({behavior: 'smooth', block: 'center'});
        row.classList.add('highlight');
        setTimeout(() => row.classList.remove('highlight'), HIGHLIGHT_MS);
        return row;
    }
}

if (!customElements.get('collection-table')) {
    customElements.define('collection-table', CollectionTable);
}
