/**
 * table.ts
 *
 * Sorting and filtering of the card table rows. Rows carry their rarity in
 * `data-rarity`; number and name are read from the first two cells and the
 * status from `.status-cell`.
 */

import {RARITY_ORDER, UNKNOWN_RARITY_RANK} from '../../../shared/types/collection.js';

export type SortKey = 'number' | 'name' | 'rarity' | 'status';
export type SortDirection = 'asc' | 'desc';

export const SORT_ARROWS: Record<SortDirection, string> = {asc: '▲', desc: '▼'};

export function isSortKey(value: string | undefined): value is SortKey {
    return value === 'number' || value === 'name' || value === 'rarity' || value === 'status';
}

function cellText(row: HTMLTableRowElement, index: number): string {
    return (row.cells[index]?.textContent ?? '').trim();
}

export function sortValue(
    row: HTMLTableRowElement,
    key: SortKey,
    rarityOrder: Readonly<Record<string, number>> = RARITY_ORDER,
): number | string {
    switch (key) {
        case 'number':
            return parseInt(cellText(row, 0), 10) || 0;
        case 'name':
            return cellText(row, 1).toLowerCase();
        case 'rarity':
            return rarityOrder[row.dataset.rarity ?? ''] ?? UNKNOWN_RARITY_RANK;
        case 'status':
            return (row.querySelector('.status-cell')?.textContent ?? '').trim();
    }
}

function compareValues(a: number | string, b: number | string): number {
    if (typeof a === 'number' && typeof b === 'number') return Math.sign(a - b);
    const x = String(a);
    const y = String(b);
    if (x < y) return -1;
    return x > y ? 1 : 0;
}

/**
 * Sorted copy of `rows`. Equal values keep their relative order.
 */
export function sortRows(
    rows: readonly HTMLTableRowElement[],
    key: SortKey,
    direction: SortDirection,
    rarityOrder: Readonly<Record<string, number>> = RARITY_ORDER,
): HTMLTableRowElement[] {
    const sign = direction === 'asc' ? 1 : -1;
    return rows
        .map((row) => ({row, value: sortValue(row, key, rarityOrder)}))
        .sort((a, b) => sign * compareValues(a.value, b.value))
        .map((e) => e.row);
}

export function rowText(row: HTMLTableRowElement): string {
    return Array.from(row.cells, (cell) => (cell.textContent ?? '').toLowerCase()).join(' ');
}

/**
 * Show rows whose cell text contains `query` (case-insensitive), hide the
 * rest. Returns the number of visible rows.
 */
export function filterRows(rows: Iterable<HTMLTableRowElement>, query: string): number {
    const needle = query.toLowerCase();
    let visible = 0;
    for (const row of rows) {
        const show = rowText(row).includes(needle);
        row.style.display = show ? '' : 'none';
        if (show) visible++;
    }
    return visible;
}
