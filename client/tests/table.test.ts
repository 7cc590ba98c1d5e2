// @vitest-environment jsdom
/**
 * table.test.ts
 *
 * Sorting and filtering of card table rows.
 */

import {describe, it, expect, beforeEach} from 'vitest';
import {filterRows, sortRows, sortValue} from '../src/core/table.js';

function rows(): HTMLTableRowElement[] {
    return Array.from(document.querySelectorAll<HTMLTableRowElement>('tbody tr'));
}

function names(list: HTMLTableRowElement[]): string[] {
    return list.map((r) => r.cells[1]?.textContent ?? '');
}

beforeEach(() => {
    document.body.innerHTML = `<table><tbody>
<tr data-rarity="rare"><td>10</td><td>Bravo</td><td>R</td><td class="status-cell">❌</td></tr>
<tr data-rarity="common"><td>2</td><td>alpha</td><td>C</td><td class="status-cell">✅</td></tr>
<tr data-rarity="mystery"><td>x</td><td>Charlie</td><td>?</td><td class="status-cell">❌</td></tr>
</tbody></table>`;
});

describe('sortValue', () => {
    it('reads numbers, lowercased names and rarity ranks', () => {
        const [bravo, , charlie] = rows();
        if (!bravo || !charlie) throw new Error('fixture rows missing');
        expect(sortValue(bravo, 'number')).toBe(10);
        expect(sortValue(charlie, 'number')).toBe(0);
        expect(sortValue(bravo, 'name')).toBe('bravo');
        expect(sortValue(bravo, 'rarity')).toBe(3);
        expect(sortValue(charlie, 'rarity')).toBe(99);
        expect(sortValue(bravo, 'status')).toBe('❌');
    });
});

describe('sortRows', () => {
    it('sorts numerically, not as text', () => {
        expect(names(sortRows(rows(), 'number', 'asc'))).toEqual(['Charlie', 'alpha', 'Bravo']);
    });

    it('sorts names case-insensitively', () => {
        expect(names(sortRows(rows(), 'name', 'asc'))).toEqual(['alpha', 'Bravo', 'Charlie']);
    });

    it('puts unknown rarities last in ascending order', () => {
        expect(names(sortRows(rows(), 'rarity', 'desc'))).toEqual(['Charlie', 'Bravo', 'alpha']);
    });

    it('keeps the original order of equal values', () => {
        expect(names(sortRows(rows(), 'status', 'asc'))).toEqual(['alpha', 'Bravo', 'Charlie']);
    });
});

describe('filterRows', () => {
    it('hides rows that do not contain the query', () => {
        expect(filterRows(rows(), 'ALP')).toBe(1);
        expect(rows().map((r) => r.style.display)).toEqual(['none', '', 'none']);
    });

    it('shows every row for an empty query', () => {
        filterRows(rows(), 'alp');
        expect(filterRows(rows(), '')).toBe(3);
        expect(rows().map((r) => r.style.display)).toEqual(['', '', '']);
    });
});
