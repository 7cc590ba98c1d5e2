// @vitest-environment jsdom
/**
 * slot-visibility.test.ts
 *
 * Slot rows of the admin probability form follow the selected pack type.
 */

import {describe, it, expect, beforeEach} from 'vitest';
import {bindSlotVisibility, slotCountOf} from '../src/admin/slot-visibility.js';

function displays(): string[] {
    return [1, 2, 3, 4, 5, 6].map(
        (i) => document.querySelector<HTMLElement>(`.form-row.field-probability_slot${i}`)?.style.display ?? 'missing',
    );
}

function select(): HTMLSelectElement {
    const el = document.getElementById('id_pack_type');
    if (!(el instanceof HTMLSelectElement)) throw new Error('select missing');
    return el;
}

beforeEach(() => {
    const rows = [1, 2, 3, 4, 5, 6]
        .map((i) => `<div class="form-row field-probability_slot${i}"><input name="probability_slot${i}"></div>`)
        .join('');
    document.body.innerHTML = `<form>
<select id="id_pack_type">
  <option value="">---------</option>
  <option value="1" data-slot-count="3">G1 · Small</option>
  <option value="2" data-slot-count="abc">G1 · Broken</option>
</select>
${rows}
</form>`;
});

describe('slotCountOf', () => {
    it('defaults to five without a slot count', () => {
        expect(slotCountOf(select())).toBe(5);
    });

    it('reads the selected option', () => {
        select().value = '1';
        expect(slotCountOf(select())).toBe(3);
    });

    it('falls back to five for a non-numeric count', () => {
        select().value = '2';
        expect(slotCountOf(select())).toBe(5);
    });
});

describe('bindSlotVisibility', () => {
    it('shows the first five rows initially', () => {
        expect(bindSlotVisibility(document)).toBe(true);
        expect(displays()).toEqual(['', '', '', '', '', '']);
    });

    it('hides rows beyond the slot count on change', () => {
        bindSlotVisibility(document);
        select().value = '1';
        select().dispatchEvent(new Event('change'));
        expect(displays()).toEqual(['', '', '', 'none', 'none', '']);
    });

    it('reports a page without the select', () => {
        document.body.innerHTML = '<form></form>';
        expect(bindSlotVisibility(document)).toBe(false);
    });
});
