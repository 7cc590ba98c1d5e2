/**
 * slot-visibility.ts
 *
 * Admin probability form: show only as many slot rows as the selected pack
 * type has (`data-slot-count` on the option, 5 when absent).
 */

export const SLOT_ROWS = 5;
const DEFAULT_SLOT_COUNT = 5;

export function slotCountOf(select: HTMLSelectElement): number {
    const raw = select.selectedOptions[0]?.getAttribute('data-slot-count');
    const n = parseInt(raw || String(DEFAULT_SLOT_COUNT), 10);
    return Number.isNaN(n) ? DEFAULT_SLOT_COUNT : n;
}

export function applySlotVisibility(select: HTMLSelectElement, root: ParentNode = document) {
    const count = slotCountOf(select);
    for (let i = 1; i <= SLOT_ROWS; i++) {
        const row = root.querySelector<HTMLElement>(`.form-row.field-probability_slot${i}`);
        if (row) row.style.display = i <= count ? '' : 'none';
    }
}

/**
 * Apply now and on every change of `#id_pack_type`. Returns false when the
 * page has no such select.
 */
export function bindSlotVisibility(root: Document = document): boolean {
    const select = root.getElementById('id_pack_type');
    if (!(select instanceof HTMLSelectElement)) return false;
    select.addEventListener('change', () => applySlotVisibility(select, root));
    applySlotVisibility(select, root);
    return true;
}
