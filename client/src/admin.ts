/**
 * admin.ts
 *
 * Entry script of the admin probability form.
 */

import {bindSlotVisibility} from './admin/slot-visibility.js';

if (document.readyState === 'loading') {
    document.addEventListener('DOMContentLoaded', () => bindSlotVisibility());
} else {
    bindSlotVisibility();
}
