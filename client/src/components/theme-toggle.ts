/**
 * theme-toggle.ts
 *
 * `<theme-toggle>` wires the header's theme button to a `ThemeManager`
 * backed by localStorage and the system colour scheme query.
 */

import {DARK_SCHEME_QUERY, ThemeManager} from '../core/theme.js';

export class ThemeToggle extends HTMLElement {
    manager: ThemeManager | null = null;

    connectedCallback() {
        this.manager = new ThemeManager({
            storage: window.localStorage,
            media: typeof window.matchMedia === 'function' ? window.matchMedia(DARK_SCHEME_QUERY) : null,
            document,
        });
        this.manager.init();
    }

    disconnectedCallback() {
        this.manager?.destroy();
        this.manager = null;
    }
}

if (!customElements.get('theme-toggle')) {
    customElements.define('theme-toggle', ThemeToggle);
}
