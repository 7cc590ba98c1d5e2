// @vitest-environment jsdom
/**
 * theme.test.ts
 *
 * Theme preference cycling and resolution against a fake storage and a fake
 * colour scheme query.
 */

import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {type ColorSchemeQuery, nextTheme, resolveTheme, THEME_STORAGE_KEY, ThemeManager} from '../src/core/theme.js';

class MemoryStorage {
    readonly items = new Map<string, string>();

    getItem(key: string): string | null {
        return this.items.get(key) ?? null;
    }

    setItem(key: string, value: string) {
        this.items.set(key, value);
    }
}

class FakeMedia implements ColorSchemeQuery {
    private listeners = new Set<() => void>();

    constructor(public matches: boolean) {
    }

    addEventListener(_type: 'change', listener: () => void) {
        this.listeners.add(listener);
    }

    removeEventListener(_type: 'change', listener: () => void) {
        this.listeners.delete(listener);
    }

    change(matches: boolean) {
        this.matches = matches;
        this.listeners.forEach((l) => l());
    }
}

let manager: ThemeManager | null = null;

function start(stored: string | null, systemDark: boolean) {
    const storage = new MemoryStorage();
    if (stored !== null) storage.setItem(THEME_STORAGE_KEY, stored);
    const media = new FakeMedia(systemDark);
    manager = new ThemeManager({storage, media, document});
    manager.init();
    return {storage, media, manager};
}

function theme() {
    return document.documentElement.getAttribute('data-theme');
}

beforeEach(() => {
    document.body.innerHTML = `<button id="theme-toggle" type="button">
  <span id="sun-icon" class="hidden"></span>
  <span id="moon-icon" class="hidden"></span>
  <span id="auto-icon" class="visible"></span>
</button>`;
});

afterEach(() => {
    manager?.destroy();
    manager = null;
});

describe('resolveTheme and nextTheme', () => {
    it('resolves auto from the system setting', () => {
        expect(resolveTheme('auto', true)).toBe('dark');
        expect(resolveTheme('auto', false)).toBe('light');
        expect(resolveTheme('light', true)).toBe('light');
    });

    it('cycles light, dark, auto', () => {
        expect(nextTheme('light')).toBe('dark');
        expect(nextTheme('dark')).toBe('auto');
        expect(nextTheme('auto')).toBe('light');
    });
});

describe('ThemeManager', () => {
    it('starts in auto and follows a dark system', () => {
        const {storage} = start(null, true);
        expect(theme()).toBe('dark');
        expect(storage.getItem(THEME_STORAGE_KEY)).toBe('auto');
        expect(document.getElementById('auto-icon')?.className).toBe('visible');
    });

    it('keeps an explicit light preference on a dark system', () => {
        start('light', true);
        expect(theme()).toBe('light');
        expect(document.getElementById('sun-icon')?.className).toBe('visible');
        expect(document.getElementById('moon-icon')?.className).toBe('hidden');
    });

    it('treats an unknown stored value as auto', () => {
        const {manager: m} = start('sepia', false);
        expect(m.current()).toBe('auto');
        expect(theme()).toBe('light');
    });

    it('returns to the starting preference after three toggles', () => {
        const {manager: m} = start('dark', false);
        expect(m.toggle()).toBe('auto');
        expect(m.toggle()).toBe('light');
        expect(m.toggle()).toBe('dark');
        expect(theme()).toBe('dark');
    });

    it('toggles on button clicks and updates the title', () => {
        const {manager: m} = start(null, false);
        document.getElementById('theme-toggle')?.click();
        expect(m.current()).toBe('light');
        expect(document.getElementById('theme-toggle')?.title).toBe('Light mode (click for dark)');
    });

    it('applies system changes only in auto mode', () => {
        const {media} = start(null, false);
        media.change(true);
        expect(theme()).toBe('dark');

        manager?.setTheme('light');
        media.change(false);
        media.change(true);
        expect(theme()).toBe('light');
    });
});
