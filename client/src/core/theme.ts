/**
 * theme.ts
 *
 * Light/dark/auto theme preference. The preference is stored in
 * localStorage; `auto` follows the system colour scheme and is re-applied
 * whenever the system setting changes. The resolved theme lands in the
 * `data-theme` attribute of `<html>`.
 */

import type {ResolvedTheme, ThemePreference} from '../../../shared/types/page-config.js';

export const THEME_STORAGE_KEY = 'tcg-tracker-theme';
export const DARK_SCHEME_QUERY = '(prefers-color-scheme: dark)';

const TITLES: Record<ThemePreference, string> = {
    light: 'Light mode (click for dark)',
    dark: 'Dark mode (click for auto)',
    auto: 'Auto mode (click for light)',
};

const ICON_IDS: Record<ThemePreference, string> = {
    light: 'sun-icon',
    dark: 'moon-icon',
    auto: 'auto-icon',
};

export function isThemePreference(value: unknown): value is ThemePreference {
    return value === 'light' || value === 'dark' || value === 'auto';
}

export function resolveTheme(pref: ThemePreference, systemPrefersDark: boolean): ResolvedTheme {
    if (pref === 'auto') return systemPrefersDark ? 'dark' : 'light';
    return pref;
}

export function nextTheme(pref: ThemePreference): ThemePreference {
    switch (pref) {
        case 'light':
            return 'dark';
        case 'dark':
            return 'auto';
        case 'auto':
            return 'light';
    }
}

// The part of MediaQueryList the manager needs
export interface ColorSchemeQuery {
    readonly matches: boolean;

    addEventListener(type: 'change', listener: () => void): void;

    removeEventListener(type: 'change', listener: () => void): void;
}

export type ThemeManagerOptions = {
    storage: Pick<Storage, 'getItem' | 'setItem'>;
    // null when matchMedia is unavailable; auto then resolves to light
    media: ColorSchemeQuery | null;
    document: Document;
    storageKey?: string;
};

export class ThemeManager {
    private readonly storage: ThemeManagerOptions['storage'];
    private readonly media: ColorSchemeQuery | null;
    private readonly doc: Document;
    private readonly storageKey: string;
    private button: HTMLElement | null = null;

    constructor(opts: ThemeManagerOptions) {
        this.storage = opts.storage;
        this.media = opts.media;
        this.doc = opts.document;
        this.storageKey = opts.storageKey ?? THEME_STORAGE_KEY;
    }

    /**
     * Apply the stored preference and start listening for toggle clicks and
     * system changes.
     */
    init() {
        this.setTheme(this.current());
        this.button = this.doc.getElementById('theme-toggle');
        this.button?.addEventListener('click', this.onToggle);
        this.media?.addEventListener('change', this.onSystemChange);
    }

    destroy() {
        this.button?.removeEventListener('click', this.onToggle);
        this.media?.removeEventListener('change', this.onSystemChange);
        this.button = null;
    }

    current(): ThemePreference {
        const stored = this.storage.getItem(this.storageKey);
        return isThemePreference(stored) ? stored : 'auto';
    }

    resolved(): ResolvedTheme {
        return resolveTheme(this.current(), this.media?.matches ?? false);
    }

    setTheme(pref: ThemePreference) {
        this.doc.documentElement.setAttribute('data-theme', resolveTheme(pref, this.media?.matches ?? false));
        this.storage.setItem(this.storageKey, pref);
        this.updateToggleButton(pref);
    }

    toggle(): ThemePreference {
        const next = nextTheme(this.current());
        this.setTheme(next);
        return next;
    }

    private onToggle = () => {
        this.toggle();
    };

    private onSystemChange = () => {
        if (this.current() === 'auto') this.setTheme('auto');
    };

    private updateToggleButton(pref: ThemePreference) {
        const button = this.doc.getElementById('theme-toggle');
        if (!button) return;
        for (const [theme, id] of Object.entries(ICON_IDS)) {
            const icon = this.doc.getElementById(id);
            if (!icon) continue;
            const visible = theme === pref;
            icon.classList.toggle('hidden', !visible);
            icon.classList.toggle('visible', visible);
        }
        button.title = TITLES[pref];
    }
}
