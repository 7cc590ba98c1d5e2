/**
 * page-config.ts
 *
 * Shape of the `window.__CFG__` object every server-rendered page embeds for
 * its scripts.
 */

export type PageConfig = {
    // Token echoed back in the `X-CSRF-Token` header on POST requests
    csrfToken: string;
    uncollectConfirmText: string;
    collectBaseConfirmText: string;
    // Mirrors `window.__LOG_DEBUG` for verbose client logging
    logDebug: boolean;
};

export type ThemePreference = "light" | "dark" | "auto";

export type ResolvedTheme = "light" | "dark";
