/**
 * config.ts
 *
 * Access to the `window.__CFG__` object the server embeds in every page.
 * Pages rendered without it (or tests) get the defaults below.
 */

import type {PageConfig} from '../../../shared/types/page-config.js';

declare global {
    interface Window {
        __CFG__?: Partial<PageConfig>;
        __LOG_DEBUG?: boolean;
    }
}

export const DEFAULT_PAGE_CONFIG: PageConfig = {
    csrfToken: '',
    uncollectConfirmText: 'Are you sure you want to uncollect this card?',
    collectBaseConfirmText: 'Are you sure you want to collect all base cards?',
    logDebug: false,
};

export function getPageConfig(): PageConfig {
    return {...DEFAULT_PAGE_CONFIG, ...(window.__CFG__ ?? {})};
}
