/**
 * log.ts
 *
 * Minimal logging helpers. `debug` is gated by `window.__LOG_DEBUG` or the
 * page config's `logDebug` flag.
 */

import './config.js';

function debugEnabled(): boolean {
    if (typeof window === 'undefined') return false;
    return window.__LOG_DEBUG === true || window.__CFG__?.logDebug === true;
}

/**
 * Logs debug messages to the console if the debug flag is enabled.
 */
export function debug(...args: unknown[]) {
    if (debugEnabled()) console.log(...args);
}

export function info(...args: unknown[]) {
    console.log(...args);
}

export function warn(...args: unknown[]) {
    console.warn(...args);
}

export function error(...args: unknown[]) {
    console.error(...args);
}
