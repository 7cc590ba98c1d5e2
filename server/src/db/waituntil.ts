/**
 * waituntil.ts
 *
 * Retry an async check until it succeeds or the attempts run out. Each
 * failure is logged as a warning. Used at start-up to wait for Postgres.
 */

import type {InfraLogger} from "../logging.js";

export type WaitOptions = {
    attempts?: number;
    delayMs?: number;
};

export async function waitUntil<T>(
    fn: () => Promise<T>,
    name: string,
    log: InfraLogger,
    {attempts = 30, delayMs = 1000}: WaitOptions = {},
): Promise<T> {
    for (let i = 1; i <= attempts; i++) {
        try {
            return await fn();
        } catch (e) {
            const err = e instanceof Error ? e.message : String(e);
            log.warn({err, attempt: i}, `${name} not ready`);
            if (i < attempts) await new Promise((r) => setTimeout(r, delayMs));
        }
    }
    throw new Error(`${name} not ready after ${attempts} attempts`);
}
