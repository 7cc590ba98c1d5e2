/**
 * infra.ts
 *
 * Start-up and shutdown of the infrastructure the server depends on:
 * - waits until Postgres answers `SELECT 1`
 * - runs a background ping that logs when the database becomes unreachable
 * - closes the pool on shutdown
 */

import type {InfraLogger} from '../logging.js';
import {closePool, getPool} from './pg.js';
import {waitUntil} from './waituntil.js';

let pingHandle: NodeJS.Timeout | null = null;

export async function pingDatabase() {
    await getPool().query('SELECT 1');
}

export async function initInfra(log: InfraLogger) {
    getPool().on('error', (e: Error) => {
        log.error({err: e.message}, 'idle postgres client error');
    });

    await waitUntil(pingDatabase, 'postgres', log);

    pingHandle = setInterval(() => {
        pingDatabase().catch((e: unknown) => {
            log.error({err: e instanceof Error ? e.message : String(e)}, 'postgres became unreachable');
        });
    }, 60_000);
    pingHandle.unref();
}

export async function closeInfra(log: InfraLogger) {
    log.info('closing infra…');
    if (pingHandle) {
        clearInterval(pingHandle);
        pingHandle = null;
    }
    await closePool().catch((e: unknown) => log.error({err: e}, 'postgres pool close failed'));
}
