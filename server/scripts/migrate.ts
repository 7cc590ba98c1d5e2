/**
 * migrate.ts
 *
 * Applies pending SQL migrations from `server/sql/` (or the directory given
 * as the first argument).
 *
 * Usage: `npm run migrate [-- <dir>]`
 */

import {loadDotEnv} from '../src/config.js';
import {closePool, getPool} from '../src/db/pg.js';
import {applyMigrations, DEFAULT_MIGRATIONS_DIR} from '../src/db/migrations.js';
import * as log from '../src/logging.js';

async function run() {
    loadDotEnv();
    const dir = process.argv[2] ?? DEFAULT_MIGRATIONS_DIR;
    const client = await getPool().connect();
    try {
        const ran = await applyMigrations(client, log.scriptLogger, dir);
        log.info(ran.length > 0 ? `applied ${ran.length} migration(s): ${ran.join(', ')}` : 'database is up to date');
    } finally {
        client.release();
    }
}

run()
    .then(() => closePool())
    .catch(async (e: unknown) => {
        log.error('migration failed', e);
        await closePool();
        process.exit(1);
    });
