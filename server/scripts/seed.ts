/**
 * seed.ts
 *
 * Imports a JSON card catalog into the database inside one transaction.
 * Safe to run repeatedly: every record is upserted.
 *
 * Usage: `npm run seed [-- <catalog.json>]` (default `server/data/catalog.json`)
 */

import {readFile} from 'node:fs/promises';
import path from 'node:path';
import {loadDotEnv} from '../src/config.js';
import {closePool, withTransaction} from '../src/db/pg.js';
import * as log from '../src/logging.js';
import {PgCatalogStore} from '../src/repositories/catalogStore.js';
import {importCatalog, parseCatalog} from '../src/tracker/catalogImport.js';

const DEFAULT_CATALOG = path.join(process.cwd(), 'server', 'data', 'catalog.json');

async function run() {
    loadDotEnv();
    const file = process.argv[2] ?? DEFAULT_CATALOG;
    log.info('>>> SEED START', file);
    const catalog = parseCatalog(JSON.parse(await readFile(file, 'utf8')));

    const summary = await withTransaction((client) =>
        importCatalog(new PgCatalogStore(client), catalog, log.scriptLogger));
    log.info('>>> SEED DONE', summary);
}

run()
    .then(() => closePool())
    .catch(async (e: unknown) => {
        log.error('seed failed', e);
        await closePool();
        process.exit(1);
    });
