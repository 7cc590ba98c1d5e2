/**
 * pg.ts
 *
 * Shared `pg` connection pool used by every repository module. The pool is
 * created lazily from `DATABASE_URL` so importing a repository (in tests or
 * scripts) does not open a connection.
 */

import pg from "pg";
import {getConfig} from "../config.js";

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
    if (!pool) {
        pool = new pg.Pool({connectionString: getConfig().DATABASE_URL, max: 10});
    }
    return pool;
}

export async function closePool() {
    if (!pool) return;
    const p = pool;
    pool = null;
    await p.end();
}

/**
 * Run `fn` inside a transaction on a dedicated client. Rolls back and
 * rethrows when `fn` throws.
 */
export async function withTransaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query("BEGIN");
        const result = await fn(client);
        await client.query("COMMIT");
        return result;
    } catch (e) {
        await client.query("ROLLBACK");
        throw e;
    } finally {
        client.release();
    }
}
