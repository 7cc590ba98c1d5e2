/**
 * migrations.ts
 *
 * Applies the plain SQL files under `server/sql/` in lexical order. Applied
 * file names are recorded in `schema_migrations`; each file runs in its own
 * transaction, so a failing migration leaves earlier ones in place.
 */

import {readdir, readFile} from "node:fs/promises";
import path from "node:path";
import type {InfraLogger} from "../logging.js";

export const DEFAULT_MIGRATIONS_DIR = path.join(process.cwd(), "server", "sql");

// Satisfied by pg's Pool and PoolClient
export interface SqlClient {
    query(sql: string, params?: unknown[]): Promise<{rows: unknown[]}>;
}

function nameOf(row: unknown): string[] {
    if (typeof row !== "object" || row === null || !("name" in row)) return [];
    return typeof row.name === "string" ? [row.name] : [];
}

export async function listMigrationFiles(dir: string): Promise<string[]> {
    const entries = await readdir(dir);
    return entries.filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Apply pending migrations. Returns the names of the files that ran.
 */
export async function applyMigrations(
    client: SqlClient,
    log: InfraLogger,
    dir = DEFAULT_MIGRATIONS_DIR,
): Promise<string[]> {
    await client.query(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            name TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )`,
    );
    const done = await client.query("SELECT name FROM schema_migrations");
    const applied = new Set(done.rows.flatMap(nameOf));

    const ran: string[] = [];
    for (const file of await listMigrationFiles(dir)) {
        if (applied.has(file)) continue;
        const sql = await readFile(path.join(dir, file), "utf8");
        log.info({file}, "applying migration");
        await client.query("BEGIN");
        try {
            await client.query(sql);
            await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
            await client.query("COMMIT");
        } catch (e) {
            await client.query("ROLLBACK");
            throw e;
        }
        ran.push(file);
    }
    return ran;
}
