/**
 * users.ts
 *
 * Account queries. Password hashes only leave this module through
 * `findCredentials` and `findPasswordHash`.
 */

import {getPool} from "../db/pg.js";
import type {User} from "../tracker/types.js";

type UserRow = {
    id: number;
    username: string;
    email: string;
    is_admin: boolean;
    created_at: Date;
};

const USER_COLUMNS = "id, username, email, is_admin, created_at";

function toUser(r: UserRow): User {
    return {
        id: r.id,
        username: r.username,
        email: r.email,
        isAdmin: r.is_admin,
        createdAt: r.created_at.toISOString(),
    };
}

export async function findUserById(id: number): Promise<User | null> {
    const res = await getPool().query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    const row = res.rows[0];
    return row ? toUser(row) : null;
}

export async function usernameOrEmailTaken(username: string, email: string): Promise<boolean> {
    const res = await getPool().query(
        `SELECT 1 FROM users WHERE lower(username) = lower($1) OR lower(email) = lower($2) LIMIT 1`,
        [username, email],
    );
    return (res.rowCount ?? 0) > 0;
}

export async function findCredentials(usernameOrEmail: string): Promise<(User & {passwordHash: string}) | null> {
    const res = await getPool().query<UserRow & {password_hash: string}>(
        `SELECT ${USER_COLUMNS}, password_hash FROM users
         WHERE lower(username) = lower($1) OR lower(email) = lower($1)
         LIMIT 1`,
        [usernameOrEmail],
    );
    const row = res.rows[0];
    return row ? {...toUser(row), passwordHash: row.password_hash} : null;
}

export async function createUser(input: {username: string; email: string; passwordHash: string}): Promise<User> {
    const res = await getPool().query<UserRow>(
        `WITH created AS (
             INSERT INTO users (username, email, password_hash) VALUES ($1, $2, $3)
             RETURNING ${USER_COLUMNS}
         ), profile AS (
             INSERT INTO user_profiles (user_id) SELECT id FROM created
         )
         SELECT ${USER_COLUMNS} FROM created`,
        [input.username, input.email, input.passwordHash],
    );
    const row = res.rows[0];
    if (!row) throw new Error("USER_INSERT_FAILED");
    return toUser(row);
}

export async function findPasswordHash(userId: number): Promise<string | null> {
    const res = await getPool().query<{password_hash: string}>(`SELECT password_hash FROM users WHERE id = $1`, [userId]);
    return res.rows[0]?.password_hash ?? null;
}

export async function updatePasswordHash(userId: number, passwordHash: string): Promise<void> {
    await getPool().query(`UPDATE users SET password_hash = $2 WHERE id = $1`, [userId, passwordHash]);
}

/**
 * Delete the account. Collection, profile and friend requests go with it
 * through `ON DELETE CASCADE`.
 */
export async function deleteUser(userId: number): Promise<void> {
    await getPool().query(`DELETE FROM users WHERE id = $1`, [userId]);
}
