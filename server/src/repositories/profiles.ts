/**
 * profiles.ts
 *
 * Profile settings and friend requests. Every user has a profile row; it is
 * created together with the user.
 */

import {getPool} from "../db/pg.js";
import type {FriendRequest, Profile} from "../tracker/types.js";
import {escapeLike} from "./catalog.js";

type ProfileRow = {
    user_id: number;
    username: string;
    public: boolean;
    friend_code: string | null;
};

type RequestRow = {
    id: number;
    from_user: number;
    from_username: string;
    to_user: number;
    accepted: boolean;
    created_at: Date;
};

const PROFILE_SELECT = `SELECT p.user_id, u.username, p.public, p.friend_code
    FROM user_profiles p JOIN users u ON u.id = p.user_id`;

const REQUEST_SELECT = `SELECT r.id, r.from_user, f.username AS from_username, r.to_user, r.accepted, r.created_at
    FROM friend_requests r JOIN users f ON f.id = r.from_user`;

function toProfile(r: ProfileRow): Profile {
    return {userId: r.user_id, username: r.username, public: r.public, friendCode: r.friend_code};
}

function toRequest(r: RequestRow): FriendRequest {
    return {
        id: r.id,
        fromUserId: r.from_user,
        fromUsername: r.from_username,
        toUserId: r.to_user,
        accepted: r.accepted,
        createdAt: r.created_at.toISOString(),
    };
}

export async function findProfile(userId: number): Promise<Profile | null> {
    const res = await getPool().query<ProfileRow>(`${PROFILE_SELECT} WHERE p.user_id = $1`, [userId]);
    const row = res.rows[0];
    return row ? toProfile(row) : null;
}

export async function findPublicProfile(username: string): Promise<Profile | null> {
    const res = await getPool().query<ProfileRow>(
        `${PROFILE_SELECT} WHERE lower(u.username) = lower($1) AND p.public`,
        [username],
    );
    const row = res.rows[0];
    return row ? toProfile(row) : null;
}

export async function updateProfile(userId: number, input: {public: boolean; friendCode: string | null}): Promise<void> {
    await getPool().query(
        `INSERT INTO user_profiles (user_id, public, friend_code) VALUES ($1, $2, $3)
         ON CONFLICT (user_id) DO UPDATE SET public = EXCLUDED.public, friend_code = EXCLUDED.friend_code`,
        [userId, input.public, input.friendCode],
    );
}

/**
 * Public profiles whose username or friend code contains `query`
 * (case-insensitive), without the searching user.
 */
export async function searchPublicProfiles(query: string, excludeUserId: number, limit = 50): Promise<Profile[]> {
    const res = await getPool().query<ProfileRow>(
        `${PROFILE_SELECT}
         WHERE p.public AND u.id <> $2
           AND (u.username ILIKE '%' || $1 || '%' OR p.friend_code ILIKE '%' || $1 || '%')
         ORDER BY lower(u.username)
         LIMIT $3`,
        [escapeLike(query), excludeUserId, limit],
    );
    return res.rows.map(toProfile);
}

export async function listFriends(userId: number): Promise<Profile[]> {
    const res = await getPool().query<ProfileRow>(
        `${PROFILE_SELECT}
         WHERE p.user_id IN (
             SELECT to_user FROM friend_requests WHERE from_user = $1 AND accepted
             UNION
             SELECT from_user FROM friend_requests WHERE to_user = $1 AND accepted
         )
         ORDER BY lower(u.username)`,
        [userId],
    );
    return res.rows.map(toProfile);
}

/**
 * Every request sent or received by `userId`, accepted or not.
 */
export async function listFriendRequests(userId: number): Promise<FriendRequest[]> {
    const res = await getPool().query<RequestRow>(
        `${REQUEST_SELECT} WHERE r.from_user = $1 OR r.to_user = $1 ORDER BY r.created_at DESC`,
        [userId],
    );
    return res.rows.map(toRequest);
}

/**
 * Insert a pending request unless one already exists. Returns false when
 * the recipient has no public profile.
 */
export async function sendFriendRequest(fromUserId: number, toUserId: number): Promise<boolean> {
    const res = await getPool().query(
        `INSERT INTO friend_requests (from_user, to_user)
         SELECT $1, p.user_id FROM user_profiles p WHERE p.user_id = $2 AND p.public
         ON CONFLICT (from_user, to_user) DO NOTHING
         RETURNING id`,
        [fromUserId, toUserId],
    );
    if ((res.rowCount ?? 0) > 0) return true;
    const target = await getPool().query(`SELECT 1 FROM user_profiles WHERE user_id = $1 AND public`, [toUserId]);
    return (target.rowCount ?? 0) > 0;
}

/**
 * Accept a pending request addressed to `toUserId`. Returns the accepted
 * request, or null when there is no such pending request.
 */
export async function acceptFriendRequest(requestId: number, toUserId: number): Promise<FriendRequest | null> {
    const res = await getPool().query<RequestRow>(
        `WITH accepted AS (
             UPDATE friend_requests SET accepted = true
             WHERE id = $1 AND to_user = $2 AND NOT accepted
             RETURNING *
         )
         SELECT r.id, r.from_user, f.username AS from_username, r.to_user, r.accepted, r.created_at
         FROM accepted r JOIN users f ON f.id = r.from_user`,
        [requestId, toUserId],
    );
    const row = res.rows[0];
    return row ? toRequest(row) : null;
}
