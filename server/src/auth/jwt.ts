/**
 * jwt.ts
 *
 * Sign and verify the session token stored in the `session` cookie. The
 * user id travels as the standard `sub` claim; the secret comes from the
 * validated configuration.
 */

import jwt from "jsonwebtoken";
import {getConfig} from "../config.js";

const JWT_EXPIRES_IN = "7d";

export interface SessionPayload {
    userId: number;
    username: string;
}

export function signSessionToken(payload: SessionPayload): string {
    return jwt.sign({username: payload.username}, getConfig().JWT_SECRET, {
        subject: String(payload.userId),
        expiresIn: JWT_EXPIRES_IN,
    });
}

/**
 * Verify and decode a session token. Throws if the signature, expiry or
 * claims are invalid.
 */
export function verifySessionToken(token: string): SessionPayload {
    const decoded = jwt.verify(token, getConfig().JWT_SECRET);
    if (typeof decoded === "string") throw new Error("INVALID_TOKEN");
    const userId = Number(decoded.sub);
    const username: unknown = decoded.username;
    if (!Number.isInteger(userId) || typeof username !== "string") {
        throw new Error("INVALID_TOKEN");
    }
    return {userId, username};
}
