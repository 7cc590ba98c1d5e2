/**
 * service.ts
 *
 * Registration, login, password change and account deletion. Input is
 * validated with the zod schemas; known failures are thrown as `Error`s with
 * a stable code message that the route handlers map to responses.
 */

import {
    createUser,
    deleteUser,
    findCredentials,
    findPasswordHash,
    updatePasswordHash,
    usernameOrEmailTaken,
} from "../repositories/users.js";
import {hashPassword, verifyPassword} from "./password.js";
import {signSessionToken} from "./jwt.js";
import {registerSchema} from "../schemas/register.js";
import {loginSchema} from "../schemas/login.js";
import {passwordChangeSchema} from "../schemas/account.js";
import type {User} from "../tracker/types.js";

export type AuthResult = {
    user: User;
    token: string;
};

export async function registerUser(raw: unknown): Promise<AuthResult> {
    const {username, email, password} = registerSchema.parse(raw);
    if (await usernameOrEmailTaken(username, email)) {
        throw new Error("USERNAME_OR_EMAIL_TAKEN");
    }
    const user = await createUser({username, email, passwordHash: await hashPassword(password)});
    const token = signSessionToken({userId: user.id, username: user.username});
    return {user, token};
}

export async function loginUser(raw: unknown): Promise<AuthResult> {
    const {usernameOrEmail, password} = loginSchema.parse(raw);
    const found = await findCredentials(usernameOrEmail);
    if (!found) {
        throw new Error("INVALID_CREDENTIALS");
    }
    const {passwordHash, ...user} = found;
    if (!(await verifyPassword(password, passwordHash))) {
        throw new Error("INVALID_CREDENTIALS");
    }
    const token = signSessionToken({userId: user.id, username: user.username});
    return {user, token};
}

/**
 * Replace the password after checking the current one. The session stays
 * valid; tokens carry no password state.
 */
export async function changePassword(userId: number, raw: unknown): Promise<void> {
    const {oldPassword, newPassword} = passwordChangeSchema.parse(raw);
    const hash = await findPasswordHash(userId);
    if (!hash) {
        throw new Error("USER_NOT_FOUND");
    }
    if (!(await verifyPassword(oldPassword, hash))) {
        throw new Error("INVALID_OLD_PASSWORD");
    }
    await updatePasswordHash(userId, await hashPassword(newPassword));
}

export async function deleteAccount(userId: number): Promise<void> {
    await deleteUser(userId);
}
