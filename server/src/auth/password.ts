/**
 * password.ts
 *
 * Account passwords: checked at login and before a password change, stored
 * only as bcrypt hashes. The minimum length is shared by the registration
 * and password-change forms.
 */

import bcrypt from "bcryptjs";

export const PASSWORD_MIN_LENGTH = 8;
const SALT_ROUNDS = 10;

export async function hashPassword(plain: string): Promise<string> {
    return bcrypt.hash(plain, SALT_ROUNDS);
}

export async function verifyPassword(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
}
