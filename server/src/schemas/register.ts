/**
 * register.ts
 *
 * Zod schema for the registration form. Both password fields must match.
 */

import {z} from "zod";
import {PASSWORD_MIN_LENGTH} from "../auth/password.js";
import {usernamePattern} from "./login.js";

export const registerSchema = z
    .object({
        username: z
            .string()
            .trim()
            .regex(usernamePattern, {message: "Username must be 3-32 chars and use letters, digits, dot, hyphen, or underscore."}),
        email: z.string().trim().email({message: "Provide a valid email address."}),
        password: z.string().min(PASSWORD_MIN_LENGTH, {message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters.`}),
        passwordConfirm: z.string(),
    })
    .refine((v) => v.password === v.passwordConfirm, {
        message: "Passwords do not match.",
        path: ["passwordConfirm"],
    });
