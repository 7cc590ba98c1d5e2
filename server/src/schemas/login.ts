/**
 * login.ts
 *
 * Zod schema for the login form. Accepts a username or an email address in
 * one field.
 */

import {z} from "zod";

export const usernamePattern = /^[a-zA-Z0-9._-]{3,32}$/;

export const loginSchema = z.object({
    usernameOrEmail: z
        .string()
        .trim()
        .refine(
            (value) => usernamePattern.test(value) || z.string().email().safeParse(value).success,
            {message: "Provide a valid username or email."}
        ),
    password: z.string().min(1, {message: "Password is required."}),
});
