/**
 * account.ts
 *
 * Account page forms: password change and profile settings.
 */

import {z} from "zod";
import {PASSWORD_MIN_LENGTH} from "../auth/password.js";

export const passwordChangeSchema = z
    .object({
        oldPassword: z.string().min(1, {message: "Enter your current password."}),
        newPassword: z.string().min(PASSWORD_MIN_LENGTH, {message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters.`}),
        newPasswordConfirm: z.string(),
    })
    .refine((v) => v.newPassword === v.newPasswordConfirm, {
        message: "Passwords do not match.",
        path: ["newPasswordConfirm"],
    });

// Unchecked checkboxes are not submitted at all
export const profileSchema = z.object({
    friend_code: z
        .string()
        .trim()
        .max(10, {message: "At most 10 characters."})
        .optional()
        .transform((v) => (v ? v : null)),
    public: z
        .string()
        .optional()
        .transform((v) => v !== undefined),
});

export type ProfileForm = z.infer<typeof profileSchema>;
