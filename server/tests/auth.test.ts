/**
 * auth.test.ts
 *
 * Session tokens, CSRF tokens and the register/login service with the user
 * repository mocked out.
 */

import {describe, it, expect, vi, beforeEach} from 'vitest';
import {ZodError} from 'zod';

const users = vi.hoisted(() => ({
    findUserById: vi.fn(),
    usernameOrEmailTaken: vi.fn(),
    findCredentials: vi.fn(),
    createUser: vi.fn(),
}));

vi.mock('../src/repositories/users.js', () => users);

import {signSessionToken, verifySessionToken} from '../src/auth/jwt.js';
import {csrfTokenFor, isValidCsrfToken} from '../src/auth/csrf.js';
import {hashPassword, verifyPassword} from '../src/auth/password.js';
import {loginUser, registerUser} from '../src/auth/service.js';

const misty = {id: 42, username: 'misty', email: 'misty@example.test', isAdmin: false, createdAt: '2025-01-01T00:00:00.000Z'};

beforeEach(() => {
    vi.clearAllMocks();
});

describe('session token', () => {
    it('round-trips the user id and name', () => {
        const token = signSessionToken({userId: 42, username: 'misty'});
        expect(verifySessionToken(token)).toEqual({userId: 42, username: 'misty'});
    });

    it('rejects a tampered token', () => {
        const [header, , signature] = signSessionToken({userId: 42, username: 'misty'}).split('.');
        const payload = Buffer.from(JSON.stringify({username: 'misty', sub: '1'})).toString('base64url');
        expect(() => verifySessionToken(`${header}.${payload}.${signature}`)).toThrow();
    });
});

describe('csrf token', () => {
    it('is bound to the user id', () => {
        const token = csrfTokenFor(1);
        expect(isValidCsrfToken(1, token)).toBe(true);
        expect(isValidCsrfToken(2, token)).toBe(false);
        expect(isValidCsrfToken(1, undefined)).toBe(false);
        expect(isValidCsrfToken(1, 'short')).toBe(false);
    });
});

describe('registerUser', () => {
    const form = {username: 'misty', email: 'misty@example.test', password: 'test-password', passwordConfirm: 'test-password'};

    it('rejects a taken username or email', async () => {
        users.usernameOrEmailTaken.mockResolvedValue(true);
        await expect(registerUser(form)).rejects.toThrow('USERNAME_OR_EMAIL_TAKEN');
        expect(users.createUser).not.toHaveBeenCalled();
    });

    it('stores a bcrypt hash and returns a session token', async () => {
        users.usernameOrEmailTaken.mockResolvedValue(false);
        users.createUser.mockResolvedValue(misty);

        const result = await registerUser(form);
        expect(result.user).toEqual(misty);
        expect(verifySessionToken(result.token).userId).toBe(42);

        const [input] = users.createUser.mock.calls[0] ?? [];
        expect(input.username).toBe('misty');
        expect(input.passwordHash).not.toBe('test-password');
        expect(await verifyPassword('test-password', input.passwordHash)).toBe(true);
    });

    it('requires matching passwords', async () => {
        await expect(registerUser({...form, passwordConfirm: 'something-else'})).rejects.toBeInstanceOf(ZodError);
    });
});

describe('loginUser', () => {
    it('accepts the right password', async () => {
        users.findCredentials.mockResolvedValue({...misty, passwordHash: await hashPassword('test-password')});
        const result = await loginUser({usernameOrEmail: 'misty', password: 'test-password'});
        expect(result.user).toEqual(misty);
        expect(users.findCredentials).toHaveBeenCalledWith('misty');
    });

    it('rejects a wrong password and an unknown user alike', async () => {
        users.findCredentials.mockResolvedValue({...misty, passwordHash: await hashPassword('test-password')});
        await expect(loginUser({usernameOrEmail: 'misty', password: 'wrong-password'})).rejects.toThrow('INVALID_CREDENTIALS');

        users.findCredentials.mockResolvedValue(null);
        await expect(loginUser({usernameOrEmail: 'nobody', password: 'test-password'})).rejects.toThrow('INVALID_CREDENTIALS');
    });
});
