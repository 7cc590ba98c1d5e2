/**
 * account.http.test.ts
 *
 * Account, profile, user search, friend requests and public profiles
 * through `app.inject` with the user and profile repositories mocked.
 */

import {describe, it, expect, vi, beforeAll, beforeEach} from 'vitest';
import type {FastifyInstance} from 'fastify';

const users = vi.hoisted(() => ({
    findUserById: vi.fn(),
    usernameOrEmailTaken: vi.fn(),
    findCredentials: vi.fn(),
    createUser: vi.fn(),
    findPasswordHash: vi.fn(),
    updatePasswordHash: vi.fn(),
    deleteUser: vi.fn(),
}));
const profiles = vi.hoisted(() => ({
    findProfile: vi.fn(),
    findPublicProfile: vi.fn(),
    updateProfile: vi.fn(),
    searchPublicProfiles: vi.fn(),
    listFriends: vi.fn(),
    listFriendRequests: vi.fn(),
    sendFriendRequest: vi.fn(),
    acceptFriendRequest: vi.fn(),
}));

vi.mock('../src/repositories/users.js', () => users);
vi.mock('../src/repositories/profiles.js', () => profiles);

import {buildApp} from '../src/app.js';
import {signSessionToken} from '../src/auth/jwt.js';
import {csrfTokenFor} from '../src/auth/csrf.js';
import {hashPassword, verifyPassword} from '../src/auth/password.js';

const ash = {id: 7, username: 'ash', email: 'ash@example.test', isAdmin: false, createdAt: '2025-01-01T00:00:00.000Z'};
const form = {'content-type': 'application/x-www-form-urlencoded'};
const cookie = `session=${signSessionToken({userId: ash.id, username: ash.username})}`;
const csrf = `csrf=${csrfTokenFor(ash.id)}`;

const misty = {userId: 8, username: 'misty', public: true, friendCode: 'M-1'};
const brock = {userId: 9, username: 'brock', public: true, friendCode: null};
const gary = {userId: 10, username: 'gary', public: true, friendCode: null};
const erika = {userId: 11, username: 'erika', public: true, friendCode: 'E-2'};

const fromBrock = {id: 5, fromUserId: 9, fromUsername: 'brock', toUserId: 7, accepted: false, createdAt: '2025-01-03T00:00:00.000Z'};
const requests = [
    {id: 4, fromUserId: 7, fromUsername: 'ash', toUserId: 8, accepted: true, createdAt: '2025-01-02T00:00:00.000Z'},
    fromBrock,
    {id: 6, fromUserId: 7, fromUsername: 'ash', toUserId: 10, accepted: false, createdAt: '2025-01-04T00:00:00.000Z'},
];

let passwordHash = '';
let app: FastifyInstance;

beforeAll(async () => {
    passwordHash = await hashPassword('test-secret');
});

beforeEach(async () => {
    vi.clearAllMocks();
    users.findUserById.mockImplementation(async (id: number) => (id === ash.id ? ash : null));
    users.findPasswordHash.mockImplementation(async () => passwordHash);
    users.updatePasswordHash.mockResolvedValue(undefined);
    users.deleteUser.mockResolvedValue(undefined);
    profiles.findProfile.mockResolvedValue({userId: 7, username: 'ash', public: true, friendCode: '1234-5678'});
    profiles.listFriends.mockResolvedValue([misty]);
    profiles.listFriendRequests.mockResolvedValue(requests);
    profiles.updateProfile.mockResolvedValue(undefined);
    profiles.findPublicProfile.mockImplementation(async (username: string) => (username === 'erika' ? erika : null));
    app = await buildApp({logLevel: false});
});

describe('account page', () => {
    it('redirects anonymous visitors to the login page', async () => {
        const res = await app.inject({method: 'GET', url: '/account'});
        expect(res.statusCode).toBe(302);
        expect(res.headers.location).toBe('/login?next=%2Faccount');
    });

    it('changes the password after checking the current one', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/account',
            headers: {...form, cookie},
            payload: `${csrf}&password_change=1&oldPassword=test-secret&newPassword=new-test-secret&newPasswordConfirm=new-test-secret`,
        });
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('Your password has been changed.');
        expect(users.updatePasswordHash).toHaveBeenCalledTimes(1);
        const [userId, hash] = users.updatePasswordHash.mock.calls[0] ?? [];
        expect(userId).toBe(7);
        expect(await verifyPassword('new-test-secret', String(hash))).toBe(true);
    });

    it('rejects a wrong current password', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/account',
            headers: {...form, cookie},
            payload: `${csrf}&password_change=1&oldPassword=wrong-secret&newPassword=new-test-secret&newPasswordConfirm=new-test-secret`,
        });
        expect(res.statusCode).toBe(400);
        expect(res.body).toContain('<li>oldPassword: Your current password is incorrect.</li>');
        expect(users.updatePasswordHash).not.toHaveBeenCalled();
    });

    it('rejects a new password that does not match its confirmation', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/account',
            headers: {...form, cookie},
            payload: `${csrf}&password_change=1&oldPassword=test-secret&newPassword=new-test-secret&newPasswordConfirm=other-secret`,
        });
        expect(res.statusCode).toBe(400);
        expect(res.body).toContain('<li>newPasswordConfirm: Passwords do not match.</li>');
        expect(users.findPasswordHash).not.toHaveBeenCalled();
    });

    it('applies the registration minimum length to the new password', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/account',
            headers: {...form, cookie},
            payload: `${csrf}&password_change=1&oldPassword=test-secret&newPassword=short&newPasswordConfirm=short`,
        });
        expect(res.statusCode).toBe(400);
        expect(res.body).toContain('<li>newPassword: Password must be at least 8 characters.</li>');
    });

    it('deletes the account and clears the session', async () => {
        const res = await app.inject({method: 'POST', url: '/account', headers: {...form, cookie}, payload: `${csrf}&delete_account=1`});
        expect(res.statusCode).toBe(303);
        expect(res.headers.location).toBe('/login');
        expect(String(res.headers['set-cookie']).startsWith('session=;')).toBe(true);
        expect(users.deleteUser).toHaveBeenCalledWith(7);
    });

    it('does not delete without a valid CSRF token', async () => {
        const res = await app.inject({method: 'POST', url: '/account', headers: {...form, cookie}, payload: 'csrf=wrong-token&delete_account=1'});
        expect(res.statusCode).toBe(403);
        expect(users.deleteUser).not.toHaveBeenCalled();
    });

    it('answers 400 for a form without an action', async () => {
        const res = await app.inject({method: 'POST', url: '/account', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(400);
        expect(res.body).toContain('<li>Unknown account action.</li>');
    });
});

describe('own profile', () => {
    it('shows the settings, pending requests and friends', async () => {
        const res = await app.inject({method: 'GET', url: '/profile', headers: {cookie}});
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('<input id="id_friend_code" name="friend_code" maxlength="10" value="1234-5678">');
        expect(res.body).toContain('<input type="checkbox" name="public" checked>');
        expect(res.body).toContain('<li>brock <form method="post" action="/friends/accept/5" class="inline-form">');
        expect(res.body).toContain('<li><a href="/profile/misty">misty</a> <small class="friend-code">M-1</small></li>');
    });

    it('saves a trimmed friend code and the public flag', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/profile',
            headers: {...form, cookie},
            payload: `${csrf}&friend_code=%20abc%20&public=on`,
        });
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('Profile saved.');
        expect(profiles.updateProfile).toHaveBeenCalledWith(7, {public: true, friendCode: 'abc'});
    });

    it('makes the profile private when the box is unchecked', async () => {
        await app.inject({method: 'POST', url: '/profile', headers: {...form, cookie}, payload: `${csrf}&friend_code=`});
        expect(profiles.updateProfile).toHaveBeenCalledWith(7, {public: false, friendCode: null});
    });

    it('re-renders the submitted values on a too long friend code', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/profile',
            headers: {...form, cookie},
            payload: `${csrf}&friend_code=ABCDEFGHIJK`,
        });
        expect(res.statusCode).toBe(400);
        expect(res.body).toContain('<li>friend_code: At most 10 characters.</li>');
        expect(res.body).toContain('value="ABCDEFGHIJK"');
        expect(res.body).toContain('<input type="checkbox" name="public"> Public profile');
        expect(profiles.updateProfile).not.toHaveBeenCalled();
    });
});

describe('user search', () => {
    it('offers the action matching each relation', async () => {
        profiles.searchPublicProfiles.mockResolvedValue([misty, brock, gary, erika]);
        const res = await app.inject({method: 'GET', url: '/users/search?q=%20r%20', headers: {cookie}});
        expect(res.statusCode).toBe(200);
        expect(profiles.searchPublicProfiles).toHaveBeenCalledWith('r', 7);
        expect(res.body).toContain('<span class="relation friend">Friends</span>');
        expect(res.body).toContain('action="/friends/accept/5"');
        expect(res.body).toContain('<span class="relation sent">Request sent</span>');
        expect(res.body).toContain('action="/users/11/friend-request"');
        expect(res.body).toContain('<input type="hidden" name="next" value="/users/search?q=r">');
    });

    it('does not search without a query', async () => {
        const res = await app.inject({method: 'GET', url: '/users/search', headers: {cookie}});
        expect(res.statusCode).toBe(200);
        expect(profiles.searchPublicProfiles).not.toHaveBeenCalled();
    });

    it('says when nothing matches', async () => {
        profiles.searchPublicProfiles.mockResolvedValue([]);
        const res = await app.inject({method: 'GET', url: '/users/search?q=zz', headers: {cookie}});
        expect(res.body).toContain('No public profiles match “zz”.');
    });
});

describe('friend requests', () => {
    it('sends a request and returns to the given page', async () => {
        profiles.sendFriendRequest.mockResolvedValue(true);
        const res = await app.inject({
            method: 'POST',
            url: '/users/11/friend-request',
            headers: {...form, cookie},
            payload: `${csrf}&next=%2Fprofile%2Ferika`,
        });
        expect(res.statusCode).toBe(303);
        expect(res.headers.location).toBe('/profile/erika');
        expect(profiles.sendFriendRequest).toHaveBeenCalledWith(7, 11);
    });

    it('ignores a request to oneself', async () => {
        const res = await app.inject({method: 'POST', url: '/users/7/friend-request', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(303);
        expect(res.headers.location).toBe('/users/search');
        expect(profiles.sendFriendRequest).not.toHaveBeenCalled();
    });

    it('answers 404 for a user without a public profile', async () => {
        profiles.sendFriendRequest.mockResolvedValue(false);
        const res = await app.inject({method: 'POST', url: '/users/12/friend-request', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(404);
        expect(res.body).toContain('<h1>User not found</h1>');
    });

    it('answers 400 for a non-numeric user id', async () => {
        const res = await app.inject({method: 'POST', url: '/users/abc/friend-request', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(400);
        expect(profiles.sendFriendRequest).not.toHaveBeenCalled();
    });

    it('accepts a pending request', async () => {
        profiles.acceptFriendRequest.mockResolvedValue({...fromBrock, accepted: true});
        const res = await app.inject({method: 'POST', url: '/friends/accept/5', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(303);
        expect(res.headers.location).toBe('/profile');
        expect(profiles.acceptFriendRequest).toHaveBeenCalledWith(5, 7);
    });

    it('answers 404 for a request that is not pending for the user', async () => {
        profiles.acceptFriendRequest.mockResolvedValue(null);
        const res = await app.inject({method: 'POST', url: '/friends/accept/6', headers: {...form, cookie}, payload: csrf});
        expect(res.statusCode).toBe(404);
        expect(res.body).toContain('<h1>Friend request not found</h1>');
    });
});

describe('public profile', () => {
    it('is visible without signing in', async () => {
        const res = await app.inject({method: 'GET', url: '/profile/erika'});
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('<h1>erika</h1>');
        expect(res.body).toContain('<span class="friend-code">E-2</span>');
        expect(res.body).not.toContain('Add friend');
        expect(profiles.listFriendRequests).not.toHaveBeenCalled();
    });

    it('offers a friend request to signed-in visitors', async () => {
        const res = await app.inject({method: 'GET', url: '/profile/erika', headers: {cookie}});
        expect(res.body).toContain('action="/users/11/friend-request"');
        expect(res.body).toContain('<input type="hidden" name="next" value="/profile/erika">');
    });

    it('answers 404 for private or unknown profiles', async () => {
        const res = await app.inject({method: 'GET', url: '/profile/nobody'});
        expect(res.statusCode).toBe(404);
        expect(res.body).toContain('<h1>Profile not found</h1>');
    });
});
