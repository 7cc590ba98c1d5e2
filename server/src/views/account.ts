/**
 * account.ts
 *
 * Account page (password change and account deletion), the own profile
 * with friends and pending requests, user search and public profiles.
 */

import type {Relation} from "../tracker/friends.js";
import type {FriendRequest, Profile} from "../tracker/types.js";
import {errorList, type FormErrors} from "./auth.js";
import {html, type Html} from "./html.js";

export type AccountView = {
    csrfToken: string;
    errors?: FormErrors;
    passwordChanged?: boolean;
};

export function renderAccount(view: AccountView): Html {
    return html`<h1>Account</h1>
${view.passwordChanged && html`<p class="flash success">Your password has been changed.</p>`}
<section class="password-change">
  <h2>Change password</h2>
  ${errorList(view.errors ?? [])}
  <form method="post" action="/account" class="auth-form">
    <input type="hidden" name="csrf" value="${view.csrfToken}">
    <input type="hidden" name="password_change" value="1">
    <label for="id_old_password">Current password</label>
    <input id="id_old_password" name="oldPassword" type="password" autocomplete="current-password" required>
    <label for="id_new_password">New password</label>
    <input id="id_new_password" name="newPassword" type="password" autocomplete="new-password" required>
    <label for="id_new_password_confirm">Confirm new password</label>
    <input id="id_new_password_confirm" name="newPasswordConfirm" type="password" autocomplete="new-password" required>
    <button type="submit">Change password</button>
  </form>
</section>
<section class="danger-zone">
  <h2>Delete account</h2>
  <p>Your collection, profile and friends are removed permanently.</p>
  <form method="post" action="/account">
    <input type="hidden" name="csrf" value="${view.csrfToken}">
    <input type="hidden" name="delete_account" value="1">
    <button type="submit" class="danger">Delete account</button>
  </form>
</section>`;
}

export function profileUrl(username: string): string {
    return `/profile/${encodeURIComponent(username)}`;
}

function acceptForm(requestId: number, csrfToken: string, next: string): Html {
    return html`<form method="post" action="/friends/accept/${requestId}" class="inline-form">
      <input type="hidden" name="csrf" value="${csrfToken}">
      <input type="hidden" name="next" value="${next}">
      <button type="submit">Accept</button>
    </form>`;
}

function sendForm(userId: number, csrfToken: string, next: string): Html {
    return html`<form method="post" action="/users/${userId}/friend-request" class="inline-form">
      <input type="hidden" name="csrf" value="${csrfToken}">
      <input type="hidden" name="next" value="${next}">
      <button type="submit">Add friend</button>
    </form>`;
}

/**
 * The friendship action offered for another user.
 */
export function relationAction(userId: number, relation: Relation, csrfToken: string, next: string): Html | null {
    switch (relation.kind) {
        case "self":
            return null;
        case "friend":
            return html`<span class="relation friend">Friends</span>`;
        case "sent":
            return html`<span class="relation sent">Request sent</span>`;
        case "received":
            return acceptForm(relation.requestId, csrfToken, next);
        case "none":
            return sendForm(userId, csrfToken, next);
    }
}

export type ProfileView = {
    profile: Profile;
    friends: Profile[];
    pending: FriendRequest[];
    csrfToken: string;
    errors?: FormErrors;
    saved?: boolean;
    // Submitted values when re-rendering after a validation error
    values?: {friendCode: string; public: boolean};
};

export function renderProfile(view: ProfileView): Html {
    const friendCode = view.values?.friendCode ?? view.profile.friendCode ?? "";
    const isPublic = view.values?.public ?? view.profile.public;
    return html`<h1>Profile of ${view.profile.username}</h1>
${view.saved && html`<p class="flash success">Profile saved.</p>`}
${errorList(view.errors ?? [])}
<form method="post" action="/profile" class="profile-form">
  <input type="hidden" name="csrf" value="${view.csrfToken}">
  <label for="id_friend_code">Friend code</label>
  <input id="id_friend_code" name="friend_code" maxlength="10" value="${friendCode}">
  <label><input type="checkbox" name="public"${isPublic && html` checked`}> Public profile</label>
  <button type="submit">Save</button>
</form>
${view.profile.public && html`<p>Your public page: <a href="${profileUrl(view.profile.username)}">${profileUrl(view.profile.username)}</a></p>`}
<section class="friend-requests">
  <h2>Friend requests</h2>
  ${view.pending.length === 0
        ? html`<p class="empty">No pending requests.</p>`
        : html`<ul>${view.pending.map((r) => html`<li>${r.fromUsername} ${acceptForm(r.id, view.csrfToken, "/profile")}</li>`)}</ul>`}
</section>
<section class="friends">
  <h2>Friends</h2>
  ${view.friends.length === 0
        ? html`<p class="empty">No friends yet. <a href="/users/search">Find users</a></p>`
        : html`<ul>${view.friends.map((f) => html`<li>${f.public ? html`<a href="${profileUrl(f.username)}">${f.username}</a>` : f.username}${f.friendCode && html` <small class="friend-code">${f.friendCode}</small>`}</li>`)}</ul>`}
</section>`;
}

export type UserSearchView = {
    query: string;
    results: {profile: Profile; relation: Relation}[];
    csrfToken: string;
};

export function userSearchUrl(query: string): string {
    return query ? `/users/search?q=${encodeURIComponent(query)}` : "/users/search";
}

export function renderUserSearch(view: UserSearchView): Html {
    const next = userSearchUrl(view.query);
    return html`<h1>Find users</h1>
<form method="get" action="/users/search" class="search-form">
  <input type="search" name="q" value="${view.query}" placeholder="Username or friend code" maxlength="100">
  <button type="submit">Search</button>
</form>
${view.query !== "" && (view.results.length === 0
        ? html`<p class="empty">No public profiles match “${view.query}”.</p>`
        : html`<table class="user-results">
  <thead><tr><th>User</th><th>Friend code</th><th></th></tr></thead>
  <tbody>
    ${view.results.map(({profile, relation}) => html`<tr data-user-id="${profile.userId}">
      <td><a href="${profileUrl(profile.username)}">${profile.username}</a></td>
      <td>${profile.friendCode ?? ""}</td>
      <td>${relationAction(profile.userId, relation, view.csrfToken, next)}</td>
    </tr>`)}
  </tbody>
</table>`)}`;
}

export type PublicProfileView = {
    profile: Profile;
    // null for anonymous visitors
    relation: Relation | null;
    csrfToken: string;
};

export function renderPublicProfile(view: PublicProfileView): Html {
    const next = profileUrl(view.profile.username);
    return html`<h1>${view.profile.username}</h1>
${view.profile.friendCode && html`<p>Friend code: <span class="friend-code">${view.profile.friendCode}</span></p>`}
${view.relation && relationAction(view.profile.userId, view.relation, view.csrfToken, next)}`;
}
