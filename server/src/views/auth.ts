/**
 * auth.ts
 *
 * Login and registration forms. Both re-render with the submitted values
 * (never the password) and a list of error messages.
 */

import {html, type Html} from "./html.js";

export type FormErrors = string[];

export function errorList(errors: FormErrors): Html | null {
    if (errors.length === 0) return null;
    return html`<ul class="form-errors">${errors.map((e) => html`<li>${e}</li>`)}</ul>`;
}

export function renderLogin(opts: {next: string; usernameOrEmail?: string; errors?: FormErrors}): Html {
    return html`<h1>Log in</h1>
${errorList(opts.errors ?? [])}
<form method="post" action="/login" class="auth-form">
  <input type="hidden" name="next" value="${opts.next}">
  <label for="id_username">Username or email</label>
  <input id="id_username" name="usernameOrEmail" value="${opts.usernameOrEmail ?? ""}" autocomplete="username" required>
  <label for="id_password">Password</label>
  <input id="id_password" name="password" type="password" autocomplete="current-password" required>
  <button type="submit">Log in</button>
</form>
<p>No account yet? <a href="/register">Register</a></p>`;
}

export function renderRegister(opts: {username?: string; email?: string; errors?: FormErrors}): Html {
    return html`<h1>Register</h1>
${errorList(opts.errors ?? [])}
<form method="post" action="/register" class="auth-form">
  <label for="id_username">Username</label>
  <input id="id_username" name="username" value="${opts.username ?? ""}" autocomplete="username" required>
  <label for="id_email">Email</label>
  <input id="id_email" name="email" type="email" value="${opts.email ?? ""}" autocomplete="email" required>
  <label for="id_password">Password</label>
  <input id="id_password" name="password" type="password" autocomplete="new-password" required>
  <label for="id_password_confirm">Confirm password</label>
  <input id="id_password_confirm" name="passwordConfirm" type="password" autocomplete="new-password" required>
  <button type="submit">Register</button>
</form>
<p>Already registered? <a href="/login">Log in</a></p>`;
}
