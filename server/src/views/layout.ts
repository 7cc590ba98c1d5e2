/**
 * layout.ts
 *
 * Page shell shared by every server-rendered page: head, navigation with
 * the theme toggle, flash area, footer with the deployed revision and the
 * `window.__CFG__` object read by the client scripts.
 */

import type {PageConfig} from "../../../shared/types/page-config.js";
import type {User} from "../tracker/types.js";
import {html, inlineJson, type Html} from "./html.js";

export const UNCOLLECT_CONFIRM_TEXT = "Are you sure you want to uncollect this card?";
export const COLLECT_BASE_CONFIRM_TEXT = "Are you sure you want to collect all base cards?";

export type LayoutOptions = {
    title: string;
    user: User | null;
    gitHash: string;
    csrfToken?: string;
    // Extra entry scripts below /static, e.g. "admin.js"
    scripts?: string[];
    body: Html;
};

function nav(user: User | null, csrfToken: string) {
    if (!user) {
        return html`
      <a href="/login">Log in</a>
      <a href="/register">Register</a>`;
    }
    return html`
      <a href="/">Sets</a>
      <a href="/packs">Packs</a>
      <a href="/users/search">Find users</a>
      <a href="/profile">Profile</a>
      <a href="/account">Account</a>
      ${user.isAdmin && html`<a href="/admin/rarity-probabilities/new">Admin</a>`}
      <form method="post" action="/logout" class="inline-form">
        <input type="hidden" name="csrf" value="${csrfToken}">
        <button type="submit" class="link-button">Log out (${user.username})</button>
      </form>`;
}

export function themeToggle() {
    return html`<theme-toggle>
      <button id="theme-toggle" type="button" class="theme-toggle" title="Auto mode (click for light)">
        <span id="sun-icon" class="hidden" aria-hidden="true">☀️</span>
        <span id="moon-icon" class="hidden" aria-hidden="true">🌙</span>
        <span id="auto-icon" class="visible" aria-hidden="true">🌓</span>
      </button>
    </theme-toggle>`;
}

export function renderLayout(opts: LayoutOptions): string {
    const cfg: PageConfig = {
        csrfToken: opts.csrfToken ?? "",
        uncollectConfirmText: UNCOLLECT_CONFIRM_TEXT,
        collectBaseConfirmText: COLLECT_BASE_CONFIRM_TEXT,
        logDebug: false,
    };
    const scripts = ["main.js", ...(opts.scripts ?? [])];

    const page = html`<!doctype html>
<html lang="en" data-theme="light">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${opts.title} · Card Tracker</title>
  <link rel="stylesheet" href="/static/tracker.css">
  <script>window.__CFG__ = ${inlineJson(cfg)};</script>
  ${scripts.map((s) => html`<script type="module" src="/static/${s}"></script>`)}
</head>
<body>
  <header class="site-header">
    <a class="brand" href="/">Card Tracker</a>
    <nav class="site-nav">${nav(opts.user, opts.csrfToken ?? "")}</nav>
    ${themeToggle()}
  </header>
  <main class="content">
${opts.body}
  </main>
  <footer class="site-footer">
    <span class="git-hash">Revision ${opts.gitHash}</span>
  </footer>
</body>
</html>
`;
    return page.value;
}
