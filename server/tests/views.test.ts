/**
 * views.test.ts
 *
 * HTML template helper escaping and the markup contract of the set page
 * and layout that the browser scripts depend on.
 */

import {describe, it, expect} from 'vitest';
import {escapeHtml, html, inlineJson, raw} from '../src/views/html.js';
import {renderLayout} from '../src/views/layout.js';
import {renderRarityProgress, renderSetDetail} from '../src/views/setDetail.js';
import {renderProbabilityForm} from '../src/views/admin.js';
import {buildRarityGroups, computeSetProgress} from '../src/tracker/progress.js';
import type {Rarity, User} from '../src/tracker/types.js';

const rarities: Rarity[] = [
    {name: 'common', displayName: '◊', order: 1, imageName: 'diamond_1', repeatCount: 1},
    {name: 'illustration_rare', displayName: '☆', order: 5, imageName: 'star_1', repeatCount: 1},
];
const rarityMap = new Map(rarities.map((r) => [r.name, r]));

describe('html', () => {
    it('escapes interpolated strings', () => {
        expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
        expect(html`<p>${'<b>'}</p>`.value).toBe('<p>&lt;b&gt;</p>');
    });

    it('nests fragments and arrays without escaping them', () => {
        const items = ['a', 'b'].map((x) => html`<li>${x}</li>`);
        expect(html`<ul>${items}</ul>`.value).toBe('<ul><li>a</li><li>b</li></ul>');
        expect(html`${raw('<hr>')}`.value).toBe('<hr>');
    });

    it('renders false, null and undefined as nothing', () => {
        expect(html`[${false}${null}${undefined}${0}]`.value).toBe('[0]');
    });

    it('keeps inline JSON from closing the script element', () => {
        expect(inlineJson({t: '</script>'}).value).toBe('{"t":"\\u003c/script>"}');
    });
});

describe('renderLayout', () => {
    const user: User = {id: 7, username: 'ash', email: 'ash@example.test', isAdmin: false, createdAt: '2025-01-01T00:00:00.000Z'};

    it('embeds the page config, the revision and the theme toggle', () => {
        const page = renderLayout({title: 'Sets', user, gitHash: 'abc123', csrfToken: 'tok', body: html`<p>hi</p>`});
        expect(page).toContain('window.__CFG__ = {"csrfToken":"tok","uncollectConfirmText":"Are you sure you want to uncollect this card?","collectBaseConfirmText":"Are you sure you want to collect all base cards?","logDebug":false};');
        expect(page).toContain('<span class="git-hash">Revision abc123</span>');
        expect(page).toContain('<button id="theme-toggle" type="button" class="theme-toggle" title="Auto mode (click for light)">');
        expect(page).toContain('<script type="module" src="/static/main.js"></script>');
    });

    it('posts the CSRF token with the logout form', () => {
        const page = renderLayout({title: 'Sets', user, gitHash: 'h', csrfToken: 'tok', body: html``});
        expect(page).toContain(`<form method="post" action="/logout" class="inline-form">
        <input type="hidden" name="csrf" value="tok">`);
    });

    it('links the admin page for admins only', () => {
        const plain = renderLayout({title: 'x', user, gitHash: 'h', body: html``});
        const admin = renderLayout({title: 'x', user: {...user, isAdmin: true}, gitHash: 'h', body: html``});
        expect(plain).not.toContain('href="/admin/rarity-probabilities/new"');
        expect(admin).toContain('<a href="/admin/rarity-probabilities/new">Admin</a>');
    });
});

describe('set page markup', () => {
    const progress = computeSetProgress(
        1,
        buildRarityGroups(rarities),
        [{setId: 1, rarity: 'common', count: 2}, {setId: 1, rarity: 'illustration_rare', count: 1}],
        [{setId: 1, rarity: 'common', count: 1}],
    );

    it('renders the rarity progress block', () => {
        const out = renderRarityProgress(progress, rarityMap).value;
        expect(out.startsWith('<div id="rarity-progress" class="rarity-progress">')).toBe(true);
        expect(out).toContain('<span class="rarity-count">1/2</span>');
        expect(out).toContain('<span class="rarity-count">0/1</span>');
    });

    it('marks rows with card id, rarity and next action', () => {
        const out = renderSetDetail({
            set: {id: 1, number: 'A1', name: 'Alpha <Set>', releaseDate: '2025-01-01', availableUntil: null, generation: 'G1'},
            cards: [
                {id: 10, setId: 1, number: '1', name: 'Shellkin', rarity: 'common'},
                {id: 11, setId: 1, number: '2', name: 'Driftfin', rarity: 'common'},
            ],
            owned: new Set([10]),
            rarities: rarityMap,
            progress,
        }).value;
        expect(out).toContain('<h1>Alpha &lt;Set&gt; <small class="set-number">A1</small></h1>');
        expect(out).toContain('<tr class="clickable-row" data-card-id="10" data-rarity="common" data-action="uncollect">');
        expect(out).toContain('<tr class="clickable-row" data-card-id="11" data-rarity="common" data-action="collect">');
        expect(out).toContain('<td class="status-cell">✅</td>');
        expect(out).toContain('<td class="status-cell">❌</td>');
        expect(out).toContain('<th class="sortable" data-sort="rarity">Rarity <span class="sort-arrow"></span></th>');
    });
});

describe('renderProbabilityForm', () => {
    it('carries the slot count on every pack type option', () => {
        const out = renderProbabilityForm({
            packTypes: [{id: 3, generation: 'G1', name: 'rare', displayName: 'Rare pack', slotCount: 4, occurrenceProbability: 0.05, description: ''}],
            rarities,
            csrfToken: 'tok',
            values: {pack_type: '3', probability_slot2: '0.25'},
            sumIssues: [],
        }).value;
        expect(out).toContain('<option value="3" data-slot-count="4" selected>G1 · Rare pack</option>');
        expect(out).toContain('<div class="form-row field-probability_slot6">');
        expect(out).toContain('name="probability_slot2" type="number" min="0" max="1" step="0.00001" value="0.25">');
        expect(out).toContain('<p>All pack types sum to 1 in every slot.</p>');
    });
});
