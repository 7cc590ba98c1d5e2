/**
 * metrics.ts
 *
 * Prometheus metrics registry for the server.
 * - `register` backs the `/metrics` endpoint.
 * - Default process metrics are collected automatically.
 * - Collection changes and page renders are counted below.
 */

import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({register});

export const cardsCollectedCounter = new client.Counter({
    name: 'cards_collected_total',
    help: 'Total number of collect actions performed by users',
    labelNames: ['rarity'] as const,
    registers: [register],
});

export const cardsUncollectedCounter = new client.Counter({
    name: 'cards_uncollected_total',
    help: 'Total number of uncollect actions performed by users',
    labelNames: ['rarity'] as const,
    registers: [register],
});

export const pageRenderCounter = new client.Counter({
    name: 'http_page_renders_total',
    help: 'Server-rendered pages, by page name',
    labelNames: ['page'] as const,
    registers: [register],
});
