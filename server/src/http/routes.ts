/**
 * routes.ts
 *
 * Central HTTP route registration. This file imports and composes all
 * individual route modules so the application's main server file can simply
 * call `registerHttpRoutes(app)` to wire the HTTP surface.
 */

import type {FastifyInstance} from 'fastify';
import {registerHealthRoutes} from './health.js';
import {registerMetricsRoute} from './metrics.js';
import {registerAuthRoutes} from './auth.js';
import {registerHomeRoutes} from './home.js';
import {registerSetDetailRoutes} from './setDetail.js';
import {registerPackRoutes} from './packs.js';
import {registerAdminRoutes} from './admin.js';
import {registerAccountRoutes} from './account.js';
import {registerFriendRoutes} from './friends.js';

export type RouteOptions = {
    metricsEnabled: boolean;
};

export async function registerHttpRoutes(app: FastifyInstance, opts: RouteOptions) {
    await registerHealthRoutes(app);
    if (opts.metricsEnabled) await registerMetricsRoute(app);
    await registerAuthRoutes(app);
    await registerHomeRoutes(app);
    await registerSetDetailRoutes(app);
    await registerPackRoutes(app);
    await registerAdminRoutes(app);
    await registerAccountRoutes(app);
    await registerFriendRoutes(app);
}
