/**
 * index.ts
 *
 * Server entrypoint. Responsibilities:
 * - Load `.env` and validate the configuration
 * - Start OpenTelemetry when enabled
 * - Wait for the database, then build and start the Fastify server
 * - Provide graceful shutdown handlers for SIGINT / SIGTERM
 */

import path from 'node:path';
import {buildApp} from './app.js';
import {getConfig, loadDotEnv} from './config.js';
import {closeInfra, initInfra} from './db/infra.js';
import {startTelemetry, stopTelemetry} from './observability.js';

loadDotEnv();
const config = getConfig();

startTelemetry(config);

const app = await buildApp({
    logLevel: config.FASTIFY_LOG_LEVEL,
    metricsEnabled: config.METRICS_ENABLED,
    staticRoot: path.join(process.cwd(), 'public', 'static'),
});

await initInfra(app.log);

const shutdown = async () => {
    app.log.info('shutting down...');
    try {
        await app.close();
        await closeInfra(app.log);
        await stopTelemetry();
    } catch (e) {
        app.log.error({err: e}, 'shutdown failed');
        process.exit(1);
    }
    process.exit(0);
};
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

try {
    await app.listen({port: config.PORT, host: config.HOST});
    app.log.info({revision: config.GIT_HASH}, 'server started');
} catch (e) {
    app.log.error({err: e}, 'failed to start server');
    await closeInfra(app.log);
    process.exit(1);
}
