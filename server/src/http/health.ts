/**
 * health.ts
 *
 * Health endpoint for the container orchestrator: 200 while Postgres answers,
 * 503 otherwise.
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from 'fastify';
import {pingDatabase} from '../db/infra.js';

export type HealthBody = {
    status: 'healthy' | 'unhealthy';
    database: 'connected' | 'disconnected';
};

export async function registerHealthRoutes(app: FastifyInstance) {
    const handler = async (_req: FastifyRequest, reply: FastifyReply): Promise<HealthBody> => {
        try {
            await pingDatabase();
            return {status: 'healthy', database: 'connected'};
        } catch (err) {
            app.log.error({err}, 'health check failed');
            reply.code(503);
            return {status: 'unhealthy', database: 'disconnected'};
        }
    };
    app.get('/health', handler);
    app.get('/health/', handler);
}
