/**
 * app.ts
 *
 * Builds the Fastify instance: plugins (cookies, form bodies, static client
 * assets), the per-request `user` slot, 404/500 pages and all routes. Kept
 * apart from `index.ts` so tests can build an app without listening.
 */

import Fastify, {type FastifyError, type FastifyInstance} from 'fastify';
import cookie from '@fastify/cookie';
import formbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import {ZodError} from 'zod';
import {registerHttpRoutes} from './http/routes.js';
import {isXhr, sendPage} from './http/pages.js';
import {renderNotFound, renderServerError} from './views/errors.js';
import type {AppConfig} from './config.js';

export type BuildAppOptions = {
    logLevel?: AppConfig['FASTIFY_LOG_LEVEL'] | false;
    metricsEnabled?: boolean;
    // Directory served below /static (the client build); omitted in tests
    staticRoot?: string;
};

export async function buildApp(opts: BuildAppOptions = {}): Promise<FastifyInstance> {
    const app = Fastify({
        logger: opts.logLevel === false ? false : {level: opts.logLevel ?? 'info'},
    });

    await app.register(cookie);
    await app.register(formbody);
    if (opts.staticRoot) {
        await app.register(fastifyStatic, {
            root: opts.staticRoot,
            prefix: '/static/',
            maxAge: '1h',
        });
    }

    app.decorateRequest('user', null);

    app.setNotFoundHandler((req, reply) => {
        if (isXhr(req)) return reply.code(404).send({status: 'error', error: 'NOT_FOUND'});
        return sendPage(req, reply, {page: 'not_found', title: 'Not found', status: 404, body: renderNotFound()});
    });

    app.setErrorHandler<FastifyError>((err, req, reply) => {
        if (err instanceof ZodError) {
            req.log.warn({issues: err.issues}, 'validation error');
            return reply.code(400).send({ok: false, error: 'VALIDATION_ERROR', issues: err.issues});
        }
        // Fastify's own client errors (body too large, bad content type, ...)
        if (typeof err.statusCode === 'number' && err.statusCode < 500) {
            return reply.code(err.statusCode).send({ok: false, error: err.code ?? 'BAD_REQUEST'});
        }
        req.log.error({err}, 'request failed');
        if (isXhr(req)) return reply.code(500).send({ok: false, error: 'INTERNAL_ERROR'});
        return sendPage(req, reply, {page: 'error', title: 'Error', status: 500, body: renderServerError()});
    });

    await registerHttpRoutes(app, {metricsEnabled: opts.metricsEnabled ?? false});
    return app;
}
