import Fastify, { FastifyError, FastifyInstance, HTTPMethods } from 'fastify';
import { ProxyError, toErrorResponse } from '../domain';
import { RequestForwarder, generateRequestId } from './forwarder';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

// every method fastify can route
export const PROXIED_METHODS: HTTPMethods[] = [
    'DELETE', 'GET', 'HEAD', 'PATCH', 'POST', 'PUT', 'OPTIONS',
    'PROPFIND', 'PROPPATCH', 'MKCOL', 'COPY', 'MOVE', 'LOCK', 'UNLOCK', 'TRACE', 'SEARCH',
];
const NO_BODY_STATUSES = new Set([204, 304]);

export interface ProxyServerDeps {
    forwarder: RequestForwarder;
    bodyLimitBytes: number;
    logger?: Logger;
}

function isFastifyError(err: unknown): err is FastifyError {
    return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('FST_');
}

/**
 * One catch-all route: every method and path goes to the forwarder. Bodies are
 * taken as raw buffers regardless of content type; nothing is parsed.
 */
export function createProxyServer(deps: ProxyServerDeps): FastifyInstance {
    const logger = (deps.logger ?? silentLogger()).child({ component: 'server' });
    const app = Fastify({
        logger: false,
        bodyLimit: deps.bodyLimitBytes,
        exposeHeadRoutes: false,
        return503OnClosing: true,
        genReqId: () => generateRequestId(),
    });

    app.removeAllContentTypeParsers();
    app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
        done(null, body);
    });

    app.route({
        method: PROXIED_METHODS,
        url: '/*',
        handler: async (request, reply) => {
            const controller = new AbortController();
            // client went away before we finished: drop the upstream call
            reply.raw.once('close', () => {
                if (!reply.raw.writableFinished) controller.abort();
            });

            const result = await deps.forwarder.forward(
                {
                    method: request.method,
                    url: request.url,
                    headers: request.headers,
                    body: Buffer.isBuffer(request.body) ? request.body : undefined,
                    signal: controller.signal,
                },
                request.id,
            );

            reply.code(result.status);
            reply.headers(result.headers);
            if (NO_BODY_STATUSES.has(result.status) || request.method === 'HEAD') {
                result.body.destroy();
                return reply.send();
            }
            return reply.send(result.body);
        },
    });

    app.setErrorHandler((err, request, reply) => {
        if (isFastifyError(err) && err.statusCode !== undefined && err.statusCode < 500) {
            logger.info({ requestId: request.id, code: err.code }, 'rejected inbound request');
            return reply.code(err.statusCode).send({
                error: { code: err.code, message: err.message },
            });
        }

        const { statusCode, body } = toErrorResponse(err);
        logger.error(
            {
                requestId: request.id,
                code: body.error.code,
                source: err instanceof ProxyError ? err.source : undefined,
                err: err.message,
            },
            'request failed',
        );
        return reply.code(statusCode).send(body);
    });

    return app;
}
