import Fastify, { FastifyInstance } from 'fastify';
import { Readable } from 'stream';
import { gzipSync } from 'zlib';
import { HttpClient, normalizeHeaders } from '../../src/http/client';
import {
    UpstreamNetworkError,
    UpstreamStatusError,
    UpstreamTimeoutError,
} from '../../src/domain/errors';
import { readBody } from '../helpers';

const GZIPPED = gzipSync(Buffer.from('{"height":840000}'));

async function collect(stream: Readable): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
}

// stands in for both the identity provider and the upstream API
function createStandIn(): FastifyInstance {
    const app = Fastify({ logger: false });
    app.addContentTypeParser(
        'application/x-www-form-urlencoded',
        { parseAs: 'string' },
        (_request, body, done) => {
            done(null, Object.fromEntries(new URLSearchParams(String(body))));
        },
    );

    app.post('/token', async (request) => ({
        received: request.body,
        contentType: request.headers['content-type'],
        accept: request.headers.accept,
    }));
    app.post('/token-denied', async (_request, reply) => reply.code(401).send({ error: 'invalid_client' }));
    app.post('/echo', async (request) => ({
        body: request.body,
        host: request.headers.host,
        authorization: request.headers.authorization,
    }));
    app.get('/missing', async (_request, reply) => reply.code(404).type('text/plain').send('Block not found'));
    app.get('/redirect', async (_request, reply) => reply.redirect(302, '/elsewhere'));
    app.get('/gzip', async (_request, reply) => reply
        .header('content-encoding', 'gzip')
        .type('application/json')
        .send(GZIPPED));
    app.get('/slow', async () => {
        await new Promise(resolve => setTimeout(resolve, 300));
        return 'late';
    });
    return app;
}

describe('HttpClient', () => {
    let standIn: FastifyInstance;
    let baseUrl: string;

    beforeAll(async () => {
        standIn = createStandIn();
        baseUrl = await standIn.listen({ host: '127.0.0.1', port: 0 });
    });

    afterAll(async () => {
        await standIn.close();
    });

    describe('postForm', () => {
        it('should send an urlencoded form and parse the JSON answer', async () => {
            const client = new HttpClient('identity-provider', { timeoutMs: 5000 });

            const response = await client.postForm<{ received: Record<string, string>; contentType: string; accept: string }>(
                `${baseUrl}/token`,
                { grant_type: 'client_credentials', client_id: 'test-client', scope: undefined },
            );

            expect(response.status).toBe(200);
            expect(response.data).toEqual({
                received: { grant_type: 'client_credentials', client_id: 'test-client' },
                contentType: 'application/x-www-form-urlencoded',
                accept: 'application/json',
            });
        });

        it('should reject error statuses as UpstreamStatusError', async () => {
            const client = new HttpClient('identity-provider', { timeoutMs: 5000 });

            const failure = client.postForm(`${baseUrl}/token-denied`, { grant_type: 'client_credentials' });

            await expect(failure).rejects.toThrow(UpstreamStatusError);
            await expect(failure).rejects.toMatchObject({
                code: 'UPSTREAM_STATUS',
                statusCode: 401,
                source: 'identity-provider',
            });
        });
    });

    describe('send', () => {
        it('should send the body and headers as given', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });

            const response = await client.send({
                method: 'POST',
                url: `${baseUrl}/echo`,
                headers: {
                    'host': 'esplora.test',
                    'authorization': 'Bearer test-token',
                    'content-type': 'text/plain',
                },
                body: Buffer.from('0200000001abcdef'),
            });

            expect(response.status).toBe(200);
            expect(JSON.parse(await readBody(response.body))).toEqual({
                body: '0200000001abcdef',
                host: 'esplora.test',
                authorization: 'Bearer test-token',
            });
        });

        it('should resolve error statuses with their body', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });

            const response = await client.send({ method: 'GET', url: `${baseUrl}/missing`, headers: {} });

            expect(response.status).toBe(404);
            expect(response.headers['content-type']).toBe('text/plain');
            expect(await readBody(response.body)).toBe('Block not found');
        });

        it('should not follow redirects', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });

            const response = await client.send({ method: 'GET', url: `${baseUrl}/redirect`, headers: {} });

            expect(response.status).toBe(302);
            expect(response.headers.location).toBe('/elsewhere');
            response.body.destroy();
        });

        it('should hand back compressed bodies untouched', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });

            const response = await client.send({
                method: 'GET',
                url: `${baseUrl}/gzip`,
                headers: { 'accept-encoding': 'gzip' },
            });

            expect(response.headers['content-encoding']).toBe('gzip');
            expect((await collect(response.body)).equals(GZIPPED)).toBe(true);
        });

        it('should map refused connections to UpstreamNetworkError', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });

            await expect(client.send({ method: 'GET', url: 'http://127.0.0.1:1/', headers: {} }))
                .rejects.toThrow(UpstreamNetworkError);
        });

        it('should map a client-side timeout to UpstreamTimeoutError', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 50 });

            const failure = client.send({ method: 'GET', url: `${baseUrl}/slow`, headers: {} });

            await expect(failure).rejects.toThrow(UpstreamTimeoutError);
            await expect(failure).rejects.toMatchObject({ statusCode: 504 });
        });

        it('should report a cancelled request', async () => {
            const client = new HttpClient('upstream', { timeoutMs: 0 });
            const controller = new AbortController();
            controller.abort();

            await expect(client.send({ method: 'GET', url: `${baseUrl}/missing`, headers: {} }, controller.signal))
                .rejects.toThrow('Request to upstream was cancelled');
        });
    });
});

describe('normalizeHeaders', () => {
    it('should lower-case names and stringify scalar values', () => {
        expect(normalizeHeaders({
            'Content-Type': 'text/plain',
            'Content-Length': 12,
            'Set-Cookie': ['a=1', 'b=2'],
            'X-Nothing': null,
        })).toEqual({
            'content-type': 'text/plain',
            'content-length': '12',
            'set-cookie': ['a=1', 'b=2'],
        });
    });

    it('should return an empty map for missing headers', () => {
        expect(normalizeHeaders(undefined)).toEqual({});
    });
});
