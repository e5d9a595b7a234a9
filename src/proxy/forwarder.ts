import type { Readable } from 'stream';
import {
    AccessToken,
    ForwardedExchange,
    HeaderValue,
    InboundRequest,
    OutboundRequest,
    ProxyError,
    UpstreamBodyStreamError,
    UpstreamNetworkError,
    UpstreamResponse,
    UpstreamTarget,
} from '../domain';
import type { TokenProvider } from '../auth/token-cache';
import type { UpstreamTransport } from '../http/client';
import { Clock, systemClock } from '../auth/clock';
import { buildUpstreamUrl } from './upstream-url';
import { buildOutboundHeaders, buildRelayHeaders, redactHeaders } from './headers';
import { describePreview, tapResponseBody } from './body-dump';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);
const AUTH_REJECTED = new Set([401, 403]);

export function generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}

export interface ForwardResult {
    status: number;
    headers: Record<string, HeaderValue>;
    body: Readable;
    exchange: ForwardedExchange;
}

export interface RequestForwarderDeps {
    target: UpstreamTarget;
    tokens: TokenProvider;
    transport: UpstreamTransport;
    responseDumpBytes?: number;
    clock?: Clock;
    logger?: Logger;
}

/**
 * Relays one inbound request to the upstream with a bearer token attached.
 *
 * Recovery from a rejected token is a fixed sequence, never a loop:
 * attempt 1 → (401/403) → forced refresh → attempt 2 → done. Whatever the
 * second attempt returns is relayed.
 */
export class RequestForwarder {
    private target: UpstreamTarget;
    private tokens: TokenProvider;
    private transport: UpstreamTransport;
    private responseDumpBytes: number;
    private clock: Clock;
    private logger: Logger;

    constructor(deps: RequestForwarderDeps) {
        this.target = deps.target;
        this.tokens = deps.tokens;
        this.transport = deps.transport;
        this.responseDumpBytes = deps.responseDumpBytes ?? 0;
        this.clock = deps.clock ?? systemClock;
        this.logger = (deps.logger ?? silentLogger()).child({ component: 'forwarder' });
    }

    async forward(inbound: InboundRequest, requestId: string = generateRequestId()): Promise<ForwardResult> {
        const started = this.clock.now();
        const method = inbound.method.toUpperCase();
        const upstreamUrl = buildUpstreamUrl(this.target, inbound.url);
        const body = BODYLESS_METHODS.has(method) || !inbound.body || inbound.body.length === 0
            ? undefined
            : inbound.body;

        const exchange: ForwardedExchange = {
            requestId,
            method,
            path: inbound.url,
            upstreamUrl,
            attempts: 0,
            forcedRefresh: false,
        };

        try {
            const first = await this.attempt(exchange, inbound, body, await this.tokens.getValid());
            let final = first;
            if (AUTH_REJECTED.has(first.status)) {
                first.body.destroy();
                exchange.forcedRefresh = true;
                this.logger.info(
                    { requestId, status: first.status },
                    'upstream rejected token; refreshing and retrying once',
                );
                const refreshed = await this.tokens.forceRefresh();
                final = await this.attempt(exchange, inbound, body, refreshed);
            }

            exchange.status = final.status;
            exchange.durationMs = this.clock.now() - started;
            this.logger.info(exchange, 'request forwarded');

            return {
                status: final.status,
                headers: buildRelayHeaders(final.headers),
                body: this.prepareBody(final.body, requestId),
                exchange,
            };
        } catch (err) {
            exchange.durationMs = this.clock.now() - started;
            exchange.errorCode = err instanceof ProxyError ? err.code : 'INTERNAL_ERROR';
            this.logger.warn(
                { ...exchange, err: err instanceof Error ? err.message : String(err) },
                'request forwarding failed',
            );
            throw err;
        }
    }

    private async attempt(
        exchange: ForwardedExchange,
        inbound: InboundRequest,
        body: Buffer | undefined,
        token: AccessToken,
    ): Promise<UpstreamResponse> {
        // the caller may have gone away while waiting on the shared token fetch
        if (inbound.signal?.aborted) {
            throw new UpstreamNetworkError('upstream', 'Request to upstream was cancelled');
        }
        exchange.attempts += 1;
        const outbound: OutboundRequest = {
            method: exchange.method,
            url: exchange.upstreamUrl,
            headers: buildOutboundHeaders(inbound.headers, this.target.host, token.toBearer()),
            body,
        };
        this.logger.debug(
            {
                requestId: exchange.requestId,
                attempt: exchange.attempts,
                url: outbound.url,
                headers: redactHeaders(outbound.headers),
            },
            'sending upstream request',
        );
        return this.transport.send(outbound, inbound.signal);
    }

    private prepareBody(body: Readable, requestId: string): Readable {
        const onError = (err: Error) => {
            const wrapped = new UpstreamBodyStreamError('upstream', err);
            this.logger.warn({ requestId, code: wrapped.code, err: wrapped.message }, 'response body stream failed');
        };

        if (this.responseDumpBytes <= 0) {
            body.once('error', onError);
            return body;
        }
        return tapResponseBody(
            body,
            this.responseDumpBytes,
            ({ preview, totalBytes }) => {
                this.logger.info(
                    { requestId, totalBytes, preview: describePreview(preview) },
                    'response body preview',
                );
            },
            onError,
        );
    }
}
