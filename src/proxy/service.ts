import type { FastifyInstance } from 'fastify';
import { AppConfig } from '../config';
import { HttpClient, UpstreamTransport } from '../http/client';
import { TokenFetcher, TokenSource } from '../auth/token-fetcher';
import { TokenCache } from '../auth/token-cache';
import { RefreshScheduler } from '../auth/refresh-scheduler';
import { Clock, systemClock } from '../auth/clock';
import { RequestForwarder } from './forwarder';
import { parseUpstreamTarget } from './upstream-url';
import { createProxyServer } from './server';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

export interface ProxyServiceDeps {
    config: AppConfig;
    logger?: Logger;
    clock?: Clock;
    tokenSource?: TokenSource;         // defaults to a TokenFetcher over axios
    transport?: UpstreamTransport;     // defaults to an HttpClient over axios
}

/** Wires the token lifecycle and the forwarder behind one HTTP listener. */
export class ProxyService {
    readonly cache: TokenCache;
    readonly scheduler: RefreshScheduler;
    readonly forwarder: RequestForwarder;
    readonly server: FastifyInstance;
    private config: AppConfig;
    private logger: Logger;

    constructor(deps: ProxyServiceDeps) {
        this.config = deps.config;
        this.logger = deps.logger ?? silentLogger();
        const clock = deps.clock ?? systemClock;
        const target = parseUpstreamTarget(deps.config.upstream.baseUrl);

        const tokenSource = deps.tokenSource ?? new TokenFetcher({
            config: deps.config.identity,
            httpClient: new HttpClient('identity-provider', { timeoutMs: deps.config.identity.timeoutMs }),
            clock,
            logger: this.logger,
        });
        this.cache = new TokenCache(tokenSource, { clock, logger: this.logger });
        this.scheduler = new RefreshScheduler({
            cache: this.cache,
            config: deps.config.refresh,
            clock,
            logger: this.logger,
        });
        this.forwarder = new RequestForwarder({
            target,
            tokens: this.cache,
            transport: deps.transport ?? new HttpClient('upstream', { timeoutMs: deps.config.upstream.timeoutMs }),
            responseDumpBytes: deps.config.upstream.responseDumpBytes,
            clock,
            logger: this.logger,
        });
        this.server = createProxyServer({
            forwarder: this.forwarder,
            bodyLimitBytes: deps.config.server.bodyLimitBytes,
            logger: this.logger,
        });
    }

    /** Starts background refresh and binds the listener. Resolves with the bound address. */
    async start(): Promise<string> {
        this.scheduler.start();
        try {
            const address = await this.server.listen({
                host: this.config.server.host,
                port: this.config.server.port,
            });
            this.logger.info({ address, upstream: this.config.upstream.baseUrl }, 'proxy listening');
            return address;
        } catch (err) {
            this.scheduler.stop();
            throw err;
        }
    }

    async stop(): Promise<void> {
        this.scheduler.stop();
        await this.server.close();
        this.logger.info('proxy stopped');
    }
}
