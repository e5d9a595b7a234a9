import { RefreshConfig } from '../config';
import { AccessToken } from '../domain/models';
import { Clock, CancelTimer, systemClock } from './clock';
import { TokenCache } from './token-cache';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

const MIN_DELAY_MS = 1_000;

export interface RefreshSchedulerDeps {
    cache: TokenCache;
    config: RefreshConfig;
    clock?: Clock;
    logger?: Logger;
}

/**
 * Renews the cached token ahead of expiry, independent of traffic. Any
 * successful fetch re-arms the timer, so a token fetched on the request path
 * is covered too.
 */
export class RefreshScheduler {
    private cache: TokenCache;
    private config: RefreshConfig;
    private clock: Clock;
    private logger: Logger;
    private cancelTimer: CancelTimer | null = null;
    private unsubscribe: (() => void) | null = null;
    private running = false;

    constructor(deps: RefreshSchedulerDeps) {
        this.cache = deps.cache;
        this.config = deps.config;
        this.clock = deps.clock ?? systemClock;
        this.logger = (deps.logger ?? silentLogger()).child({ component: 'refresh-scheduler' });
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.unsubscribe = this.cache.onRefresh(token => this.armFor(token));
        this.logger.info('token refresh scheduler started');
        this.tick();
    }

    stop(): void {
        if (!this.running) return;
        this.running = false;
        this.clearTimer();
        this.unsubscribe?.();
        this.unsubscribe = null;
        this.logger.info('token refresh scheduler stopped');
    }

    isRunning(): boolean {
        return this.running;
    }

    private tick(): void {
        this.clearTimer();
        // success re-arms through the onRefresh listener
        this.cache.forceRefresh().catch((err: unknown) => {
            if (!this.running) return;
            this.logger.warn(
                {
                    code: err instanceof Error && 'code' in err ? err.code : undefined,
                    err: err instanceof Error ? err.message : String(err),
                    retryInMs: this.config.retryBackoffMs,
                },
                'scheduled token refresh failed',
            );
            this.arm(this.config.retryBackoffMs);
        });
    }

    private armFor(token: AccessToken): void {
        if (!this.running) return;
        const delay = Math.max(
            token.expiresAt - this.clock.now() - this.config.leadMs,
            MIN_DELAY_MS,
        );
        this.logger.debug({ delayMs: delay }, 'next token refresh scheduled');
        this.arm(delay);
    }

    private arm(delayMs: number): void {
        this.clearTimer();
        this.cancelTimer = this.clock.schedule(() => {
            this.cancelTimer = null;
            if (this.running) this.tick();
        }, delayMs);
    }

    private clearTimer(): void {
        if (this.cancelTimer) {
            this.cancelTimer();
            this.cancelTimer = null;
        }
    }
}
