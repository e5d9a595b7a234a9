import { AccessToken, TokenState } from '../domain/models';
import { Clock, systemClock } from './clock';
import type { TokenSource } from './token-fetcher';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

export type RefreshListener = (token: AccessToken) => void;

export interface TokenProvider {
    getValid(): Promise<AccessToken>;
    forceRefresh(): Promise<AccessToken>;
}

/**
 * Owns the one shared token cell. Every fetch, whether caused by traffic, a
 * forced refresh or the scheduler, goes through a single in-flight promise
 * that all concurrent callers share.
 */
export class TokenCache implements TokenProvider {
    private current: AccessToken | null = null;
    private pendingRefresh: Promise<AccessToken> | null = null;
    private listeners = new Set<RefreshListener>();
    private source: TokenSource;
    private clock: Clock;
    private logger: Logger;

    constructor(source: TokenSource, opts: { clock?: Clock; logger?: Logger } = {}) {
        this.source = source;
        this.clock = opts.clock ?? systemClock;
        this.logger = (opts.logger ?? silentLogger()).child({ component: 'token-cache' });
    }

    async getValid(): Promise<AccessToken> {
        if (this.current && this.current.isValidAt(this.clock.now())) {
            return this.current;
        }
        return this.refresh('expired');
    }

    /**
     * Fetches regardless of the cached entry's expiry. Joins a fetch that is
     * already running instead of starting a second one. A failure keeps the
     * previous token.
     */
    async forceRefresh(): Promise<AccessToken> {
        return this.refresh('forced');
    }

    onRefresh(listener: RefreshListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    state(): TokenState {
        return {
            current: this.current,
            refreshInProgress: this.pendingRefresh !== null,
        };
    }

    private refresh(reason: 'expired' | 'forced'): Promise<AccessToken> {
        if (this.pendingRefresh) {
            this.logger.debug({ reason }, 'joining in-flight token fetch');
            return this.pendingRefresh;
        }

        this.logger.debug({ reason }, 'fetching new token');
        this.pendingRefresh = this.source.fetch()
            .then((token) => {
                this.current = token;
                this.notify(token);
                return token;
            })
            .finally(() => {
                this.pendingRefresh = null;
            });
        return this.pendingRefresh;
    }

    private notify(token: AccessToken): void {
        for (const listener of this.listeners) {
            try {
                listener(token);
            } catch (err) {
                this.logger.error(
                    { err: err instanceof Error ? err.message : String(err) },
                    'refresh listener threw',
                );
            }
        }
    }
}
