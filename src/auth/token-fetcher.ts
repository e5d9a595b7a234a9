import { HttpClient } from '../http/client';
import { IdentityConfig } from '../config';
import { AccessToken } from '../domain/models';
import { tokenResponseSchema } from '../domain/schemas';
import {
    FetchError,
    MalformedTokenResponseError,
    ProxyError,
    TokenNetworkError,
    TokenUnauthorizedError,
} from '../domain/errors';
import { Clock, systemClock } from './clock';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';

export interface TokenSource {
    fetch(): Promise<AccessToken>;
}

export interface TokenFetcherDeps {
    config: Pick<IdentityConfig, 'tokenUrl' | 'clientId' | 'clientSecret' | 'scope' | 'expiryMarginMs'>;
    httpClient: HttpClient;
    clock?: Clock;
    logger?: Logger;
}

/**
 * One client-credentials exchange per call. Never retries; the cache and the
 * scheduler decide when to try again.
 */
export class TokenFetcher implements TokenSource {
    private config: TokenFetcherDeps['config'];
    private httpClient: HttpClient;
    private clock: Clock;
    private logger: Logger;

    constructor(deps: TokenFetcherDeps) {
        this.config = deps.config;
        this.httpClient = deps.httpClient;
        this.clock = deps.clock ?? systemClock;
        this.logger = (deps.logger ?? silentLogger()).child({ component: 'token-fetcher' });
    }

    async fetch(): Promise<AccessToken> {
        this.logger.debug({ tokenUrl: this.config.tokenUrl }, 'requesting access token');

        let data: unknown;
        try {
            const response = await this.httpClient.postForm<unknown>(this.config.tokenUrl, {
                grant_type: 'client_credentials',
                client_id: this.config.clientId,
                client_secret: this.config.clientSecret,
                scope: this.config.scope,
            });
            data = response.data;
        } catch (err) {
            throw this.toFetchError(err);
        }

        const parsed = tokenResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new MalformedTokenResponseError(
                'Token response is missing or has invalid fields',
                {
                    issues: parsed.error.issues.map(issue => ({
                        field: issue.path.join('.'),
                        message: issue.message,
                    })),
                },
            );
        }

        const now = this.clock.now();
        const lifetimeMs = parsed.data.expires_in * 1000;
        // a lifetime at or below the margin yields a token that is already stale for the cache
        const expiresAt = Math.max(now, now + lifetimeMs - this.config.expiryMarginMs);
        if (expiresAt === now) {
            this.logger.warn(
                { expiresIn: parsed.data.expires_in, marginMs: this.config.expiryMarginMs },
                'token lifetime does not exceed the expiry margin; it will be refetched on every use',
            );
        }

        this.logger.debug({ expiresIn: parsed.data.expires_in }, 'access token granted');
        return new AccessToken(parsed.data.access_token, expiresAt);
    }

    private toFetchError(err: unknown): FetchError {
        if (err instanceof FetchError) return err;
        if (err instanceof ProxyError && err.code === 'UPSTREAM_STATUS') {
            if (err.statusCode === 401 || err.statusCode === 403) {
                return new TokenUnauthorizedError(err.statusCode, err);
            }
            return new TokenNetworkError(`Identity provider responded with HTTP ${err.statusCode}`, err);
        }
        if (err instanceof ProxyError && err.code === 'UPSTREAM_TIMEOUT') {
            return new TokenNetworkError('Identity provider timed out', err);
        }
        return new TokenNetworkError(
            `Failed to obtain access token: ${err instanceof Error ? err.message : 'unknown error'}`,
            err instanceof Error ? err : undefined,
        );
    }
}
