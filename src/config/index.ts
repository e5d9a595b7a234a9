import dotenv from 'dotenv';
import path from 'path';
import { ZodError } from 'zod';
import { envSchema, ParsedEnv } from '../domain/schemas';
import { ConfigError } from '../domain/errors';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface IdentityConfig {
    tokenUrl: string;
    clientId: string;
    clientSecret: string;
    scope?: string;
    timeoutMs: number;
    expiryMarginMs: number;
}

export interface UpstreamConfig {
    baseUrl: string;
    timeoutMs: number;          // 0 = no timeout
    responseDumpBytes: number;  // 0 = disabled
}

export interface RefreshConfig {
    leadMs: number;
    retryBackoffMs: number;
}

export interface ServerConfig {
    host: string;
    port: number;
    bodyLimitBytes: number;
}

export interface AppConfig {
    logLevel: LogLevel;
    identity: IdentityConfig;
    upstream: UpstreamConfig;
    refresh: RefreshConfig;
    server: ServerConfig;
}

const DEFAULTS: Record<string, string> = {
    ESPLORA_UPSTREAM: 'https://enterprise.blockstream.info/api',
    OIDC_TOKEN_URL: 'https://login.blockstream.com/realms/blockstream-public/protocol/openid-connect/token',
    OIDC_SCOPE: 'openid',
    BIND: '127.0.0.1:3002',
    LOG_LEVEL: 'info',
    RESPONSE_DUMP_BYTES: '0',
    REQUEST_TIMEOUT_MS: '15000',
    UPSTREAM_TIMEOUT_MS: '0',
    TOKEN_EXPIRY_MARGIN_SECONDS: '30',
    REFRESH_LEAD_SECONDS: '60',
    REFRESH_RETRY_SECONDS: '5',
    BODY_LIMIT_BYTES: String(10 * 1024 * 1024),
};

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
    const val = env[key];
    if (val === undefined || val.trim() === '') {
        return DEFAULTS[key];
    }
    return val.trim();
}

function parseEnv(raw: Env): ParsedEnv {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const issues = err.issues.map(issue => ({
                variable: issue.path.join('.'),
                message: issue.message,
            }));
            throw new ConfigError(
                `Invalid configuration: ${issues.map(i => i.message).join('; ')}. ` +
                `Check your .env file or environment.`,
                { issues },
            );
        }
        throw err;
    }
}

/**
 * Reads the proxy configuration from the environment (and `.env` when reading
 * the real process environment). Throws ConfigError listing every invalid
 * variable at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    if (env === process.env) {
        dotenv.config({ path: path.resolve(process.cwd(), '.env') });
    }

    const raw: Env = {};
    for (const key of Object.keys(envSchema.shape)) {
        raw[key] = readEnv(env, key);
    }
    // an explicitly empty scope means "send none"
    if (env.OIDC_SCOPE !== undefined && env.OIDC_SCOPE.trim() === '') {
        raw.OIDC_SCOPE = '';
    }

    const parsed = parseEnv(raw);

    return {
        logLevel: parsed.LOG_LEVEL,
        identity: {
            tokenUrl: parsed.OIDC_TOKEN_URL,
            clientId: parsed.ESPLORA_CLIENT_ID,
            clientSecret: parsed.ESPLORA_CLIENT_SECRET,
            scope: parsed.OIDC_SCOPE === '' ? undefined : parsed.OIDC_SCOPE,
            timeoutMs: parsed.REQUEST_TIMEOUT_MS,
            expiryMarginMs: parsed.TOKEN_EXPIRY_MARGIN_SECONDS * 1000,
        },
        upstream: {
            baseUrl: parsed.ESPLORA_UPSTREAM,
            timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
            responseDumpBytes: parsed.RESPONSE_DUMP_BYTES,
        },
        refresh: {
            leadMs: parsed.REFRESH_LEAD_SECONDS * 1000,
            retryBackoffMs: parsed.REFRESH_RETRY_SECONDS * 1000,
        },
        server: {
            host: parsed.BIND.host,
            port: parsed.BIND.port,
            bodyLimitBytes: parsed.BODY_LIMIT_BYTES,
        },
    };
}
