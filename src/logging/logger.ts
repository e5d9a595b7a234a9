import pino, { DestinationStream, Logger } from 'pino';
import { REDACTED } from '../domain/models';
import type { LogLevel } from '../config';

export type { Logger };

// header and credential fields at every shape we log
const REDACT_PATHS = [
    'authorization',
    'headers.authorization',
    '*.headers.authorization',
    'headers["proxy-authorization"]',
    'client_secret',
    'clientSecret',
    '*.clientSecret',
    'token',
    'accessToken',
    'access_token',
];

export interface LoggerOptions {
    level: LogLevel;
    name?: string;
    destination?: DestinationStream;
}

export function createLogger(opts: LoggerOptions): Logger {
    const options = {
        name: opts.name ?? 'esplora-auth-proxy',
        level: opts.level,
        redact: { paths: REDACT_PATHS, censor: REDACTED },
        timestamp: pino.stdTimeFunctions.isoTime,
    };
    return opts.destination ? pino(options, opts.destination) : pino(options);
}

/** A logger that drops everything; the default for library consumers and tests. */
export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
