import { Readable } from 'stream';
import { AppConfig } from '../src/config';
import { Clock, CancelTimer } from '../src/auth/clock';
import { AccessToken, UpstreamResponse, HeaderValue } from '../src/domain/models';
import { createLogger, Logger } from '../src/logging/logger';

export const TEST_CLIENT_SECRET = 'test-secret';

export const TEST_IDENTITY_CONFIG = {
    tokenUrl: 'https://idp.test/realms/test/protocol/openid-connect/token',
    clientId: 'test-client',
    clientSecret: TEST_CLIENT_SECRET,
    scope: 'openid',
    timeoutMs: 5000,
    expiryMarginMs: 30_000,
};

export function buildTestConfig(overrides?: Partial<AppConfig>): AppConfig {
    return {
        logLevel: 'silent',
        identity: { ...TEST_IDENTITY_CONFIG },
        upstream: {
            baseUrl: 'https://esplora.test/api',
            timeoutMs: 0,
            responseDumpBytes: 0,
        },
        refresh: {
            leadMs: 60_000,
            retryBackoffMs: 5_000,
        },
        server: {
            host: '127.0.0.1',
            port: 0,
            bodyLimitBytes: 1024 * 1024,
        },
        ...overrides,
    };
}

interface PendingTimer {
    id: number;
    at: number;
    callback: () => void;
}

/** Time only moves when a test calls advance(). */
export class ManualClock implements Clock {
    private current: number;
    private timers: PendingTimer[] = [];
    private nextId = 0;

    constructor(start = 1_700_000_000_000) {
        this.current = start;
    }
    now(): number {
        return this.current;
    }
    schedule(callback: () => void, delayMs: number): CancelTimer {
        const id = ++this.nextId;
        this.timers.push({ id, at: this.current + delayMs, callback });
        return () => {
            this.timers = this.timers.filter(t => t.id !== id);
        };
    }
    /** Delays, relative to now, of every armed timer. */
    pendingDelays(): number[] {
        return this.timers.map(t => t.at - this.current).sort((a, b) => a - b);
    }
    advance(ms: number): void {
        const target = this.current + ms;
        for (;;) {
            const due = this.timers
                .filter(t => t.at <= target)
                .sort((a, b) => a.at - b.at)[0];
            if (!due) break;
            this.timers = this.timers.filter(t => t.id !== due.id);
            this.current = due.at;
            due.callback();
        }
        this.current = target;
    }
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve(value: T): void;
    reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (err: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Lets every pending promise continuation run. */
export function flushPromises(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

export function bodyOf(text: string | Buffer): Readable {
    return Readable.from([Buffer.isBuffer(text) ? text : Buffer.from(text)], { objectMode: false });
}

export function upstreamResponse(
    status: number,
    body: string | Buffer = '',
    headers: Record<string, HeaderValue> = {},
): UpstreamResponse {
    return { status, headers, body: bodyOf(body) };
}

export async function readBody(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

export function tokenAt(value: string, expiresAt: number): AccessToken {
    return new AccessToken(value, expiresAt);
}

export interface CapturedLogs {
    logger: Logger;
    lines: string[];
    entries(): Array<Record<string, unknown>>;
}

/** A trace-level logger writing into memory. */
export function captureLogs(): CapturedLogs {
    const lines: string[] = [];
    const logger = createLogger({
        level: 'trace',
        destination: { write: (msg: string) => { lines.push(msg); } },
    });
    return {
        logger,
        lines,
        entries: () => lines.map(line => {
            const parsed: unknown = JSON.parse(line);
            return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
        }),
    };
}
