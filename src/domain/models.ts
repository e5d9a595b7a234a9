import { inspect } from 'util';
import type { Readable } from 'stream';

const REDACTED = '[REDACTED]';

/**
 * A bearer token plus the instant it stops being usable.
 * The raw value is only reachable through `value`; serializing or inspecting
 * the object never prints it.
 */
export class AccessToken {
    readonly value: string;
    readonly expiresAt: number;    // epoch ms, margin already applied

    constructor(value: string, expiresAt: number) {
        this.value = value;
        this.expiresAt = expiresAt;
        Object.freeze(this);
    }
    isValidAt(now: number): boolean {
        return now < this.expiresAt;
    }
    toBearer(): string {
        return `Bearer ${this.value}`;
    }
    toJSON() {
        return { value: REDACTED, expiresAt: new Date(this.expiresAt).toISOString() };
    }
    [inspect.custom]() {
        return `AccessToken { expiresAt: ${new Date(this.expiresAt).toISOString()} }`;
    }
}

export interface TokenState {
    current: AccessToken | null;
    refreshInProgress: boolean;
}

export interface UpstreamTarget {
    baseUrl: string;
    origin: string;       // scheme + host + port
    host: string;         // value for the outbound Host header
    basePath: string;     // no trailing slash, '' for the root
}

export type HeaderValue = string | string[];
export type HeaderMap = Record<string, HeaderValue | undefined>;

export interface InboundRequest {
    method: string;
    url: string;                // path + query, as received
    headers: HeaderMap;
    body?: Buffer;
    signal?: AbortSignal;
}

export interface OutboundRequest {
    method: string;
    url: string;
    headers: Record<string, HeaderValue>;
    body?: Buffer;
}

export interface UpstreamResponse {
    status: number;
    headers: Record<string, HeaderValue>;
    body: Readable;
}

/** Per-request record, logged on completion and then dropped. */
export interface ForwardedExchange {
    requestId: string;
    method: string;
    path: string;
    upstreamUrl: string;
    attempts: number;
    forcedRefresh: boolean;
    status?: number;
    durationMs?: number;
    errorCode?: string;
}

export { REDACTED };
