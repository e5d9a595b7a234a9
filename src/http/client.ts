import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import {
    ProxyError,
    UpstreamNetworkError,
    UpstreamTimeoutError,
    UpstreamStatusError,
} from '../domain/errors';
import type { HeaderValue, OutboundRequest, UpstreamResponse } from '../domain/models';

export interface HttpClientOptions {
    timeoutMs: number;          // 0 disables the client-side timeout
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
    headers: Record<string, HeaderValue>;
}

/** Anything able to carry an outbound request to the upstream API. */
export interface UpstreamTransport {
    send(request: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse>;
}

export function normalizeHeaders(raw: object | undefined): Record<string, HeaderValue> {
    const out: Record<string, HeaderValue> = {};
    if (!raw) return out;
    const entries: Array<[string, unknown]> = Object.entries(raw);
    for (const [key, value] of entries) {
        const name = key.toLowerCase();
        if (typeof value === 'string') {
            out[name] = value;
        } else if (Array.isArray(value)) {
            out[name] = value.map(v => String(v));
        } else if (typeof value === 'number' || typeof value === 'boolean') {
            out[name] = String(value);
        }
    }
    return out;
}

export class HttpClient implements UpstreamTransport {
    private client: AxiosInstance;
    private source: string;
    private timeoutMs: number;

    constructor(source: string, options: HttpClientOptions) {
        this.source = source;
        this.timeoutMs = options.timeoutMs;
        this.client = axios.create({
            timeout: options.timeoutMs,
        });
    }

    /** POSTs an urlencoded form and parses the JSON answer. Non-2xx statuses reject. */
    async postForm<T>(
        url: string,
        form: Record<string, string | undefined>,
    ): Promise<HttpResponse<T>> {
        const body = new URLSearchParams();
        for (const [key, value] of Object.entries(form)) {
            if (value !== undefined) body.set(key, value);
        }
        try {
            const response: AxiosResponse<T> = await this.client.post(url, body.toString(), {
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'Accept': 'application/json',
                },
            });
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    /**
     * Sends a request verbatim and hands back the raw body stream. Every status
     * resolves; redirects are not followed and bodies are not decompressed.
     */
    async send(request: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
        try {
            const response: AxiosResponse<Readable> = await this.client.request({
                method: request.method,
                url: request.url,
                headers: request.headers,
                data: request.body,
                signal,
                responseType: 'stream',
                decompress: false,
                maxRedirects: 0,
                validateStatus: () => true,
            });
            return {
                status: response.status,
                headers: normalizeHeaders(response.headers),
                body: response.data,
            };
        } catch (err) {
            throw this.handleError(err);
        }
    }

    private wrapResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
        return {
            status: response.status,
            data: response.data,
            headers: normalizeHeaders(response.headers),
        };
    }
    private handleError(err: unknown): ProxyError {
        if (!axios.isAxiosError(err)) {
            return new UpstreamNetworkError(
                this.source,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
            return new UpstreamTimeoutError(this.source, this.timeoutMs);
        }
        if (err.code === 'ERR_CANCELED') {
            return new UpstreamNetworkError(this.source, `Request to ${this.source} was cancelled`, err);
        }
        if (!err.response) {
            return new UpstreamNetworkError(
                this.source,
                `Network error: ${err.message}`,
                err,
            );
        }
        return new UpstreamStatusError(this.source, err.response.status);
    }
}
