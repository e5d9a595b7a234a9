export type ErrorCode =
    | 'TOKEN_NETWORK_ERROR'
    | 'TOKEN_UNAUTHORIZED'
    | 'TOKEN_MALFORMED_RESPONSE'
    | 'UPSTREAM_NETWORK_ERROR'
    | 'UPSTREAM_TIMEOUT'
    | 'UPSTREAM_STATUS'
    | 'UPSTREAM_BODY_STREAM'
    | 'CONFIG_ERROR'
    | 'INTERNAL_ERROR';

// what callers get to see; messages thrown internally never reach a response body
const PUBLIC_MESSAGES: Record<ErrorCode, string> = {
    TOKEN_NETWORK_ERROR: 'Unable to obtain upstream credentials',
    TOKEN_UNAUTHORIZED: 'Unable to obtain upstream credentials',
    TOKEN_MALFORMED_RESPONSE: 'Unable to obtain upstream credentials',
    UPSTREAM_NETWORK_ERROR: 'Upstream service unreachable',
    UPSTREAM_TIMEOUT: 'Upstream service timed out',
    UPSTREAM_STATUS: 'Upstream service returned an error',
    UPSTREAM_BODY_STREAM: 'Upstream response interrupted',
    CONFIG_ERROR: 'Proxy misconfigured',
    INTERNAL_ERROR: 'Proxy error',
};

export interface ErrorResponseBody {
    error: {
        code: ErrorCode;
        message: string;
    };
}

export class ProxyError extends Error {
    public readonly code: ErrorCode;
    public readonly source: string;
    public readonly statusCode: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code: ErrorCode;
        source?: string;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'ProxyError';
        this.code = opts.code;
        this.source = opts.source ?? 'proxy';
        this.statusCode = opts.statusCode ?? 502;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                source: this.source,
                statusCode: this.statusCode,
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
    toResponseBody(): ErrorResponseBody {
        return {
            error: {
                code: this.code,
                message: PUBLIC_MESSAGES[this.code],
            },
        };
    }
}

/** Anything that went wrong while exchanging client credentials for a token. */
export class FetchError extends ProxyError {
    constructor(opts: {
        message: string;
        code: Extract<ErrorCode, `TOKEN_${string}`>;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super({ ...opts, source: 'identity-provider', statusCode: 503 });
        this.name = 'FetchError';
    }
}

export class TokenNetworkError extends FetchError {
    constructor(message: string, cause?: Error) {
        super({ message, code: 'TOKEN_NETWORK_ERROR', cause });
        this.name = 'TokenNetworkError';
    }
}

export class TokenUnauthorizedError extends FetchError {
    public readonly providerStatus: number;

    constructor(providerStatus: number, cause?: Error) {
        super({
            message: `Identity provider rejected client credentials (HTTP ${providerStatus})`,
            code: 'TOKEN_UNAUTHORIZED',
            details: { providerStatus },
            cause,
        });
        this.name = 'TokenUnauthorizedError';
        this.providerStatus = providerStatus;
    }
}

export class MalformedTokenResponseError extends FetchError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({ message, code: 'TOKEN_MALFORMED_RESPONSE', details });
        this.name = 'MalformedTokenResponseError';
    }
}

/** Failures on the way to or back from the upstream API. */
export class UpstreamError extends ProxyError {
    constructor(opts: {
        message: string;
        code: Extract<ErrorCode, `UPSTREAM_${string}`>;
        source: string;
        statusCode: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts);
        this.name = 'UpstreamError';
    }
}

export class UpstreamNetworkError extends UpstreamError {
    constructor(source: string, message: string, cause?: Error) {
        super({
            message,
            code: 'UPSTREAM_NETWORK_ERROR',
            source,
            statusCode: 502,
            cause,
        });
        this.name = 'UpstreamNetworkError';
    }
}

export class UpstreamTimeoutError extends UpstreamError {
    constructor(source: string, timeoutMs: number) {
        super({
            message: `Request to ${source} timed out after ${timeoutMs}ms`,
            code: 'UPSTREAM_TIMEOUT',
            source,
            statusCode: 504,
        });
        this.name = 'UpstreamTimeoutError';
    }
}

export class UpstreamStatusError extends UpstreamError {
    constructor(source: string, status: number) {
        super({
            message: `${source} responded with HTTP ${status}`,
            code: 'UPSTREAM_STATUS',
            source,
            statusCode: status,
        });
        this.name = 'UpstreamStatusError';
    }
}

export class UpstreamBodyStreamError extends UpstreamError {
    constructor(source: string, cause?: Error) {
        super({
            message: `Response body from ${source} failed mid-stream${cause ? `: ${cause.message}` : ''}`,
            code: 'UPSTREAM_BODY_STREAM',
            source,
            statusCode: 502,
            cause,
        });
        this.name = 'UpstreamBodyStreamError';
    }
}

export class ConfigError extends ProxyError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'CONFIG_ERROR',
            statusCode: 500,
            details,
        });
        this.name = 'ConfigError';
    }
}

export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorResponseBody } {
    if (err instanceof ProxyError) {
        return { statusCode: err.statusCode, body: err.toResponseBody() };
    }
    return {
        statusCode: 502,
        body: { error: { code: 'INTERNAL_ERROR', message: PUBLIC_MESSAGES.INTERNAL_ERROR } },
    };
}
