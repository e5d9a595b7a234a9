export { AccessToken, REDACTED } from './models';
export type {
    TokenState,
    UpstreamTarget,
    HeaderValue,
    HeaderMap,
    InboundRequest,
    OutboundRequest,
    UpstreamResponse,
    ForwardedExchange,
} from './models';

export {
    tokenResponseSchema,
    envSchema,
    logLevelSchema,
} from './schemas';
export type { ParsedEnv } from './schemas';

export {
    ProxyError,
    FetchError,
    TokenNetworkError,
    TokenUnauthorizedError,
    MalformedTokenResponseError,
    UpstreamError,
    UpstreamNetworkError,
    UpstreamTimeoutError,
    UpstreamStatusError,
    UpstreamBodyStreamError,
    ConfigError,
    toErrorResponse,
} from './errors';
export type { ErrorCode, ErrorResponseBody } from './errors';
