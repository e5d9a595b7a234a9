export {
    AccessToken,
    type TokenState,
    type UpstreamTarget,
    type InboundRequest,
    type OutboundRequest,
    type UpstreamResponse,
    type ForwardedExchange,
} from './domain';
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
} from './domain';
export type { ErrorCode, ErrorResponseBody } from './domain';
export { systemClock } from './auth/clock';
export type { Clock, CancelTimer } from './auth/clock';
export { TokenFetcher } from './auth/token-fetcher';
export type { TokenSource } from './auth/token-fetcher';
export { TokenCache } from './auth/token-cache';
export type { TokenProvider } from './auth/token-cache';
export { RefreshScheduler } from './auth/refresh-scheduler';
export { HttpClient } from './http/client';
export type { UpstreamTransport } from './http/client';
export { RequestForwarder } from './proxy/forwarder';
export type { ForwardResult } from './proxy/forwarder';
export { buildUpstreamUrl, parseUpstreamTarget } from './proxy/upstream-url';
export { createProxyServer } from './proxy/server';
export { ProxyService } from './proxy/service';
export { createLogger } from './logging/logger';
export { loadConfig } from './config';
export type { AppConfig } from './config';
