import { HeaderMap, HeaderValue, REDACTED } from '../domain/models';

export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
    'connection',
    'keep-alive',
    'proxy-authenticate',
    'proxy-authorization',
    'proxy-connection',
    'te',
    'trailer',
    'transfer-encoding',
    'upgrade',
]);

// replaced or recomputed on the way out
const INBOUND_DROPPED = new Set(['host', 'authorization', 'content-length']);

const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie', 'set-cookie']);

/** Header names listed in a `Connection` header are hop-by-hop for this message. */
function connectionTokens(headers: HeaderMap): Set<string> {
    const raw = headers['connection'];
    const values = Array.isArray(raw) ? raw : raw ? [raw] : [];
    const tokens = new Set<string>();
    for (const value of values) {
        for (const token of value.split(',')) {
            const name = token.trim().toLowerCase();
            if (name) tokens.add(name);
        }
    }
    return tokens;
}

function copyExcept(headers: HeaderMap, dropped: (name: string) => boolean): Record<string, HeaderValue> {
    const extra = connectionTokens(headers);
    const out: Record<string, HeaderValue> = {};
    for (const [key, value] of Object.entries(headers)) {
        if (value === undefined) continue;
        const name = key.toLowerCase();
        if (HOP_BY_HOP_HEADERS.has(name) || extra.has(name) || dropped(name)) continue;
        out[name] = value;
    }
    return out;
}

export function buildOutboundHeaders(
    inbound: HeaderMap,
    upstreamHost: string,
    bearer: string,
): Record<string, HeaderValue> {
    const out = copyExcept(inbound, name => INBOUND_DROPPED.has(name));
    out['host'] = upstreamHost;
    out['authorization'] = bearer;
    return out;
}

export function buildRelayHeaders(upstream: Record<string, HeaderValue>): Record<string, HeaderValue> {
    return copyExcept(upstream, name => name === 'authorization');
}

/** Copy safe to hand to a logger. */
export function redactHeaders(headers: HeaderMap): Record<string, HeaderValue> {
    const out: Record<string, HeaderValue> = {};
    for (const [key, value] of Object.entries(headers)) {
        if (value === undefined) continue;
        out[key] = SENSITIVE_HEADERS.has(key.toLowerCase()) ? REDACTED : value;
    }
    return out;
}
