import { UpstreamTarget } from '../domain/models';
import { ConfigError } from '../domain/errors';

export function parseUpstreamTarget(baseUrl: string): UpstreamTarget {
    let url: URL;
    try {
        url = new URL(baseUrl);
    } catch {
        throw new ConfigError(`Upstream base URL is not a valid URL: ${baseUrl}`);
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
        throw new ConfigError(`Upstream base URL must use http or https, got ${url.protocol}`);
    }
    const basePath = url.pathname.replace(/\/+$/, '');
    return {
        baseUrl: `${url.origin}${basePath}`,
        origin: url.origin,
        host: url.host,
        basePath,
    };
}

function splitPathAndQuery(inboundUrl: string): { path: string; query: string } {
    let raw = inboundUrl;
    // absolute-form request targets: keep only path and query
    if (!raw.startsWith('/')) {
        try {
            const parsed = new URL(raw);
            raw = `${parsed.pathname}${parsed.search}`;
        } catch {
            raw = `/${raw}`;
        }
    }
    const q = raw.indexOf('?');
    return q === -1
        ? { path: raw, query: '' }
        : { path: raw.slice(0, q), query: raw.slice(q) };
}

function startsWithSegment(path: string, prefix: string): boolean {
    return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * Joins the upstream base path and the inbound path. When the inbound path
 * already carries the base path (or its last segment, e.g. `/api`), exactly
 * one copy is kept so `https://x/api` + `/api/blocks` does not become
 * `/api/api/blocks`.
 */
export function buildUpstreamUrl(target: UpstreamTarget, inboundUrl: string): string {
    const { path, query } = splitPathAndQuery(inboundUrl);
    let rest = path;

    if (target.basePath) {
        const lastSegment = target.basePath.slice(target.basePath.lastIndexOf('/'));
        if (startsWithSegment(rest, target.basePath)) {
            rest = rest.slice(target.basePath.length);
        } else if (startsWithSegment(rest, lastSegment)) {
            rest = rest.slice(lastSegment.length);
        }
    }

    return `${target.origin}${target.basePath}${rest}${query}`;
}
