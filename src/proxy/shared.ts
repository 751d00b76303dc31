/**
 * Shared Proxy Utilities
 *
 * Header plumbing and body codecs used by the upstream client and the
 * response relay:
 * - Request header safelisting and Referer unwrapping
 * - Response header filtering (hop-by-hop, HSTS, CSP)
 * - Set-Cookie rewriting for the proxy origin
 * - Compression/decompression utilities
 *
 * @module proxy/shared
 */

import { gunzip, brotliDecompress, inflate, inflateRaw, gzip } from 'node:zlib';
import { promisify } from 'node:util';
import type { ProxyConfig } from '../config/index.js';
import { unwrapProxyUrl } from '../transformers/url.js';
import { describeError } from './errors.js';
import { hostHeader } from './target.js';
import type { HeaderMap, ProxyRequest } from './types.js';

// Promisified zlib functions for non-blocking compression/decompression
const gunzipAsync = promisify(gunzip);
const brotliDecompressAsync = promisify(brotliDecompress);
const inflateAsync = promisify(inflate);
const inflateRawAsync = promisify(inflateRaw);
const gzipAsync = promisify(gzip);

// =============================================================================
// Header Filtering
// =============================================================================

/** Headers that describe a single connection and are never relayed */
export const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'trailers',
  'transfer-encoding',
  'upgrade',
]);

/**
 * Headers to skip when relaying responses.
 * Includes:
 * - Hop-by-hop headers
 * - Framing headers recomputed for the relayed body
 * - HSTS, which would pin the proxy origin to HTTPS
 * - CSP headers, which would block the rewritten same-origin URLs
 * - Alt-Svc, which advertises endpoints of the target, not of the proxy
 */
export const SKIP_RESPONSE_HEADERS = new Set([
  ...HOP_BY_HOP_HEADERS,
  'content-encoding',
  'content-length',
  'set-cookie',
  'strict-transport-security',
  'content-security-policy',
  'content-security-policy-report-only',
  'x-content-security-policy',
  'x-webkit-csp',
  'alt-svc',
]);

/** Encodings the upstream client asks for and knows how to decode */
export const ACCEPTED_ENCODINGS = 'gzip, deflate, br';

/**
 * First value of a header, whether it arrived once or repeated
 */
export function headerValue(headers: Readonly<HeaderMap>, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Header names listed in a Connection header, lowercased
 */
export function connectionHeaders(headers: Readonly<HeaderMap>): Set<string> {
  const value = headers['connection'];
  const joined = Array.isArray(value) ? value.join(',') : (value ?? '');
  return new Set(
    joined
      .split(',')
      .map(token => token.trim().toLowerCase())
      .filter(Boolean)
  );
}

/**
 * Filter headers for relaying - removes hop-by-hop and problematic headers.
 * Repeated headers are joined with ", ".
 */
export function filterResponseHeaders(
  headers: Readonly<HeaderMap>,
  skipSet: ReadonlySet<string> = SKIP_RESPONSE_HEADERS
): Record<string, string> {
  const listed = connectionHeaders(headers);
  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase().trim();
    if (value === undefined || skipSet.has(lowerKey) || listed.has(lowerKey)) {
      continue;
    }
    filtered[lowerKey] = Array.isArray(value) ? value.join(', ') : value;
  }
  return filtered;
}

// =============================================================================
// Upstream Request Headers
// =============================================================================

/**
 * Referer to send upstream. A Referer pointing at a proxy URL is unwrapped to
 * the page it wraps; any other Referer names the proxy itself and is dropped.
 */
export function upstreamReferer(referer: string | undefined, proxyBasePath: string): string | undefined {
  if (!referer) {
    return undefined;
  }
  return unwrapProxyUrl(referer, proxyBasePath);
}

/**
 * Build the header set for the upstream request.
 * Only safelisted client headers are forwarded; Host always names the target.
 */
export function buildUpstreamHeaders(
  req: ProxyRequest,
  config: Pick<ProxyConfig, 'forwardHeaders' | 'defaultUserAgent' | 'proxyBasePath'>
): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const name of config.forwardHeaders) {
    const value = req.incomingHeaders[name];
    if (value === undefined) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }

  if ('referer' in headers) {
    const referer = upstreamReferer(headers['referer'], config.proxyBasePath);
    if (referer) {
      headers['referer'] = referer;
    } else {
      delete headers['referer'];
    }
  }

  headers['host'] = hostHeader(req.target);
  headers['user-agent'] ??= config.defaultUserAgent;
  headers['accept-encoding'] = ACCEPTED_ENCODINGS;

  if (req.incomingCookies) {
    headers['cookie'] = req.incomingCookies;
  }

  if (req.method === 'POST') {
    headers['content-length'] = String(req.body?.length ?? 0);
  }

  return headers;
}

// =============================================================================
// Cookies
// =============================================================================

export interface CookieRewriteOptions {
  /** Whether the proxy itself is served over HTTPS */
  secureOrigin: boolean;
}

/**
 * Rewrite a Set-Cookie directive so the browser stores it for the proxy origin.
 *
 * Domain is dropped (a foreign domain would be rejected) and Path widened to
 * `/`, since every proxied page lives under the proxy path. Over plain HTTP,
 * Secure is dropped and SameSite=None (which requires Secure) becomes Lax.
 */
export function rewriteSetCookie(cookie: string, options: CookieRewriteOptions): string {
  const [pair, ...attributes] = cookie.split(';');
  const kept: string[] = [pair.trim()];
  let hasPath = false;

  for (const attribute of attributes) {
    const trimmed = attribute.trim();
    if (!trimmed) continue;

    const name = trimmed.split('=')[0].trim().toLowerCase();
    switch (name) {
      case 'domain':
        break;
      case 'path':
        if (!hasPath) kept.push('Path=/');
        hasPath = true;
        break;
      case 'secure':
        if (options.secureOrigin) kept.push(trimmed);
        break;
      case 'samesite': {
        const value = trimmed.slice(trimmed.indexOf('=') + 1).trim().toLowerCase();
        kept.push(!options.secureOrigin && value === 'none' ? 'SameSite=Lax' : trimmed);
        break;
      }
      default:
        kept.push(trimmed);
    }
  }

  if (!hasPath) {
    kept.splice(1, 0, 'Path=/');
  }
  return kept.join('; ');
}

// =============================================================================
// Compression Utilities
// =============================================================================

/** Content types that benefit from gzip compression */
const COMPRESSIBLE_TYPES = [
  'text/',
  'application/json',
  'application/javascript',
  'application/x-javascript',
  'application/ecmascript',
  'application/xml',
  'application/xhtml+xml',
  'application/rss+xml',
  'application/atom+xml',
  'image/svg+xml',
];

/**
 * Check if content type should be gzip compressed
 */
export function shouldCompress(contentType: string | undefined): boolean {
  const ct = (contentType ?? '').toLowerCase();
  return COMPRESSIBLE_TYPES.some(type => ct.includes(type));
}

/**
 * Check if client accepts gzip encoding (an explicit `q=0` refuses it)
 */
export function acceptsGzip(acceptEncoding: string | undefined): boolean {
  return (acceptEncoding ?? '').split(',').some(token => {
    const [coding, ...params] = token.trim().toLowerCase().split(';');
    if (coding.trim() !== 'gzip' && coding.trim() !== '*') return false;
    const q = params.map(p => p.trim()).find(p => p.startsWith('q='));
    return q === undefined || Number(q.slice(2)) > 0;
  });
}

/**
 * Compress body with gzip (async, non-blocking)
 */
export async function compressGzip(body: Buffer): Promise<Buffer> {
  return await gzipAsync(body);
}

export interface DecodedBody {
  body: Buffer;
  /** Content-Encoding still applied to `body`, when it could not be removed */
  encoding?: string;
}

async function decodeOne(body: Buffer, coding: string): Promise<Buffer> {
  switch (coding) {
    case 'gzip':
    case 'x-gzip':
      return await gunzipAsync(body);
    case 'br':
      return await brotliDecompressAsync(body);
    case 'deflate':
      // Some servers send raw deflate without the zlib wrapper
      try {
        return await inflateAsync(body);
      } catch {
        return await inflateRawAsync(body);
      }
    default:
      throw new Error(`unsupported content-encoding "${coding}"`);
  }
}

/**
 * Remove every content-coding from a response body (async, non-blocking).
 * A body that cannot be decoded is returned as received together with its
 * encoding, so it can still be relayed unmodified.
 */
export async function decodeBody(body: Buffer, encoding: string | undefined): Promise<DecodedBody> {
  const codings = (encoding ?? '')
    .split(',')
    .map(c => c.trim().toLowerCase())
    .filter(c => c && c !== 'identity');
  if (codings.length === 0 || body.length === 0) {
    return { body };
  }

  try {
    let decoded = body;
    // Codings are listed in the order they were applied
    for (const coding of [...codings].reverse()) {
      decoded = await decodeOne(decoded, coding);
    }
    return { body: decoded };
  } catch (err) {
    console.warn(`⚠️ Could not decode ${encoding} body, relaying it encoded: ${describeError(err)}`);
    return { body, encoding: encoding?.trim() };
  }
}
