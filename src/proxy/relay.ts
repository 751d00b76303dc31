/**
 * Response Relay
 *
 * Turns an upstream response plus its (possibly rewritten) body into the
 * response the client receives:
 * - hop-by-hop, HSTS and CSP headers dropped
 * - Location, Content-Location, Refresh and Link pointed back at the proxy
 * - Set-Cookie directives re-scoped to the proxy origin
 * - Content-Length recomputed for the relayed body
 *
 * @module proxy/relay
 */

import type { ProxyConfig } from '../config/index.js';
import { rewriteRefresh, rewriteUrlToken } from '../transformers/url.js';
import { acceptsGzip, compressGzip, filterResponseHeaders, rewriteSetCookie, shouldCompress } from './shared.js';
import type { ClientResponse, RewriteContext, UpstreamResponse } from './types.js';

export interface RelayOptions {
  proxyBasePath: string;
  /** Whether the proxy itself is reached over HTTPS */
  secureOrigin: boolean;
}

/** Statuses that never carry a body, so never a Content-Length either */
function isBodiless(statusCode: number): boolean {
  return (statusCode >= 100 && statusCode < 200) || statusCode === 204 || statusCode === 304;
}

/** `<uri-reference>` of each Link header entry */
const LINK_TARGET_PATTERN = /<([^>]*)>/g;

/**
 * Point every target of a Link header (preload, preconnect, ...) at the proxy.
 */
export function rewriteLinkHeader(value: string, ctx: RewriteContext): string {
  return value.replace(LINK_TARGET_PATTERN, (match: string, reference: string) => {
    const rewritten = rewriteUrlToken(reference, ctx);
    return rewritten === reference ? match : `<${rewritten}>`;
  });
}

/**
 * Build the client response for an upstream response.
 */
export function relay(resp: UpstreamResponse, body: Buffer, options: RelayOptions): ClientResponse {
  const ctx: RewriteContext = { baseUrl: resp.url, proxyBasePath: options.proxyBasePath };
  const headers = filterResponseHeaders(resp.headers);

  for (const name of ['location', 'content-location']) {
    const value = headers[name];
    if (value !== undefined) {
      headers[name] = rewriteUrlToken(value, ctx);
    }
  }
  if (headers['refresh'] !== undefined) {
    headers['refresh'] = rewriteRefresh(headers['refresh'], ctx);
  }
  if (headers['link'] !== undefined) {
    headers['link'] = rewriteLinkHeader(headers['link'], ctx);
  }

  if (resp.encoding !== undefined) {
    headers['content-encoding'] = resp.encoding;
  }

  const relayedBody = isBodiless(resp.statusCode) ? Buffer.alloc(0) : body;
  if (!isBodiless(resp.statusCode)) {
    headers['content-length'] = String(relayedBody.length);
  }

  return {
    statusCode: resp.statusCode,
    statusMessage: resp.statusMessage,
    headers,
    cookies: resp.cookies.map(cookie => rewriteSetCookie(cookie, { secureOrigin: options.secureOrigin })),
    body: relayedBody,
  };
}

/**
 * Gzip a client response when the client accepts it, the content type is
 * compressible and the body is above the threshold. Bodies that still carry
 * an upstream encoding are left alone, and so are 206 responses, whose
 * Content-Range counts the bytes as relayed.
 */
export async function compressResponse(
  response: ClientResponse,
  acceptEncoding: string | undefined,
  config: Pick<ProxyConfig, 'compressResponses' | 'compressionThreshold'>
): Promise<ClientResponse> {
  if (
    !config.compressResponses ||
    response.statusCode === 206 ||
    response.headers['content-encoding'] !== undefined ||
    response.body.length <= config.compressionThreshold ||
    !acceptsGzip(acceptEncoding) ||
    !shouldCompress(response.headers['content-type'])
  ) {
    return response;
  }

  const body = await compressGzip(response.body);
  const vary = response.headers['vary'];
  return {
    ...response,
    headers: {
      ...response.headers,
      'content-encoding': 'gzip',
      'content-length': String(body.length),
      vary: vary ? `${vary}, Accept-Encoding` : 'Accept-Encoding',
    },
    body,
  };
}
