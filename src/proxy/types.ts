/**
 * Proxy Types
 * Shared type definitions for the request pipeline:
 * resolver -> upstream client -> content rewriter -> response relay
 */

/**
 * Rewrite mode selected once from the declared content type
 * - 'html': attribute, style and inline script URLs are rewritten
 * - 'css': url() and @import targets are rewritten
 * - 'js': string-literal URLs in fetch/navigation positions are rewritten
 * - 'passthrough': bytes are relayed untouched (images, fonts, JSON, ...)
 */
export type ContentType = 'html' | 'css' | 'js' | 'passthrough';

export type ProxyMethod = 'GET' | 'POST';

/**
 * Absolute upstream URL produced by the target resolver.
 * Scheme is always http or https and host is never empty.
 */
export interface TargetUrl {
  readonly scheme: 'http' | 'https';
  readonly host: string;
  readonly port?: number;
  readonly path: string;
  readonly query?: string;
  /** Serialized form, e.g. "https://example.com/a/b.html?x=1" */
  readonly href: string;
}

/**
 * Header map as received from node:http: lowercase keys, repeated headers as arrays
 */
export type HeaderMap = Record<string, string | string[] | undefined>;

/**
 * One inbound proxy request, built from the client request before any I/O
 */
export interface ProxyRequest {
  readonly method: ProxyMethod;
  readonly target: TargetUrl;
  /** Query parameters of the proxy request other than `url`, in order */
  readonly queryParams: ReadonlyArray<readonly [string, string]>;
  readonly body?: Buffer;
  readonly incomingHeaders: Readonly<HeaderMap>;
  /** Raw `Cookie` header of the client, forwarded verbatim */
  readonly incomingCookies?: string;
}

export interface UpstreamResponse {
  readonly statusCode: number;
  readonly statusMessage: string;
  /** Lowercase keys, values as received (set-cookie excluded) */
  readonly headers: Readonly<HeaderMap>;
  /** Every Set-Cookie directive in the order received */
  readonly cookies: readonly string[];
  /** Decoded body (content-encoding removed when `encoding` is undefined) */
  readonly body: Buffer;
  /** Content-Encoding still applied to `body`, when decompression failed */
  readonly encoding?: string;
  readonly declaredContentType: string;
  /** URL the response was fetched from */
  readonly url: TargetUrl;
}

/**
 * What the rewriter needs to turn a reference found in content into a proxy URL
 */
export interface RewriteContext {
  /** Document URL relative references resolve against */
  readonly baseUrl: TargetUrl;
  readonly proxyBasePath: string;
}

/**
 * Response handed back to the client
 */
export interface ClientResponse {
  readonly statusCode: number;
  readonly statusMessage: string;
  /** Single-valued headers; cookies live in `cookies` */
  readonly headers: Readonly<Record<string, string>>;
  /** Each entry is sent as its own Set-Cookie header */
  readonly cookies: readonly string[];
  readonly body: Buffer;
}
