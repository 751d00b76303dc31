/**
 * URL Rewriting Primitive
 *
 * Turns a reference found in content (absolute, scheme-relative,
 * root-relative or relative) into a proxy URL of the form
 * `${proxyBasePath}?url=<absolute URL>`. Shared by every rewrite mode and by
 * the response relay for Location headers.
 *
 * @module transformers/url
 */

import type { RewriteContext, TargetUrl } from '../proxy/types.js';

/** Schemes that can never be fetched through the proxy */
const OPAQUE_SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

/**
 * Percent-encode a value for use as a query parameter.
 * Stricter than encodeURIComponent: also encodes ! ' ( ) *, so the result is
 * safe inside any HTML attribute quoting, CSS url() or JS string literal.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Whether a resolved URL already points at the proxy endpoint
 * (query form `/proxy?url=...` or path form `/proxy/https://...`).
 */
export function isProxiedUrl(url: URL, proxyBasePath: string): boolean {
  return url.pathname === proxyBasePath || url.pathname.startsWith(`${proxyBasePath}/`);
}

/**
 * Resolve a raw reference against a base URL.
 * Returns undefined for references that must be left alone: empty values,
 * fragment-only references, non-http schemes and unparseable input.
 */
export function resolveReference(raw: string, base: TargetUrl): URL | undefined {
  const trimmed = raw.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return undefined;
  }

  const scheme = OPAQUE_SCHEME_PATTERN.exec(trimmed);
  if (scheme) {
    const name = scheme[1].toLowerCase();
    if (name !== 'http' && name !== 'https') {
      return undefined;
    }
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, base.href);
  } catch {
    return undefined;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return undefined;
  }
  return resolved;
}

/**
 * Build the proxy URL for an absolute URL. A fragment stays outside the
 * encoded target so the browser still scrolls to it.
 */
export function buildProxyUrl(absolute: URL, proxyBasePath: string): string {
  const hash = absolute.hash;
  const withoutHash = new URL(absolute.href);
  withoutHash.hash = '';
  return `${proxyBasePath}?url=${percentEncode(withoutHash.href)}${hash}`;
}

/**
 * Path-form proxy URL (`/proxy/https://host/path`).
 * Used for GET form actions, whose query string the browser replaces on submit.
 */
export function buildProxyPathUrl(absolute: URL, proxyBasePath: string): string {
  const target = new URL(absolute.href);
  target.hash = '';
  target.search = '';
  return `${proxyBasePath}/${target.href}`;
}

/**
 * Rewrite a single URL token so it points back through the proxy.
 * Already-proxied URLs are returned unchanged, so rewriting is idempotent.
 */
export function rewriteUrlToken(raw: string, ctx: RewriteContext): string {
  const resolved = resolveReference(raw, ctx.baseUrl);
  if (!resolved || isProxiedUrl(resolved, ctx.proxyBasePath)) {
    return raw;
  }
  return buildProxyUrl(resolved, ctx.proxyBasePath);
}

/** `5; url=/next` and friends, as used by meta refresh and the Refresh header */
const REFRESH_PATTERN = /^(\s*[\d.]*\s*[;,]?\s*url\s*=\s*)(["']?)([^"']*)\2(\s*)$/i;

/**
 * Rewrite the URL part of a refresh directive, leaving the delay untouched.
 */
export function rewriteRefresh(value: string, ctx: RewriteContext): string {
  const match = REFRESH_PATTERN.exec(value);
  if (!match) {
    return value;
  }
  const [, prefix, quote, url, trailing] = match;
  const rewritten = rewriteUrlToken(url, ctx);
  return rewritten === url ? value : `${prefix}${quote}${rewritten}${quote}${trailing}`;
}

/**
 * Extract the target a proxy URL wraps, or undefined when `value` is not a
 * proxy URL. Accepts absolute URLs on any origin and origin-relative paths.
 */
export function unwrapProxyUrl(value: string, proxyBasePath: string): string | undefined {
  let url: URL;
  try {
    url = new URL(value, 'http://proxy.invalid');
  } catch {
    return undefined;
  }

  if (url.pathname === proxyBasePath) {
    return url.searchParams.get('url') || undefined;
  }
  if (url.pathname.startsWith(`${proxyBasePath}/`)) {
    const target = url.pathname.slice(proxyBasePath.length + 1) + url.search;
    return target || undefined;
  }
  return undefined;
}
