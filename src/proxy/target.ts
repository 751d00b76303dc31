/**
 * Target Resolver
 *
 * Normalizes the user-supplied target string into an absolute http(s) URL.
 * Purely syntactic: no DNS lookups or connections happen here.
 *
 * @module proxy/target
 */

import { InvalidTargetError } from './errors.js';
import type { TargetUrl } from './types.js';

const HTTP_SCHEME_PATTERN = /^https?:\/\//i;
const ANY_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Control characters and whitespace (including non-ASCII spaces) */
const FORBIDDEN_HOST_CHARS = /[\x00-\x20\x7f\u00a0\u1680\u2000-\u200b\u2028\u2029\u202f\u205f\u3000\ufeff]/;

/**
 * Resolve a raw target string into a TargetUrl.
 * Input without an http:// or https:// scheme gets https:// prepended.
 *
 * @throws InvalidTargetError when no valid host can be derived
 */
export function resolveTarget(input: string): TargetUrl {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidTargetError(input, 'no host');
  }

  let candidate: string;
  if (HTTP_SCHEME_PATTERN.test(trimmed)) {
    candidate = trimmed;
  } else if (ANY_SCHEME_PATTERN.test(trimmed)) {
    throw new InvalidTargetError(input, 'only http and https are supported');
  } else {
    candidate = `https://${trimmed.replace(/^\/\//, '')}`;
  }

  // The URL parser silently drops tabs and newlines, so check the raw authority first
  const authority = candidate.slice(candidate.indexOf('//') + 2).split(/[/?#\\]/, 1)[0];
  if (FORBIDDEN_HOST_CHARS.test(authority)) {
    throw new InvalidTargetError(input, 'host contains whitespace or control characters');
  }
  const hostPart = authority.slice(authority.lastIndexOf('@') + 1);
  if (!hostPart || hostPart.startsWith(':')) {
    throw new InvalidTargetError(input, 'no host');
  }

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new InvalidTargetError(input, 'malformed URL');
  }

  const target = toTargetUrl(parsed);
  if (!target) {
    throw new InvalidTargetError(input, 'no host');
  }
  return target;
}

/**
 * Convert a parsed URL into a TargetUrl, or undefined for non-http(s) URLs.
 * The fragment is dropped: it never reaches the upstream server.
 */
export function toTargetUrl(url: URL): TargetUrl | undefined {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return undefined;
  }
  if (!url.hostname) {
    return undefined;
  }

  const copy = new URL(url.href);
  copy.hash = '';

  const target: TargetUrl = {
    scheme: copy.protocol === 'https:' ? 'https' : 'http',
    host: copy.hostname,
    ...(copy.port ? { port: Number(copy.port) } : {}),
    path: copy.pathname,
    ...(copy.search ? { query: copy.search.slice(1) } : {}),
    href: copy.href,
  };
  return Object.freeze(target);
}

/**
 * Append extra query parameters to a target, keeping its existing query as-is.
 */
export function withQueryParams(
  target: TargetUrl,
  params: ReadonlyArray<readonly [string, string]>
): TargetUrl {
  if (params.length === 0) {
    return target;
  }

  const extra = new URLSearchParams(params.map(([key, value]): [string, string] => [key, value])).toString();
  // An empty query still serializes its "?"
  const separator = target.query !== undefined ? '&' : target.href.endsWith('?') ? '' : '?';
  const href = `${target.href}${separator}${extra}`;
  return toTargetUrl(new URL(href)) ?? target;
}

/**
 * Host header value for a target: hostname plus port when one is explicit
 */
export function hostHeader(target: TargetUrl): string {
  return new URL(target.href).host;
}
