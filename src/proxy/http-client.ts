/**
 * Upstream Client
 *
 * Performs the single outbound HTTP/HTTPS request of a proxy exchange and
 * hands back a fully buffered, decoded response. Redirects are not followed:
 * a 3xx is returned to the caller so the relay can rewrite its Location.
 */

import { request as httpRequest, type IncomingMessage } from 'node:http';
import { request as httpsRequest, type RequestOptions } from 'node:https';
import type { ProxyConfig } from '../config/index.js';
import { ClientAbortedError, UpstreamTimeoutError, UpstreamUnreachableError, type ProxyError } from './errors.js';
import { buildUpstreamHeaders, decodeBody, headerValue } from './shared.js';
import { withQueryParams } from './target.js';
import type { HeaderMap, ProxyRequest, UpstreamResponse } from './types.js';

export type UpstreamConfig = Pick<
  ProxyConfig,
  'upstreamTimeoutMs' | 'forwardHeaders' | 'defaultUserAgent' | 'proxyBasePath' | 'allowInsecureTls'
>;

/**
 * Split response headers into plain headers and Set-Cookie directives
 */
function splitHeaders(res: IncomingMessage): { headers: HeaderMap; cookies: string[] } {
  const headers: HeaderMap = {};
  for (const [key, value] of Object.entries(res.headers)) {
    if (key !== 'set-cookie') {
      headers[key] = value;
    }
  }
  return { headers, cookies: res.headers['set-cookie'] ?? [] };
}

/**
 * Fetch the target of a proxy request.
 *
 * The whole exchange (connect, send, receive) is bounded by
 * `upstreamTimeoutMs`. Aborting `signal` cancels the request.
 *
 * @throws UpstreamTimeoutError when the timeout elapses first
 * @throws UpstreamUnreachableError on connection, DNS or TLS failure
 * @throws ClientAbortedError when `signal` is aborted
 */
export async function forward(
  req: ProxyRequest,
  config: UpstreamConfig,
  signal?: AbortSignal
): Promise<UpstreamResponse> {
  const target = withQueryParams(req.target, req.queryParams);
  const url = new URL(target.href);
  const isHttps = target.scheme === 'https';

  if (signal?.aborted) {
    throw new ClientAbortedError(target.href);
  }

  const options: RequestOptions = {
    hostname: url.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: url.port || (isHttps ? 443 : 80),
    path: `${url.pathname}${url.search}`,
    method: req.method,
    headers: buildUpstreamHeaders(req, config),
  };
  if (isHttps) {
    options.rejectUnauthorized = !config.allowInsecureTls;
  }

  const raw = await new Promise<{ res: IncomingMessage; body: Buffer }>((resolve, reject) => {
    let settled = false;

    const fail = (err: ProxyError): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      upstream.destroy();
      reject(err);
    };

    const onAbort = (): void => fail(new ClientAbortedError(target.href));

    const onResponse = (res: IncomingMessage): void => {
      const chunks: Buffer[] = [];

      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve({ res, body: Buffer.concat(chunks) });
      });
      res.on('error', (err) => fail(new UpstreamUnreachableError(target.href, err)));
    };

    const upstream = isHttps ? httpsRequest(options, onResponse) : httpRequest(options, onResponse);

    const timer = setTimeout(
      () => fail(new UpstreamTimeoutError(target.href, config.upstreamTimeoutMs)),
      config.upstreamTimeoutMs
    );

    signal?.addEventListener('abort', onAbort, { once: true });
    upstream.on('error', (err) => fail(new UpstreamUnreachableError(target.href, err)));

    if (req.method === 'POST' && req.body && req.body.length > 0) {
      upstream.write(req.body);
    }
    upstream.end();
  });

  const { res, body } = raw;
  const { headers, cookies } = splitHeaders(res);
  const decoded = await decodeBody(body, headerValue(headers, 'content-encoding'));

  if (decoded.encoding === undefined) {
    delete headers['content-encoding'];
  }

  return {
    statusCode: res.statusCode ?? 502,
    statusMessage: res.statusMessage ?? '',
    headers,
    cookies,
    body: decoded.body,
    ...(decoded.encoding !== undefined ? { encoding: decoded.encoding } : {}),
    declaredContentType: headerValue(headers, 'content-type') ?? '',
    url: target,
  };
}
