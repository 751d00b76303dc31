/**
 * HTTP Proxy Server
 *
 * Serves the proxy endpoint and runs each request through the pipeline:
 * resolve target -> fetch upstream -> rewrite content -> relay response.
 *
 * Routes:
 * - `GET /` landing page
 * - `GET|POST <base>?url=<target>` query-form proxy requests
 * - `GET|POST <base>/<target>` path-form proxy requests (GET form submissions)
 * - `GET <base>/__metrics` metrics snapshot as JSON
 *
 * Every request is independent; nothing is shared between requests except
 * the metrics collector and the access log.
 *
 * @module proxy/http-proxy
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { TLSSocket } from 'node:tls';
import type { ProxyConfig } from '../config/index.js';
import { createAccessLogger, noopAccessLogger, type AccessLogger } from '../logger/index.js';
import { createMetrics, type MetricsCollector } from '../metrics/index.js';
import { renderLandingPage } from '../portal/index.js';
import { rewriteContent } from '../transformers/index.js';
import {
  ClientAbortedError,
  InvalidTargetError,
  MethodNotAllowedError,
  MissingTargetError,
  ProxyError,
  describeError,
} from './errors.js';
import { forward } from './http-client.js';
import { compressResponse, relay } from './relay.js';
import { headerValue } from './shared.js';
import { resolveTarget } from './target.js';
import type { ClientResponse, ContentType, ProxyMethod, ProxyRequest } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ProxyServerDeps {
  metrics?: MetricsCollector;
  accessLogger?: AccessLogger;
}

export type ProxyHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** What the access log records about one proxy request */
interface RequestOutcome {
  target?: string;
  status: number;
  contentType: string;
  rewriteMode: ContentType;
  bytesIn: number;
  bytesOut: number;
  error?: string;
}

// =============================================================================
// Client Utilities
// =============================================================================

/**
 * Extract client IP from request, handling X-Forwarded-For headers
 * and normalizing IPv6 addresses.
 */
function getClientIp(req: IncomingMessage): string {
  const forwardedFor = headerValue(req.headers, 'x-forwarded-for');
  if (forwardedFor) {
    const clientIp = forwardedFor.split(',')[0].trim();
    if (clientIp) return clientIp;
  }
  return normalizeIpAddress(req.socket.remoteAddress ?? '');
}

function normalizeIpAddress(ip: string): string {
  if (ip === '::1' || ip === '::ffff:127.0.0.1') {
    return '127.0.0.1';
  }
  return ip.replace(/^::ffff:/, '');
}

/**
 * Whether the client reached the proxy over HTTPS (directly or through a
 * TLS-terminating front end)
 */
function isSecureOrigin(req: IncomingMessage): boolean {
  return req.socket instanceof TLSSocket || headerValue(req.headers, 'x-forwarded-proto') === 'https';
}

function readRequestBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

// =============================================================================
// Request Parsing
// =============================================================================

function isProxyMethod(method: string | undefined): method is ProxyMethod {
  return method === 'GET' || method === 'POST';
}

/**
 * Target of a path-form request. The target normally appears as-is; a fully
 * percent-encoded one (`https%3A%2F%2F...`) is decoded first.
 */
function pathFormTarget(rest: string): string {
  if (!/^https?%3A/i.test(rest)) {
    return rest;
  }
  try {
    return decodeURIComponent(rest);
  } catch {
    throw new InvalidTargetError(rest, 'malformed percent-encoding');
  }
}

/**
 * Build a ProxyRequest from the incoming request.
 *
 * Query form: the `url` parameter names the target and every other
 * parameter is appended to it. Path form: everything after `<base>/`,
 * including the query string, is the target.
 *
 * @throws MethodNotAllowedError for methods other than GET and POST
 * @throws MissingTargetError when no target is given
 * @throws InvalidTargetError when the target cannot be resolved
 */
export function parseProxyRequest(
  req: IncomingMessage,
  body: Buffer | undefined,
  config: Pick<ProxyConfig, 'proxyBasePath'>
): ProxyRequest {
  const method = req.method ?? 'GET';
  if (!isProxyMethod(method)) {
    throw new MethodNotAllowedError(method);
  }

  const rawUrl = req.url ?? '/';
  const url = new URL(rawUrl, 'http://proxy.invalid');
  const pathPrefix = `${config.proxyBasePath}/`;

  let rawTarget: string | null;
  let queryParams: Array<[string, string]> = [];

  if (rawUrl.startsWith(pathPrefix)) {
    rawTarget = pathFormTarget(rawUrl.slice(pathPrefix.length));
  } else {
    rawTarget = url.searchParams.get('url');
    queryParams = [...url.searchParams.entries()].filter(([key]) => key !== 'url');
  }

  if (rawTarget === null || rawTarget.trim() === '') {
    throw new MissingTargetError();
  }

  const cookie = headerValue(req.headers, 'cookie');
  return {
    method,
    target: resolveTarget(rawTarget),
    queryParams,
    ...(method === 'POST' ? { body: body ?? Buffer.alloc(0) } : {}),
    incomingHeaders: req.headers,
    ...(cookie !== undefined ? { incomingCookies: cookie } : {}),
  };
}

// =============================================================================
// Response Utilities
// =============================================================================

/**
 * Write a client response; each cookie goes out as its own Set-Cookie header
 */
function sendClientResponse(res: ServerResponse, response: ClientResponse): void {
  if (response.statusMessage) {
    res.statusMessage = response.statusMessage;
  }
  res.writeHead(response.statusCode, {
    ...response.headers,
    ...(response.cookies.length > 0 ? { 'set-cookie': [...response.cookies] } : {}),
  });
  res.end(response.body);
}

/**
 * Send error response to client.
 */
function sendErrorResponse(
  res: ServerResponse,
  statusCode: number,
  message: string,
  extraHeaders: Record<string, string> = {}
): void {
  if (!res.headersSent) {
    const body = Buffer.from(`Error: ${message}`, 'utf-8');
    res.writeHead(statusCode, {
      'content-type': 'text/plain; charset=utf-8',
      'content-length': String(body.length),
      ...extraHeaders,
    });
    res.end(body);
  }
}

/**
 * Handle proxy request error. ProxyErrors are answered with their own status;
 * anything else becomes 502 Bad Gateway.
 *
 * @returns the status sent and the error code for the access log
 */
function handleProxyError(
  err: unknown,
  res: ServerResponse,
  context: string,
  metrics: MetricsCollector
): { status: number; code: string } {
  if (err instanceof ClientAbortedError) {
    console.log(`🔌 ${context}: client went away`);
    metrics.recordError(err.code);
    return { status: err.statusCode, code: err.code };
  }

  if (err instanceof ProxyError) {
    console.error(`❌ ${context}: ${err.message}`);
    metrics.recordError(err.code);
    const allow: Record<string, string> = err instanceof MethodNotAllowedError ? { allow: 'GET, POST' } : {};
    sendErrorResponse(res, err.statusCode, err.message, allow);
    return { status: err.statusCode, code: err.code };
  }

  console.error(`❌ ${context}: ${describeError(err)}`);
  metrics.recordError('BAD_GATEWAY');
  sendErrorResponse(res, 502, 'Bad Gateway');
  return { status: 502, code: 'BAD_GATEWAY' };
}

// =============================================================================
// Main Proxy Request Handler
// =============================================================================

/**
 * Run one proxy request through the pipeline and answer the client.
 * Never throws: every failure is turned into an error response.
 */
async function proxyRequest(
  req: IncomingMessage,
  res: ServerResponse,
  config: Readonly<ProxyConfig>,
  metrics: MetricsCollector,
  accessLogger: AccessLogger
): Promise<void> {
  const started = Date.now();
  const clientIp = getClientIp(req);
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  metrics.recordRequest();
  metrics.updateConnections(1);

  const outcome: RequestOutcome = { status: 0, contentType: '', rewriteMode: 'passthrough', bytesIn: 0, bytesOut: 0 };

  try {
    const body = req.method === 'POST' ? await readRequestBody(req) : undefined;
    const proxyReq = parseProxyRequest(req, body, config);
    outcome.target = proxyReq.target.href;
    console.log(`🌐 ${proxyReq.method} ${proxyReq.target.href} (client: ${clientIp})`);

    const upstream = await forward(proxyReq, config, controller.signal);
    outcome.bytesIn = upstream.body.length;
    outcome.contentType = upstream.declaredContentType;

    // A partial body cannot be rewritten without invalidating its Content-Range
    let rewrittenBody = upstream.body;
    if (upstream.encoding === undefined && upstream.statusCode !== 206) {
      const result = rewriteContent(
        upstream.body,
        upstream.declaredContentType,
        { baseUrl: upstream.url, proxyBasePath: config.proxyBasePath },
        config
      );
      rewrittenBody = result.body;
      outcome.rewriteMode = result.mode;
      if (result.error) {
        metrics.recordFallback();
        outcome.error = 'REWRITE_FAILED';
      }
    }
    metrics.recordRewrite(outcome.rewriteMode);

    const relayed = relay(upstream, rewrittenBody, {
      proxyBasePath: config.proxyBasePath,
      secureOrigin: isSecureOrigin(req),
    });
    const response = await compressResponse(relayed, headerValue(req.headers, 'accept-encoding'), config);

    sendClientResponse(res, response);
    outcome.status = response.statusCode;
    outcome.bytesOut = response.body.length;
    metrics.recordSuccess();
    metrics.recordBandwidth(outcome.bytesIn, outcome.bytesOut);
  } catch (err) {
    const failure = handleProxyError(err, res, `${req.method} ${outcome.target ?? req.url}`, metrics);
    outcome.status = failure.status;
    outcome.error = failure.code;
  } finally {
    metrics.updateConnections(-1);
  }

  await accessLogger.log({
    timestamp: new Date(started).toISOString(),
    clientIp,
    method: req.method ?? 'GET',
    target: outcome.target ?? req.url ?? '',
    status: outcome.status,
    contentType: outcome.contentType,
    rewriteMode: outcome.rewriteMode,
    bytesIn: outcome.bytesIn,
    bytesOut: outcome.bytesOut,
    durationMs: Date.now() - started,
    ...(outcome.error !== undefined ? { error: outcome.error } : {}),
  });
}

/**
 * Create the request handler for a proxy server.
 */
export function createProxyHandler(config: Readonly<ProxyConfig>, deps: ProxyServerDeps = {}): ProxyHandler {
  const metrics = deps.metrics ?? createMetrics();
  const accessLogger =
    deps.accessLogger ?? (config.accessLog ? createAccessLogger(config.accessLogFile) : noopAccessLogger);
  const metricsPath = `${config.proxyBasePath}/__metrics`;

  return async (req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://proxy.invalid').pathname;

    if (pathname === metricsPath) {
      if (req.method !== 'GET') {
        sendErrorResponse(res, 405, `Method ${req.method ?? ''} is not supported`, { allow: 'GET' });
        return;
      }
      res.writeHead(200, { 'content-type': 'application/json', 'cache-control': 'no-store' });
      res.end(JSON.stringify(metrics.getMetrics(), null, 2));
      return;
    }

    if (pathname === config.proxyBasePath || pathname.startsWith(`${config.proxyBasePath}/`)) {
      await proxyRequest(req, res, config, metrics, accessLogger);
      return;
    }

    if (pathname === '/' && req.method === 'GET') {
      const page = renderLandingPage(config.proxyBasePath);
      res.writeHead(200, { 'content-type': 'text/html; charset=utf-8' });
      res.end(page);
      return;
    }

    sendErrorResponse(res, 404, 'Not Found');
  };
}

/**
 * Create and start the HTTP proxy server.
 */
export function createHttpProxy(config: Readonly<ProxyConfig>, deps: ProxyServerDeps = {}): Server {
  const handler = createProxyHandler(config, deps);

  const server = createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      console.error(`❌ HTTP proxy error: ${describeError(err)}`);
      sendErrorResponse(res, 500, 'Internal Server Error');
    });
  });

  server.listen(config.port, config.bindAddress, () => {
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : config.port;
    console.log(`🌐 HTTP Proxy listening on ${config.bindAddress}:${port}${config.proxyBasePath}`);
  });

  return server;
}
