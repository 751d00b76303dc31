/**
 * Proxy Module
 *
 * Main entry point for the proxy functionality: target resolution, the
 * upstream client, response relay and the HTTP server tying them together.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { createHttpProxy } from './proxy/index.js';
 * import { createConfig } from './config/index.js';
 *
 * const server = createHttpProxy(createConfig({ port: 8080 }));
 * ```
 */

// =============================================================================
// Proxy Server
// =============================================================================

export { createHttpProxy, createProxyHandler, parseProxyRequest } from './http-proxy.js';
export type { ProxyHandler, ProxyServerDeps } from './http-proxy.js';

// =============================================================================
// Pipeline Stages
// =============================================================================

export { resolveTarget, toTargetUrl, withQueryParams, hostHeader } from './target.js';
export { forward, type UpstreamConfig } from './http-client.js';
export { relay, compressResponse, type RelayOptions } from './relay.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ProxyError,
  MissingTargetError,
  InvalidTargetError,
  MethodNotAllowedError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  ClientAbortedError,
  RewriteError,
  describeError,
} from './errors.js';

// =============================================================================
// Types
// =============================================================================

export type {
  ContentType,
  ProxyMethod,
  TargetUrl,
  HeaderMap,
  ProxyRequest,
  UpstreamResponse,
  RewriteContext,
  ClientResponse,
} from './types.js';
