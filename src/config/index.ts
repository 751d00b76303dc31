/**
 * Proxy Configuration
 * Immutable configuration built once at startup and passed into each component
 */

export interface ProxyConfig {
  // Server settings
  port: number;
  bindAddress: string; // '0.0.0.0' for LAN access, '127.0.0.1' for localhost only

  // Path of the proxy endpoint; rewritten URLs take the form `${proxyBasePath}?url=...`
  proxyBasePath: string;

  // Upstream settings
  upstreamTimeoutMs: number; // ceiling for the whole upstream exchange
  forwardHeaders: readonly string[]; // lowercase request-header safelist
  defaultUserAgent: string;
  allowInsecureTls: boolean;

  // Rewriting
  rewriteHtml: boolean;
  rewriteCss: boolean;
  rewriteJs: boolean;
  injectNotice: boolean;

  // Response compression
  compressResponses: boolean;
  compressionThreshold: number; // bytes

  // Access logging (one JSON line per request)
  accessLog: boolean;
  accessLogFile: string;
}

export const defaultConfig: Readonly<ProxyConfig> = Object.freeze({
  port: 8080,
  bindAddress: '0.0.0.0',

  proxyBasePath: '/proxy',

  upstreamTimeoutMs: 15000,
  forwardHeaders: Object.freeze([
    'accept',
    'accept-language',
    'content-type',
    'user-agent',
    'referer',
    'cache-control',
    'if-none-match',
    'if-modified-since',
    'range',
    'authorization',
  ]),
  defaultUserAgent: 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  allowInsecureTls: false,

  rewriteHtml: true,
  rewriteCss: true,
  rewriteJs: true,
  injectNotice: true,

  compressResponses: true,
  compressionThreshold: 1024,

  accessLog: false,
  accessLogFile: './.proxy-logs/access.jsonl',
});

/**
 * Build a frozen configuration from the defaults and the given overrides.
 * Throws when a value cannot work (bad base path, non-positive timeout).
 */
export function createConfig(overrides: Partial<ProxyConfig> = {}): Readonly<ProxyConfig> {
  const config: ProxyConfig = {
    ...defaultConfig,
    ...overrides,
    forwardHeaders: Object.freeze(
      (overrides.forwardHeaders ?? defaultConfig.forwardHeaders).map(h => h.toLowerCase())
    ),
  };

  if (!/^\/[^?#\s]*[^/?#\s]$/.test(config.proxyBasePath)) {
    throw new Error(`Invalid proxyBasePath "${config.proxyBasePath}": must start with "/" and not end with "/"`);
  }
  if (!Number.isFinite(config.upstreamTimeoutMs) || config.upstreamTimeoutMs <= 0) {
    throw new Error(`Invalid upstreamTimeoutMs: ${config.upstreamTimeoutMs}`);
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}`);
  }

  return Object.freeze(config);
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Read configuration overrides from environment variables.
 * Only variables that are set produce an override.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ProxyConfig> {
  const overrides: Partial<ProxyConfig> = {};

  if (env.PORT) overrides.port = parseInteger('PORT', env.PORT);
  if (env.BIND_ADDRESS) overrides.bindAddress = env.BIND_ADDRESS;
  if (env.PROXY_BASE_PATH) overrides.proxyBasePath = env.PROXY_BASE_PATH;
  if (env.UPSTREAM_TIMEOUT_MS) {
    overrides.upstreamTimeoutMs = parseInteger('UPSTREAM_TIMEOUT_MS', env.UPSTREAM_TIMEOUT_MS);
  }
  if (env.INJECT_NOTICE !== undefined) overrides.injectNotice = parseBoolean(env.INJECT_NOTICE);
  if (env.ACCESS_LOG !== undefined) overrides.accessLog = parseBoolean(env.ACCESS_LOG);
  if (env.ACCESS_LOG_FILE) overrides.accessLogFile = env.ACCESS_LOG_FILE;

  return overrides;
}
