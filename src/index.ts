/**
 * URL-Rewriting Web Proxy
 *
 * Fetches any page on behalf of the browser and rewrites its links, styles
 * and scripts so that every follow-up request comes back through the proxy.
 */

import type { Server } from 'node:http';
import { createConfig, configFromEnv, type ProxyConfig } from './config/index.js';
import { createHttpProxy } from './proxy/index.js';
import { createMetrics, type MetricsCollector, type ProxyMetrics } from './metrics/index.js';
import { createAccessLogger, noopAccessLogger } from './logger/index.js';

function printBanner(): void {
  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║   URL-Rewriting Web Proxy                                     ║
║   Browse any site through a single origin                     ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`);
}

function flag(enabled: boolean): string {
  return enabled ? '✅' : '❌';
}

export interface ProxyServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getConfig(): Readonly<ProxyConfig>;
  getMetrics(): ProxyMetrics;
}

export function createProxyServer(configOverrides: Partial<ProxyConfig> = {}): ProxyServer {
  const config = createConfig(configOverrides);
  const metrics: MetricsCollector = createMetrics();
  let httpServer: Server | null = null;

  return {
    async start(): Promise<void> {
      printBanner();

      const accessLogger = config.accessLog ? createAccessLogger(config.accessLogFile) : noopAccessLogger;
      console.log('🌐 Starting HTTP proxy...');
      const server = createHttpProxy(config, { metrics, accessLogger });
      httpServer = server;

      await new Promise<void>((resolve, reject) => {
        server.once('listening', resolve);
        server.once('error', reject);
      });

      console.log('✅ Proxy is ready!');
      console.log(`
🎯 Proxy Status:
   Landing page: http://localhost:${config.port}/
   Proxy path:   http://localhost:${config.port}${config.proxyBasePath}?url=<address>
   Metrics:      http://localhost:${config.port}${config.proxyBasePath}/__metrics

🔧 Features:
   Rewrite HTML:   ${flag(config.rewriteHtml)}
   Rewrite CSS:    ${flag(config.rewriteCss)}
   Rewrite JS:     ${flag(config.rewriteJs)}
   Notice Banner:  ${flag(config.injectNotice)}
   Compression:    ${flag(config.compressResponses)}
   Access Log:     ${config.accessLog ? config.accessLogFile : '❌'}
`);
    },

    async stop(): Promise<void> {
      console.log('🛑 Stopping proxy...');
      const server = httpServer;
      httpServer = null;
      if (server) {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      }
      console.log('👋 Proxy stopped');
    },

    getConfig(): Readonly<ProxyConfig> {
      return config;
    },

    getMetrics(): ProxyMetrics {
      return metrics.getMetrics();
    },
  };
}

// CLI entry point
if (process.argv[1]?.endsWith('index.js') || process.argv[1]?.endsWith('index.ts')) {
  const server = createProxyServer(configFromEnv());

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('❌ Failed to stop cleanly:', err);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => {
    console.log('\n');
    shutdown();
  });
  process.on('SIGTERM', shutdown);

  server.start().catch((err: unknown) => {
    console.error('❌ Failed to start proxy:', err);
    process.exit(1);
  });
}

export { createConfig, configFromEnv, defaultConfig, type ProxyConfig } from './config/index.js';
export { createHttpProxy, createProxyHandler } from './proxy/index.js';
export { rewriteContent } from './transformers/index.js';
