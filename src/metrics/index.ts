/**
 * Metrics Collection Module
 * Tracks proxy statistics for monitoring and debugging.
 * Each server owns its own collector, created with createMetrics().
 */

import type { ContentType } from '../proxy/types.js';

export interface RequestMetrics {
  total: number;
  succeeded: number;
  failed: number;
}

export interface RewriteMetrics {
  html: number;
  css: number;
  js: number;
  passthrough: number;
  /** Rewrites that failed and relayed the original body */
  fallbacks: number;
}

export interface BandwidthMetrics {
  totalBytesIn: number;
  totalBytesOut: number;
}

export interface ProxyMetrics {
  startTime: number;
  uptime: number;
  requests: RequestMetrics;
  rewrites: RewriteMetrics;
  /** Failed requests by error code, e.g. UPSTREAM_TIMEOUT */
  errors: Record<string, number>;
  bandwidth: BandwidthMetrics;
  activeConnections: number;
  peakConnections: number;
}

export interface MetricsCollector {
  recordRequest(): void;
  recordSuccess(): void;
  recordError(code: string): void;
  recordRewrite(mode: ContentType): void;
  recordFallback(): void;
  recordBandwidth(bytesIn: number, bytesOut: number): void;
  updateConnections(delta: number): void;
  getMetrics(): ProxyMetrics;
  resetMetrics(): void;
}

/**
 * Create an independent metrics collector
 */
export function createMetrics(now: () => number = Date.now): MetricsCollector {
  let startTime = now();
  let requests: RequestMetrics = { total: 0, succeeded: 0, failed: 0 };
  let rewrites: RewriteMetrics = { html: 0, css: 0, js: 0, passthrough: 0, fallbacks: 0 };
  let errors: Record<string, number> = {};
  let bandwidth: BandwidthMetrics = { totalBytesIn: 0, totalBytesOut: 0 };
  let activeConnections = 0;
  let peakConnections = 0;

  return {
    recordRequest(): void {
      requests.total++;
    },

    recordSuccess(): void {
      requests.succeeded++;
    },

    recordError(code: string): void {
      requests.failed++;
      errors[code] = (errors[code] ?? 0) + 1;
    },

    recordRewrite(mode: ContentType): void {
      rewrites[mode]++;
    },

    recordFallback(): void {
      rewrites.fallbacks++;
    },

    recordBandwidth(bytesIn: number, bytesOut: number): void {
      bandwidth.totalBytesIn += bytesIn;
      bandwidth.totalBytesOut += bytesOut;
    },

    updateConnections(delta: number): void {
      activeConnections = Math.max(0, activeConnections + delta);
      if (activeConnections > peakConnections) {
        peakConnections = activeConnections;
      }
    },

    getMetrics(): ProxyMetrics {
      return {
        startTime,
        uptime: now() - startTime,
        requests: { ...requests },
        rewrites: { ...rewrites },
        errors: { ...errors },
        bandwidth: { ...bandwidth },
        activeConnections,
        peakConnections,
      };
    },

    resetMetrics(): void {
      startTime = now();
      requests = { total: 0, succeeded: 0, failed: 0 };
      rewrites = { html: 0, css: 0, js: 0, passthrough: 0, fallbacks: 0 };
      errors = {};
      bandwidth = { totalBytesIn: 0, totalBytesOut: 0 };
      activeConnections = 0;
      peakConnections = 0;
    },
  };
}
