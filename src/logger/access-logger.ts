/**
 * Access Logger
 *
 * Appends one JSON line per completed proxy request to a log file:
 * timestamp, client, target, status, rewrite mode, sizes and duration.
 * Write failures are reported on the console and never fail a request.
 *
 * @module logger/access-logger
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ContentType } from '../proxy/types.js';

/**
 * One access log line
 */
export interface AccessLogEntry {
  /** ISO timestamp of the moment the request arrived */
  timestamp: string;
  clientIp: string;
  method: string;
  /** Target URL, or the raw input when it could not be resolved */
  target: string;
  status: number;
  contentType: string;
  rewriteMode: ContentType;
  /** Body bytes received from the upstream server */
  bytesIn: number;
  /** Body bytes sent to the client */
  bytesOut: number;
  durationMs: number;
  /** Error code when the request failed or the rewrite fell back */
  error?: string;
}

export interface AccessLogger {
  log(entry: AccessLogEntry): Promise<void>;
}

/** Logger used when access logging is off */
export const noopAccessLogger: AccessLogger = {
  async log(): Promise<void> {},
};

/**
 * Create a logger appending to `file`. The directory is created on first write.
 */
export function createAccessLogger(file: string): AccessLogger {
  let ready: Promise<unknown> | undefined;

  return {
    async log(entry: AccessLogEntry): Promise<void> {
      try {
        ready ??= mkdir(dirname(file), { recursive: true });
        await ready;
        await appendFile(file, `${JSON.stringify(entry)}\n`, 'utf-8');
      } catch (err) {
        ready = undefined;
        console.error(`❌ Failed to write access log ${file}:`, err instanceof Error ? err.message : err);
      }
    },
  };
}
