/**
 * Logger Module
 *
 * Exports logging utilities for the proxy server.
 *
 * @module logger
 */

export {
  createAccessLogger,
  noopAccessLogger,
  type AccessLogEntry,
  type AccessLogger,
} from './access-logger.js';
