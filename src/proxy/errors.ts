/**
 * Proxy Errors
 *
 * Every failure a request can end in. A ProxyError carries the HTTP status
 * the client is answered with; RewriteError is the one kind never surfaced,
 * since a failed rewrite falls back to relaying the original body.
 *
 * @module proxy/errors
 */

export abstract class ProxyError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No `url` query parameter (and no path-form target) on a proxy request */
export class MissingTargetError extends ProxyError {
  readonly statusCode = 400;
  readonly code = 'MISSING_TARGET';

  constructor() {
    super('No URL provided in the "url" parameter');
  }
}

/** Target string cannot be turned into an http(s) URL with a valid host */
export class InvalidTargetError extends ProxyError {
  readonly statusCode = 400;
  readonly code = 'INVALID_TARGET';

  constructor(readonly input: string, reason: string) {
    super(`Invalid target URL "${input}": ${reason}`);
  }
}

export class MethodNotAllowedError extends ProxyError {
  readonly statusCode = 405;
  readonly code = 'METHOD_NOT_ALLOWED';

  constructor(readonly method: string) {
    super(`Method ${method} is not supported`);
  }
}

export class UpstreamTimeoutError extends ProxyError {
  readonly statusCode = 504;
  readonly code = 'UPSTREAM_TIMEOUT';

  constructor(readonly target: string, readonly timeoutMs: number) {
    super(`Upstream ${target} did not respond within ${timeoutMs}ms`);
  }
}

/** Connection, DNS or TLS failure talking to the target */
export class UpstreamUnreachableError extends ProxyError {
  readonly statusCode = 502;
  readonly code = 'UPSTREAM_UNREACHABLE';

  constructor(readonly target: string, cause: unknown) {
    super(`Could not reach ${target}: ${describeError(cause)}`, { cause });
  }
}

/** Client went away before the upstream exchange finished */
export class ClientAbortedError extends ProxyError {
  readonly statusCode = 499;
  readonly code = 'CLIENT_ABORTED';

  constructor(readonly target: string) {
    super(`Client closed the connection while fetching ${target}`);
  }
}

export class RewriteError extends Error {
  constructor(readonly mode: string, cause: unknown) {
    super(`Failed to rewrite ${mode} content: ${describeError(cause)}`, { cause });
    this.name = 'RewriteError';
  }
}

/**
 * Flatten an unknown thrown value into a readable message.
 * AggregateError (e.g. every resolved address refusing) lists its members.
 */
export function describeError(err: unknown): string {
  if (err instanceof AggregateError) {
    const messages = err.errors.map((e: unknown) => (e instanceof Error ? e.message : String(e))).join('; ');
    return `${err.message}: [${messages}]`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
