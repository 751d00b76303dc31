/**
 * Content Rewriter
 *
 * Picks one rewrite mode from the declared content type and runs the
 * matching transformer. Any failure falls back to the original bytes.
 *
 * @module transformers
 */

import { isUtf8 } from 'node:buffer';
import type { ProxyConfig } from '../config/index.js';
import { RewriteError, describeError } from '../proxy/errors.js';
import type { ContentType, RewriteContext } from '../proxy/types.js';
import { rewriteCss } from './css.js';
import { rewriteHtml } from './html.js';
import { rewriteJs } from './js.js';

export { rewriteCss, rewriteCssUrls, rewriteImportParams } from './css.js';
export { rewriteHtml, rewriteSrcset, NOTICE_BANNER_HTML } from './html.js';
export type { HtmlRewriteOptions } from './html.js';
export { rewriteJs } from './js.js';
export type { JsRewriteOptions } from './js.js';
export {
  buildProxyPathUrl,
  buildProxyUrl,
  isProxiedUrl,
  percentEncode,
  resolveReference,
  rewriteRefresh,
  rewriteUrlToken,
  unwrapProxyUrl,
} from './url.js';

// =============================================================================
// Types
// =============================================================================

export interface RewriteResult {
  body: Buffer;
  mode: ContentType;
  /** Set when rewriting failed and `body` is the original */
  error?: RewriteError;
}

/** Rewrite switches of the proxy configuration */
export type RewriteOptions = Pick<ProxyConfig, 'rewriteHtml' | 'rewriteCss' | 'rewriteJs' | 'injectNotice'>;

const HTML_TYPES = new Set(['text/html', 'application/xhtml+xml']);
const CSS_TYPES = new Set(['text/css']);
const JS_TYPES = new Set([
  'application/javascript',
  'text/javascript',
  'application/x-javascript',
  'application/ecmascript',
  'text/ecmascript',
]);

// =============================================================================
// Mode Selection
// =============================================================================

/**
 * MIME essence of a Content-Type header: `Text/HTML; charset=utf-8` -> `text/html`
 */
export function mimeEssence(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

/**
 * Select the rewrite mode for a declared content type.
 * Unknown or missing types are passed through; bodies are never sniffed.
 */
export function selectRewriteMode(contentType: string | undefined): ContentType {
  const essence = mimeEssence(contentType);
  if (HTML_TYPES.has(essence)) return 'html';
  if (CSS_TYPES.has(essence)) return 'css';
  if (JS_TYPES.has(essence)) return 'js';
  return 'passthrough';
}

/**
 * Charset parameter of a Content-Type header, lowercased
 */
export function getCharset(contentType: string | undefined): string | undefined {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '');
  return match ? match[1].toLowerCase() : undefined;
}

function isEnabled(mode: ContentType, options: RewriteOptions): boolean {
  switch (mode) {
    case 'html':
      return options.rewriteHtml;
    case 'css':
      return options.rewriteCss;
    case 'js':
      return options.rewriteJs;
    case 'passthrough':
      return false;
  }
}

// =============================================================================
// Rewriting
// =============================================================================

/**
 * Rewrite a response body according to its content type.
 *
 * UTF-8 bodies (declared or undeclared) are rewritten as text. Any other
 * charset is handled as latin1, which maps each byte to one character, so
 * bytes outside the rewritten URLs come back exactly as they went in.
 */
export function rewriteContent(
  body: Buffer,
  contentType: string | undefined,
  ctx: RewriteContext,
  options: RewriteOptions
): RewriteResult {
  const mode = selectRewriteMode(contentType);
  if (!isEnabled(mode, options) || body.length === 0) {
    return { body, mode };
  }

  const charset = getCharset(contentType);
  const encoding: BufferEncoding =
    (charset === undefined || charset === 'utf-8' || charset === 'utf8') && isUtf8(body) ? 'utf8' : 'latin1';
  const text = body.toString(encoding);

  try {
    let rewritten: string;
    switch (mode) {
      case 'html':
        rewritten = rewriteHtml(text, ctx, {
          injectNotice: options.injectNotice,
          rewriteScripts: options.rewriteJs,
          rewriteStyles: options.rewriteCss,
        });
        break;
      case 'css':
        rewritten = rewriteCss(text, ctx);
        break;
      case 'js':
        rewritten = rewriteJs(text, ctx);
        break;
      case 'passthrough':
        return { body, mode };
    }
    return { body: rewritten === text ? body : Buffer.from(rewritten, encoding), mode };
  } catch (err) {
    const error = err instanceof RewriteError ? err : new RewriteError(mode, err);
    console.warn(`⚠️ Relaying ${ctx.baseUrl.href} unmodified: ${describeError(error)}`);
    return { body, mode, error };
  }
}

/**
 * Rewrite a body and return only the resulting bytes
 */
export function rewrite(
  body: Buffer,
  contentType: string | undefined,
  ctx: RewriteContext,
  options: RewriteOptions
): Buffer {
  return rewriteContent(body, contentType, ctx, options).body;
}
