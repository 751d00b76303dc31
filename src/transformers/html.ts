/**
 * HTML Rewriter
 *
 * Points every URL a document references back at the proxy:
 * - href, src, action, formaction and poster attributes
 * - srcset candidate lists
 * - url(...) in inline style attributes and <style> blocks
 * - meta refresh targets
 * - fetch/navigation URLs inside classic and module inline scripts
 *
 * Tags are found by pattern matching rather than by building a DOM, so the
 * markup around each rewritten value is emitted exactly as received.
 *
 * @module transformers/html
 */

import { decodeHTML } from 'entities';
import { RewriteError } from '../proxy/errors.js';
import type { RewriteContext } from '../proxy/types.js';
import { rewriteCss, rewriteCssUrls } from './css.js';
import { rewriteJs } from './js.js';
import { buildProxyPathUrl, isProxiedUrl, resolveReference, rewriteRefresh, rewriteUrlToken } from './url.js';

// =============================================================================
// Types
// =============================================================================

export interface HtmlRewriteOptions {
  /** Insert the relay notice right after <body> */
  injectNotice?: boolean;
  /** Run inline <script> bodies through the JS rewriter */
  rewriteScripts?: boolean;
  /** Run <style> blocks and style attributes through the CSS rewriter */
  rewriteStyles?: boolean;
}

/** One attribute as written in the source */
interface Attribute {
  name: string;
  /** Entity-decoded value; undefined for a bare attribute like `disabled` */
  value?: string;
}

// =============================================================================
// Patterns
// =============================================================================

/**
 * Comments, doctypes/CDATA, and start or end tags. Quoted attribute values
 * may contain `>`, so the attribute section is matched value by value.
 */
const MARKUP_PATTERN = /<!--[\s\S]*?(?:-->|$)|<![^>]*>|<(\/?)([a-zA-Z][^\s/>]*)((?:[^>"']|"[^"]*"|'[^']*')*)>/g;

/** name, optional `=`, then a double-quoted, single-quoted or unquoted value */
const ATTRIBUTE_PATTERN = /([^\s"'>/=]+)(?:(\s*=\s*)(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

/** Elements whose content is text, not markup */
const RAW_TEXT_ELEMENTS = new Set(['script', 'style', 'textarea', 'title']);

/** Attributes holding a single URL */
const URL_ATTRIBUTES = new Set(['href', 'src', 'action', 'formaction', 'poster']);

/** Script types whose content is JavaScript */
const JS_SCRIPT_TYPES = new Set([
  '',
  'module',
  'text/javascript',
  'application/javascript',
  'application/x-javascript',
  'text/ecmascript',
  'application/ecmascript',
]);

/** url(...) as written in an attribute, quotes possibly entity-encoded */
const STYLE_URL_PATTERN = /url\([^)]*\)/gi;

/** Separator, URL and descriptor runs of a srcset list */
const SRCSET_SEPARATOR = /[\s,]*/y;
const SRCSET_URL = /\S+/y;
const SRCSET_DESCRIPTOR = /[^,]*/y;

export const NOTICE_BANNER_HTML =
  '<div data-proxy-notice style="background-color:#ffc107;color:#333;padding:12px;text-align:center;' +
  'font-family:sans-serif;font-size:16px;border-bottom:2px solid #e0a800;z-index:999999;position:sticky;top:0;">' +
  '<b>Notice:</b> This page is relayed by a proxy server, which can view or modify traffic. ' +
  'Avoid submitting passwords, financial details, or any sensitive personal data.' +
  '</div>';

// =============================================================================
// Value Helpers
// =============================================================================

function escapeAttributeText(value: string, quote: string): string {
  let escaped = value.replace(/&/g, '&amp;');
  if (quote === '"') escaped = escaped.replace(/"/g, '&quot;');
  if (quote === "'") escaped = escaped.replace(/'/g, '&#39;');
  return escaped;
}

function needsQuotes(value: string): boolean {
  return /[\s"'=<>`]/.test(value);
}

/**
 * Escape a value for re-insertion into an attribute with the given quote.
 * Unquoted values that need it are upgraded to double quotes.
 */
function serializeAttributeValue(value: string, quote: string): string {
  const effectiveQuote = quote === '' && needsQuotes(value) ? '"' : quote;
  return `${effectiveQuote}${escapeAttributeText(value, effectiveQuote)}${effectiveQuote}`;
}

/**
 * Rewrite url(...) in a style attribute as written in the source.
 * Only each url(...) token is decoded and re-escaped; entities elsewhere
 * in the declaration are left encoded. Returns the quoted attribute value,
 * or undefined when nothing changed.
 */
function rewriteStyleAttribute(raw: string, quote: string, ctx: RewriteContext): string | undefined {
  const edits: Array<{ start: number; end: number; text: string }> = [];
  for (const match of raw.matchAll(STYLE_URL_PATTERN)) {
    const decoded = decodeHTML(match[0]);
    const rewritten = rewriteCssUrls(decoded, ctx);
    if (rewritten !== decoded) {
      edits.push({ start: match.index ?? 0, end: (match.index ?? 0) + match[0].length, text: rewritten });
    }
  }
  if (edits.length === 0) {
    return undefined;
  }

  const effectiveQuote = quote === '' && edits.some((edit) => needsQuotes(edit.text)) ? '"' : quote;
  let result = '';
  let position = 0;
  for (const edit of edits) {
    result += raw.slice(position, edit.start) + escapeAttributeText(edit.text, effectiveQuote);
    position = edit.end;
  }
  result += raw.slice(position);
  return `${effectiveQuote}${result}${effectiveQuote}`;
}

/**
 * Rewrite each URL of a srcset attribute, keeping descriptors and spacing.
 * A candidate URL is a run of non-whitespace, so commas inside data: URIs
 * do not split it.
 */
export function rewriteSrcset(value: string, ctx: RewriteContext): string {
  const take = (pattern: RegExp, from: number): string => {
    pattern.lastIndex = from;
    const match = pattern.exec(value);
    return match ? match[0] : '';
  };

  let result = '';
  let position = 0;
  while (position < value.length) {
    const separator = take(SRCSET_SEPARATOR, position);
    result += separator;
    position += separator.length;
    if (position >= value.length) break;

    const run = take(SRCSET_URL, position);
    const trailingCommas = /,+$/.exec(run)?.[0] ?? '';
    const url = run.slice(0, run.length - trailingCommas.length);
    result += rewriteUrlToken(url, ctx) + trailingCommas;
    position += run.length;
    if (trailingCommas) continue;

    const descriptor = take(SRCSET_DESCRIPTOR, position);
    result += descriptor;
    position += descriptor.length;
  }
  return result;
}

/**
 * Target for a form action. GET forms replace the action's query string on
 * submit, so they get the path form that carries the target in the path.
 */
function rewriteFormAction(raw: string, ctx: RewriteContext, method: string | undefined): string {
  // An empty action submits to the document itself
  const reference = raw.trim() === '' ? ctx.baseUrl.href : raw;
  if ((method ?? 'get').trim().toLowerCase() !== 'get') {
    return rewriteUrlToken(reference, ctx);
  }
  const resolved = resolveReference(reference, ctx.baseUrl);
  if (!resolved || isProxiedUrl(resolved, ctx.proxyBasePath)) {
    return raw;
  }
  return buildProxyPathUrl(resolved, ctx.proxyBasePath);
}

// =============================================================================
// Tag Rewriting
// =============================================================================

function parseAttributes(source: string): Attribute[] {
  const attributes: Attribute[] = [];
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    const [, name, equals, doubleQuoted, singleQuoted, unquoted] = match;
    const raw = doubleQuoted ?? singleQuoted ?? unquoted;
    attributes.push({
      name: name.toLowerCase(),
      value: equals !== undefined && raw !== undefined ? decodeHTML(raw) : undefined,
    });
  }
  return attributes;
}

function attributeValue(attributes: Attribute[], name: string): string | undefined {
  return attributes.find(attribute => attribute.name === name)?.value;
}

/**
 * New value for one attribute of a tag, or undefined to keep it as-is
 */
function rewriteAttribute(
  tagName: string,
  name: string,
  value: string,
  attributes: Attribute[],
  ctx: RewriteContext,
  options: HtmlRewriteOptions
): string | undefined {
  let rewritten: string;

  if (tagName === 'form' && name === 'action') {
    rewritten = rewriteFormAction(value, ctx, attributeValue(attributes, 'method'));
  } else if (URL_ATTRIBUTES.has(name)) {
    rewritten = rewriteUrlToken(value, ctx);
  } else if (name === 'srcset' || name === 'imagesrcset') {
    rewritten = rewriteSrcset(value, ctx);
  } else if (
    tagName === 'meta' &&
    name === 'content' &&
    attributeValue(attributes, 'http-equiv')?.trim().toLowerCase() === 'refresh'
  ) {
    rewritten = rewriteRefresh(value, ctx);
  } else {
    return undefined;
  }

  return rewritten === value ? undefined : rewritten;
}

/**
 * Rewrite the attribute section of a start tag
 */
function rewriteStartTag(
  tagName: string,
  attributeSource: string,
  ctx: RewriteContext,
  options: HtmlRewriteOptions
): string {
  const attributes = parseAttributes(attributeSource);

  let result = attributeSource.replace(
    ATTRIBUTE_PATTERN,
    (match: string, name: string, equals?: string, doubleQuoted?: string, singleQuoted?: string, unquoted?: string) => {
      const raw = doubleQuoted ?? singleQuoted ?? unquoted;
      if (equals === undefined || raw === undefined) {
        return match;
      }
      const quote = doubleQuoted !== undefined ? '"' : singleQuoted !== undefined ? "'" : '';
      if (name.toLowerCase() === 'style') {
        const style = options.rewriteStyles !== false ? rewriteStyleAttribute(raw, quote, ctx) : undefined;
        return style === undefined ? match : `${name}${equals}${style}`;
      }
      const rewritten = rewriteAttribute(tagName, name.toLowerCase(), decodeHTML(raw), attributes, ctx, options);
      if (rewritten === undefined) {
        return match;
      }
      return `${name}${equals}${serializeAttributeValue(rewritten, quote)}`;
    }
  );

  // A form without an action submits to the current URL, which is the proxy
  if (tagName === 'form' && attributeValue(attributes, 'action') === undefined) {
    const action = rewriteFormAction(ctx.baseUrl.href, ctx, attributeValue(attributes, 'method'));
    const selfClosing = /\s*\/\s*$/.exec(result);
    const insertAt = selfClosing ? selfClosing.index : result.length;
    result = `${result.slice(0, insertAt)} action=${serializeAttributeValue(action, '"')}${result.slice(insertAt)}`;
  }

  return result;
}

/**
 * Rewrite the text content of a <script> or <style> element.
 * A block that cannot be parsed is kept verbatim.
 */
function rewriteRawText(
  tagName: string,
  attributes: Attribute[],
  content: string,
  ctx: RewriteContext,
  options: HtmlRewriteOptions
): string {
  if (!content.trim()) {
    return content;
  }

  try {
    if (tagName === 'style' && options.rewriteStyles !== false) {
      return rewriteCss(content, ctx);
    }
    if (tagName === 'script' && options.rewriteScripts !== false) {
      if (attributeValue(attributes, 'src') !== undefined) {
        return content;
      }
      const type = (attributeValue(attributes, 'type') ?? '').trim().toLowerCase();
      if (!JS_SCRIPT_TYPES.has(type)) {
        return content;
      }
      return rewriteJs(content, ctx, { sourceType: type === 'module' ? 'module' : 'script' });
    }
  } catch (err) {
    if (err instanceof RewriteError) {
      console.warn(`⚠️ Keeping inline <${tagName}> unchanged: ${err.message}`);
      return content;
    }
    throw err;
  }

  return content;
}

// =============================================================================
// Document Rewriting
// =============================================================================

/**
 * Rewrite all URL references of an HTML document.
 */
export function rewriteHtml(html: string, ctx: RewriteContext, options: HtmlRewriteOptions = {}): string {
  const pattern = new RegExp(MARKUP_PATTERN.source, 'g');
  let result = '';
  let position = 0;
  let noticeInjected = !options.injectNotice;

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    const [markup, closing, rawTagName, attributeSource] = match;
    if (rawTagName === undefined || closing) {
      continue;
    }

    const tagName = rawTagName.toLowerCase();
    const tagEnd = match.index + markup.length;
    const rewrittenTag = `<${rawTagName}${rewriteStartTag(tagName, attributeSource, ctx, options)}>`;

    result += html.slice(position, match.index) + rewrittenTag;
    position = tagEnd;

    if (!noticeInjected && tagName === 'body') {
      result += NOTICE_BANNER_HTML;
      noticeInjected = true;
    }

    if (RAW_TEXT_ELEMENTS.has(tagName) && !/\/\s*$/.test(attributeSource)) {
      const closePattern = new RegExp(`</${tagName}\\s*>`, 'gi');
      closePattern.lastIndex = tagEnd;
      const close = closePattern.exec(html);
      const contentEnd = close ? close.index : html.length;
      const content = html.slice(tagEnd, contentEnd);

      result += rewriteRawText(tagName, parseAttributes(attributeSource), content, ctx, options);
      position = contentEnd;
      pattern.lastIndex = contentEnd;
    }
  }

  return result + html.slice(position);
}
