/**
 * CSS Rewriter using PostCSS
 * Points url(...) references and @import targets back at the proxy
 */

import postcss, { type Root } from 'postcss';
import { RewriteError } from '../proxy/errors.js';
import type { RewriteContext } from '../proxy/types.js';
import { rewriteUrlToken } from './url.js';

/** url(...) with double, single or no quotes around the reference */
const CSS_URL_PATTERN = /url\(\s*(?:"([^"]*)"|'([^']*)'|([^"')\s]*))\s*\)/gi;

/** Leading string form of an @import prelude: @import "a.css" screen; */
const IMPORT_STRING_PATTERN = /^(\s*)(?:"([^"]*)"|'([^']*)')/;

/**
 * Rewrite every url(...) occurrence in a fragment of CSS text.
 * Used for declaration values and inline style attributes; the original
 * quote style is kept and untouched tokens stay byte-identical.
 */
export function rewriteCssUrls(text: string, ctx: RewriteContext): string {
  return text.replace(
    CSS_URL_PATTERN,
    (match: string, doubleQuoted?: string, singleQuoted?: string, unquoted?: string) => {
      const quote = doubleQuoted !== undefined ? '"' : singleQuoted !== undefined ? "'" : '';
      const raw = doubleQuoted ?? singleQuoted ?? unquoted ?? '';
      const rewritten = rewriteUrlToken(raw, ctx);
      return rewritten === raw ? match : `url(${quote}${rewritten}${quote})`;
    }
  );
}

/**
 * Rewrite the prelude of an @import rule (string or url() form).
 */
export function rewriteImportParams(params: string, ctx: RewriteContext): string {
  const match = IMPORT_STRING_PATTERN.exec(params);
  if (!match) {
    return rewriteCssUrls(params, ctx);
  }

  const [whole, leading, doubleQuoted, singleQuoted] = match;
  const quote = doubleQuoted !== undefined ? '"' : "'";
  const raw = doubleQuoted ?? singleQuoted ?? '';
  const rewritten = rewriteUrlToken(raw, ctx);
  if (rewritten === raw) {
    return params;
  }
  return `${leading}${quote}${rewritten}${quote}${params.slice(whole.length)}`;
}

/**
 * Rewrite a stylesheet.
 * PostCSS keeps the original formatting of every node it does not touch,
 * so only the rewritten URLs differ from the input.
 *
 * @throws RewriteError when the stylesheet cannot be parsed
 */
export function rewriteCss(css: string, ctx: RewriteContext): string {
  let root: Root;
  try {
    root = postcss.parse(css);
  } catch (err) {
    throw new RewriteError('css', err);
  }

  let changed = false;

  root.walkAtRules(/^import$/i, (rule) => {
    const params = rewriteImportParams(rule.params, ctx);
    if (params !== rule.params) {
      rule.params = params;
      changed = true;
    }
  });

  root.walkDecls((decl) => {
    if (!/url\(/i.test(decl.value)) {
      return;
    }
    const value = rewriteCssUrls(decl.value, ctx);
    if (value !== decl.value) {
      // Values holding comments are printed from raws.value.raw
      const raws = decl.raws.value;
      decl.value = value;
      if (raws) {
        decl.raws.value = { value, raw: rewriteCssUrls(raws.raw, ctx) };
      }
      changed = true;
    }
  });

  return changed ? root.toString() : css;
}
