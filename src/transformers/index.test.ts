/**
 * Content rewriter dispatch tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { getCharset, mimeEssence, rewrite, rewriteContent, selectRewriteMode } from './index.js';
import type { RewriteOptions } from './index.js';
import { resolveTarget } from '../proxy/target.js';
import { RewriteError } from '../proxy/errors.js';
import type { RewriteContext } from '../proxy/types.js';

const ctx: RewriteContext = {
  baseUrl: resolveTarget('https://example.com/a/b.html'),
  proxyBasePath: '/proxy',
};

const options: RewriteOptions = {
  rewriteHtml: true,
  rewriteCss: true,
  rewriteJs: true,
  injectNotice: false,
};

const C_CSS = '/proxy?url=https%3A%2F%2Fexample.com%2Fa%2Fc.css';

describe('selectRewriteMode', () => {
  it('should select html for HTML and XHTML', () => {
    expect(selectRewriteMode('text/html; charset=utf-8')).toBe('html');
    expect(selectRewriteMode('application/xhtml+xml')).toBe('html');
    expect(selectRewriteMode('Text/HTML')).toBe('html');
  });

  it('should select css for stylesheets', () => {
    expect(selectRewriteMode('text/css')).toBe('css');
  });

  it('should select js for every JavaScript type', () => {
    for (const type of [
      'application/javascript',
      'text/javascript; charset=utf-8',
      'application/x-javascript',
      'application/ecmascript',
      'text/ecmascript',
    ]) {
      expect(selectRewriteMode(type)).toBe('js');
    }
  });

  it('should pass everything else through', () => {
    expect(selectRewriteMode('image/png')).toBe('passthrough');
    expect(selectRewriteMode('application/json')).toBe('passthrough');
    expect(selectRewriteMode('text/plain')).toBe('passthrough');
    expect(selectRewriteMode('')).toBe('passthrough');
    expect(selectRewriteMode(undefined)).toBe('passthrough');
  });
});

describe('mimeEssence and getCharset', () => {
  it('should strip parameters and lowercase', () => {
    expect(mimeEssence(' Text/CSS ; charset=UTF-8')).toBe('text/css');
  });

  it('should read the charset parameter', () => {
    expect(getCharset('text/html; charset=UTF-8')).toBe('utf-8');
    expect(getCharset('text/html;charset="ISO-8859-1"')).toBe('iso-8859-1');
    expect(getCharset('text/html')).toBeUndefined();
  });
});

describe('rewriteContent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should rewrite HTML bodies', () => {
    const result = rewriteContent(Buffer.from('<link href="c.css">'), 'text/html', ctx, options);
    expect(result.mode).toBe('html');
    expect(result.error).toBeUndefined();
    expect(result.body.toString()).toBe(`<link href="${C_CSS}">`);
  });

  it('should rewrite CSS bodies', () => {
    const result = rewriteContent(Buffer.from('a{background:url(c.css)}'), 'text/css', ctx, options);
    expect(result.body.toString()).toBe(`a{background:url(${C_CSS})}`);
  });

  it('should rewrite JS bodies', () => {
    const result = rewriteContent(Buffer.from("fetch('c.css')"), 'text/javascript', ctx, options);
    // relative fetch targets are not URL-like
    expect(result.body.toString()).toBe("fetch('c.css')");
    const absolute = rewriteContent(Buffer.from("fetch('/a/c.css')"), 'text/javascript', ctx, options);
    expect(absolute.body.toString()).toBe(`fetch('${C_CSS}')`);
  });

  it('should relay binary bodies byte-identical', () => {
    const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0xff, 0xfe]);
    const result = rewriteContent(png, 'image/png', ctx, options);
    expect(result.mode).toBe('passthrough');
    expect(result.body).toBe(png);
  });

  it('should pass through content with no declared type', () => {
    const body = Buffer.from('<a href="/x">x</a>');
    expect(rewriteContent(body, undefined, ctx, options).body).toBe(body);
  });

  it('should return the same buffer when nothing changes', () => {
    const body = Buffer.from('<p>nothing to see</p>');
    expect(rewriteContent(body, 'text/html', ctx, options).body).toBe(body);
  });

  it('should honour disabled modes', () => {
    const body = Buffer.from('a{background:url(c.css)}');
    const result = rewriteContent(body, 'text/css', ctx, { ...options, rewriteCss: false });
    expect(result.mode).toBe('css');
    expect(result.body).toBe(body);
  });

  it('should inject the notice when enabled', () => {
    const result = rewriteContent(Buffer.from('<body></body>'), 'text/html', ctx, { ...options, injectNotice: true });
    expect(result.body.toString().startsWith('<body><div data-proxy-notice')).toBe(true);
  });

  it('should keep non-UTF-8 bytes outside rewritten URLs', () => {
    // "café" in latin1, followed by a link
    const body = Buffer.concat([Buffer.from([0x63, 0x61, 0x66, 0xe9]), Buffer.from(' <a href="c.css">')]);
    const result = rewriteContent(body, 'text/html; charset=iso-8859-1', ctx, options);
    expect(result.body).toEqual(
      Buffer.concat([Buffer.from([0x63, 0x61, 0x66, 0xe9]), Buffer.from(` <a href="${C_CSS}">`)])
    );
  });

  it('should keep numeric entities in style attributes of non-UTF-8 pages', () => {
    const html = `<p style="content:'&#x4e2d;';background:url(c.css)">`;
    const result = rewriteContent(Buffer.from(html, 'latin1'), 'text/html; charset=iso-8859-1', ctx, options);
    expect(result.body.toString('latin1')).toBe(`<p style="content:'&#x4e2d;';background:url(${C_CSS})">`);
  });

  it('should keep multi-byte UTF-8 text intact', () => {
    const result = rewriteContent(Buffer.from('<p>héllo ✓</p><a href="c.css">'), 'text/html; charset=utf-8', ctx, options);
    expect(result.body.toString('utf8')).toBe(`<p>héllo ✓</p><a href="${C_CSS}">`);
  });

  it('should fall back to the original body on a rewrite error', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const body = Buffer.from('.a { background: url(x.png);');
    const result = rewriteContent(body, 'text/css', ctx, options);
    expect(result.body).toBe(body);
    expect(result.mode).toBe('css');
    expect(result.error).toBeInstanceOf(RewriteError);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('rewrite', () => {
  it('should return only the rewritten bytes', () => {
    expect(rewrite(Buffer.from('<img src="c.css">'), 'text/html', ctx, options).toString()).toBe(
      `<img src="${C_CSS}">`
    );
  });
});
