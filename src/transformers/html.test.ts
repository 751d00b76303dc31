import { describe, it, expect, vi, afterEach } from 'vitest';
import { rewriteHtml, rewriteSrcset, NOTICE_BANNER_HTML } from './html.js';
import { resolveTarget } from '../proxy/target.js';
import type { RewriteContext } from '../proxy/types.js';

const ctx: RewriteContext = {
  baseUrl: resolveTarget('https://example.com/dir/page.html'),
  proxyBasePath: '/proxy',
};

const ABOUT = '/proxy?url=https%3A%2F%2Fexample.com%2Fabout';

describe('rewriteSrcset', () => {
  it('should rewrite each candidate and keep descriptors', () => {
    expect(rewriteSrcset('a.png 1x, /b.png 2x', ctx)).toBe(
      '/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fa.png 1x, /proxy?url=https%3A%2F%2Fexample.com%2Fb.png 2x'
    );
  });

  it('should handle candidates without descriptors', () => {
    expect(rewriteSrcset('a.png, b.png', ctx)).toBe(
      '/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fa.png, /proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fb.png'
    );
  });

  it('should not split data URIs on their commas', () => {
    expect(rewriteSrcset('data:image/png;base64,AAAA 1x, b.png 2x', ctx)).toBe(
      'data:image/png;base64,AAAA 1x, /proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fb.png 2x'
    );
  });
});

describe('rewriteHtml', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('URL attributes', () => {
    it('should rewrite a root-relative href', () => {
      expect(rewriteHtml('<a href="/about">About</a>', ctx)).toBe(`<a href="${ABOUT}">About</a>`);
    });

    it('should keep single quotes', () => {
      expect(rewriteHtml("<a href='/about'>About</a>", ctx)).toBe(`<a href='${ABOUT}'>About</a>`);
    });

    it('should quote unquoted values that need it', () => {
      expect(rewriteHtml('<img src=logo.png alt=x>', ctx)).toBe(
        '<img src="/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Flogo.png" alt=x>'
      );
    });

    it('should keep the original attribute name casing', () => {
      expect(rewriteHtml('<A HREF="/about">x</A>', ctx)).toBe(`<A HREF="${ABOUT}">x</A>`);
    });

    it('should decode entities before resolving', () => {
      expect(rewriteHtml('<a href="/search?q=a&amp;b=c">s</a>', ctx)).toBe(
        '<a href="/proxy?url=https%3A%2F%2Fexample.com%2Fsearch%3Fq%3Da%26b%3Dc">s</a>'
      );
    });

    it('should keep the fragment outside the encoded target', () => {
      expect(rewriteHtml('<a href="/about#team">x</a>', ctx)).toBe(`<a href="${ABOUT}#team">x</a>`);
    });

    it('should rewrite src, poster and formaction', () => {
      expect(rewriteHtml('<video src="v.mp4" poster="/p.jpg"></video><button formaction="/go">', ctx)).toBe(
        '<video src="/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fv.mp4" ' +
        'poster="/proxy?url=https%3A%2F%2Fexample.com%2Fp.jpg"></video>' +
        '<button formaction="/proxy?url=https%3A%2F%2Fexample.com%2Fgo">'
      );
    });

    it('should rewrite srcset attributes', () => {
      expect(rewriteHtml('<img srcset="a.png 1x">', ctx)).toBe(
        '<img srcset="/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fa.png 1x">'
      );
    });

    it('should tolerate > inside quoted values', () => {
      expect(rewriteHtml('<a title="a>b" href="/about">x</a>', ctx)).toBe(
        `<a title="a>b" href="${ABOUT}">x</a>`
      );
    });

    it('should leave fragments and non-http schemes alone', () => {
      const html =
        '<a href="#top">t</a><a href="javascript:void(0)">j</a>' +
        '<a href="mailto:a@example.com">m</a><img src="data:image/gif;base64,R0lGOD">';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });
  });

  describe('inline styles', () => {
    it('should rewrite url() in style attributes', () => {
      expect(rewriteHtml(`<div style="background: url('/bg.png')"></div>`, ctx)).toBe(
        `<div style="background: url('/proxy?url=https%3A%2F%2Fexample.com%2Fbg.png')"></div>`
      );
    });

    it('should re-escape quotes that were entity-encoded', () => {
      expect(rewriteHtml('<div style="background:url(&quot;/bg.png&quot;)"></div>', ctx)).toBe(
        '<div style="background:url(&quot;/proxy?url=https%3A%2F%2Fexample.com%2Fbg.png&quot;)"></div>'
      );
    });

    it('should leave entities outside url() encoded in style attributes', () => {
      expect(rewriteHtml(`<p style="content:'&lt;&nbsp;';background:url(a.png)">`, ctx)).toBe(
        `<p style="content:'&lt;&nbsp;';background:url(/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fa.png)">`
      );
    });

    it('should quote an unquoted style attribute once the new url needs it', () => {
      expect(rewriteHtml('<p style=background:url(a.png)>', ctx)).toBe(
        '<p style="background:url(/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fa.png)">'
      );
    });

    it('should rewrite <style> blocks', () => {
      expect(rewriteHtml('<style>body { background: url(bg.png) }</style>', ctx)).toBe(
        '<style>body { background: url(/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fbg.png) }</style>'
      );
    });

    it('should leave styles alone when style rewriting is off', () => {
      const html = '<style>a { background: url(x.png) }</style><p style="background:url(y.png)">';
      expect(rewriteHtml(html, ctx, { rewriteStyles: false })).toBe(html);
    });
  });

  describe('meta refresh', () => {
    it('should rewrite the refresh target and keep the delay', () => {
      expect(rewriteHtml('<meta http-equiv="refresh" content="5; url=/next">', ctx)).toBe(
        '<meta http-equiv="refresh" content="5; url=/proxy?url=https%3A%2F%2Fexample.com%2Fnext">'
      );
    });

    it('should not touch other meta content', () => {
      const html = '<meta name="description" content="url=/next">';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });
  });

  describe('forms', () => {
    it('should give GET forms a path-form action', () => {
      expect(rewriteHtml('<form action="/search" method="get">', ctx)).toBe(
        '<form action="/proxy/https://example.com/search" method="get">'
      );
    });

    it('should give POST forms a query-form action', () => {
      expect(rewriteHtml('<form method="POST" action="/login">', ctx)).toBe(
        '<form method="POST" action="/proxy?url=https%3A%2F%2Fexample.com%2Flogin">'
      );
    });

    it('should add an action to forms that have none', () => {
      expect(rewriteHtml('<form method="post">', ctx)).toBe(
        '<form method="post" action="/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fpage.html">'
      );
    });

    it('should point an empty action at the document', () => {
      expect(rewriteHtml('<form action="">', ctx)).toBe(
        '<form action="/proxy/https://example.com/dir/page.html">'
      );
    });
  });

  describe('inline scripts', () => {
    it('should rewrite fetch targets in classic scripts', () => {
      expect(rewriteHtml("<script>fetch('/api/data')</script>", ctx)).toBe(
        "<script>fetch('/proxy?url=https%3A%2F%2Fexample.com%2Fapi%2Fdata')</script>"
      );
    });

    it('should rewrite import specifiers in module scripts', () => {
      expect(rewriteHtml("<script type=\"module\">import './app.js';</script>", ctx)).toBe(
        "<script type=\"module\">import '/proxy?url=https%3A%2F%2Fexample.com%2Fdir%2Fapp.js';</script>"
      );
    });

    it('should rewrite the src of external scripts', () => {
      expect(rewriteHtml('<script src="/app.js"></script>', ctx)).toBe(
        '<script src="/proxy?url=https%3A%2F%2Fexample.com%2Fapp.js"></script>'
      );
    });

    it('should not treat markup inside non-JS scripts as tags', () => {
      const html = '<script type="text/template"><a href="/x">x</a></script>';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });

    it('should keep a script that fails to parse and continue with the document', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(rewriteHtml("<script>fetch('/a'</script><a href=\"/about\">x</a>", ctx)).toBe(
        `<script>fetch('/a'</script><a href="${ABOUT}">x</a>`
      );
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should leave scripts alone when script rewriting is off', () => {
      const html = "<script>fetch('/api/data')</script>";
      expect(rewriteHtml(html, ctx, { rewriteScripts: false })).toBe(html);
    });
  });

  describe('raw text and comments', () => {
    it('should not rewrite markup inside textarea', () => {
      const html = '<textarea><a href="/x">x</a></textarea>';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });

    it('should not rewrite markup inside comments', () => {
      const html = '<!-- <a href="/x">x</a> --><!DOCTYPE html>';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });
  });

  describe('notice banner', () => {
    it('should insert the notice after the first <body>', () => {
      expect(rewriteHtml('<html><body class="x"><p>hi</p></body></html>', ctx, { injectNotice: true })).toBe(
        `<html><body class="x">${NOTICE_BANNER_HTML}<p>hi</p></body></html>`
      );
    });

    it('should not insert the notice by default', () => {
      const html = '<html><body><p>hi</p></body></html>';
      expect(rewriteHtml(html, ctx)).toBe(html);
    });
  });

  it('should preserve every other byte of the document', () => {
    const html = '<!DOCTYPE html>\n<HTML>\n  <p  class = "a"  >héllo</p>\n</HTML>\n';
    expect(rewriteHtml(html, ctx)).toBe(html);
  });

  it('should be idempotent', () => {
    const html =
      '<a href="/about">x</a><form action="/s"></form><img srcset="a.png 2x">' +
      "<script>fetch('/api')</script><style>a{background:url(b.png)}</style>";
    const once = rewriteHtml(html, ctx);
    expect(rewriteHtml(once, ctx)).toBe(once);
  });
});
