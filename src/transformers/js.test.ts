import { describe, it, expect } from 'vitest';
import { rewriteJs } from './js.js';
import { resolveTarget } from '../proxy/target.js';
import { RewriteError } from '../proxy/errors.js';
import type { RewriteContext } from '../proxy/types.js';

const ctx: RewriteContext = {
  baseUrl: resolveTarget('https://example.com/app/main.js'),
  proxyBasePath: '/proxy',
};

const API_ITEMS = '/proxy?url=https%3A%2F%2Fexample.com%2Fapi%2Fitems';

describe('rewriteJs', () => {
  describe('call arguments', () => {
    it('should rewrite a root-relative fetch target', () => {
      expect(rewriteJs("fetch('/api/items');", ctx)).toBe(`fetch('${API_ITEMS}');`);
    });

    it('should rewrite an absolute fetch target and keep double quotes', () => {
      expect(rewriteJs('fetch("https://api.example.org/v1");', ctx)).toBe(
        'fetch("/proxy?url=https%3A%2F%2Fapi.example.org%2Fv1");'
      );
    });

    it('should rewrite window.fetch and template literals without substitutions', () => {
      expect(rewriteJs('window.fetch(`/api/items`).then(r => r.json());', ctx)).toBe(
        `window.fetch(\`${API_ITEMS}\`).then(r => r.json());`
      );
    });

    it('should rewrite worker and event source constructors', () => {
      expect(rewriteJs("new Worker('/worker.js'); new EventSource('/events');", ctx)).toBe(
        "new Worker('/proxy?url=https%3A%2F%2Fexample.com%2Fworker.js'); " +
        "new EventSource('/proxy?url=https%3A%2F%2Fexample.com%2Fevents');"
      );
    });

    it('should rewrite the URL argument of XMLHttpRequest.open', () => {
      expect(rewriteJs("xhr.open('GET', '/api/items', true);", ctx)).toBe(
        `xhr.open('GET', '${API_ITEMS}', true);`
      );
    });

    it('should rewrite window.open targets', () => {
      expect(rewriteJs("window.open('/popup', '_blank');", ctx)).toBe(
        "window.open('/proxy?url=https%3A%2F%2Fexample.com%2Fpopup', '_blank');"
      );
    });

    it('should rewrite location.replace but not String.prototype.replace', () => {
      expect(rewriteJs("location.replace('/x'); name.replace('/', '-');", ctx)).toBe(
        "location.replace('/proxy?url=https%3A%2F%2Fexample.com%2Fx'); name.replace('/', '-');"
      );
    });
  });

  describe('assignments', () => {
    it('should rewrite location.href assignments', () => {
      expect(rewriteJs("location.href = '/login';", ctx)).toBe(
        "location.href = '/proxy?url=https%3A%2F%2Fexample.com%2Flogin';"
      );
    });

    it('should rewrite window.location assignments', () => {
      expect(rewriteJs('window.location = "https://example.com/home";', ctx)).toBe(
        'window.location = "/proxy?url=https%3A%2F%2Fexample.com%2Fhome";'
      );
    });

    it('should rewrite src assignments', () => {
      expect(rewriteJs("img.src = 'https://cdn.example.com/a.png';", ctx)).toBe(
        "img.src = '/proxy?url=https%3A%2F%2Fcdn.example.com%2Fa.png';"
      );
    });

    it('should not touch compound assignments', () => {
      const code = "el.href += '/suffix';";
      expect(rewriteJs(code, ctx)).toBe(code);
    });
  });

  describe('module specifiers', () => {
    it('should rewrite relative and absolute import specifiers', () => {
      expect(rewriteJs("import a from './a.js';\nimport b from 'lib';\nexport * from '/c.js';", ctx)).toBe(
        "import a from '/proxy?url=https%3A%2F%2Fexample.com%2Fapp%2Fa.js';\n" +
        "import b from 'lib';\n" +
        "export * from '/proxy?url=https%3A%2F%2Fexample.com%2Fc.js';"
      );
    });

    it('should rewrite dynamic imports', () => {
      expect(rewriteJs("import('../chunk.js');", ctx)).toBe(
        "import('/proxy?url=https%3A%2F%2Fexample.com%2Fchunk.js');"
      );
    });
  });

  describe('left alone', () => {
    it('should not rewrite strings outside fetch or navigation positions', () => {
      const code = "const path = '/not/a/target'; console.log('https://example.com/');";
      expect(rewriteJs(code, ctx)).toBe(code);
    });

    it('should not rewrite relative fetch targets', () => {
      const code = "fetch('data.json');";
      expect(rewriteJs(code, ctx)).toBe(code);
    });

    it('should not rewrite URLs built at runtime', () => {
      const code = 'fetch(`/api/${id}`); fetch(base + "/x");';
      expect(rewriteJs(code, ctx)).toBe(code);
    });

    it('should not double-wrap proxied URLs', () => {
      const code = `fetch('${API_ITEMS}');`;
      expect(rewriteJs(code, ctx)).toBe(code);
    });
  });

  it('should preserve every other byte of the script', () => {
    const code = "// héllo wörld\nfetch('/api/items'); /* ü */\nvar x = 1;";
    expect(rewriteJs(code, ctx)).toBe(`// héllo wörld\nfetch('${API_ITEMS}'); /* ü */\nvar x = 1;`);
  });

  it('should throw RewriteError on a syntax error', () => {
    expect(() => rewriteJs('function (', ctx)).toThrow(RewriteError);
  });
});
