/**
 * JavaScript Rewriter
 *
 * Best-effort rewriting of string-literal URLs that are obviously fetch or
 * navigation targets: fetch('/api'), new Worker('https://...'),
 * location.href = '/next', xhr.open('GET', '/data'), img.src = '...',
 * plus import specifiers that name a URL.
 * URLs built at runtime are not found; the script is only parsed, never run.
 *
 * Babel locates the literals; the source is then patched in place so every
 * other byte of the script is preserved.
 */

import { parseSync } from '@babel/core';
import type { types as t } from '@babel/core';
import { RewriteError } from '../proxy/errors.js';
import type { RewriteContext } from '../proxy/types.js';
import { rewriteUrlToken } from './url.js';

/** Absolute http(s), scheme-relative or root-relative */
const URL_LIKE_PATTERN = /^(?:https?:\/\/|\/\/|\/(?!\/))/i;

/** Module specifiers that name a URL (bare specifiers like 'react' do not) */
const MODULE_SPECIFIER_PATTERN = /^(?:https?:\/\/|\/|\.\.?\/)/i;

/** Functions and constructors whose first argument is a URL */
const URL_CALLEES = new Set([
  'fetch',
  'Request',
  'EventSource',
  'Worker',
  'SharedWorker',
  'importScripts',
  'sendBeacon',
]);

/** Methods that navigate when called on location */
const LOCATION_METHODS = new Set(['assign', 'replace']);

/** Properties whose assigned value is a URL */
const URL_PROPERTIES = new Set(['location', 'href', 'src', 'action']);

const HTTP_METHOD_PATTERN = /^(GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS)$/i;

/** AST keys that never hold child nodes */
const SKIPPED_KEYS = new Set([
  'loc',
  'start',
  'end',
  'extra',
  'leadingComments',
  'trailingComments',
  'innerComments',
  'comments',
  'tokens',
]);

interface Edit {
  start: number;
  end: number;
  text: string;
}

export interface JsRewriteOptions {
  /** 'module' for <script type="module"> and .mjs; detected from the source otherwise */
  sourceType?: 'script' | 'module';
}

function isNode(value: unknown): value is t.Node {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Visit every node depth-first together with its parent
 */
function walk(node: t.Node, parent: t.Node | null, visit: (node: t.Node, parent: t.Node | null) => void): void {
  visit(node, parent);

  for (const [key, value] of Object.entries(node)) {
    if (SKIPPED_KEYS.has(key)) continue;

    if (Array.isArray(value)) {
      for (const item of value) {
        if (isNode(item)) walk(item, node, visit);
      }
    } else if (isNode(value)) {
      walk(value, node, visit);
    }
  }
}

/**
 * Name of the called function: `fetch` for fetch(), `open` for xhr.open()
 */
function calleeName(callee: t.Node): string | undefined {
  if (callee.type === 'Identifier') {
    return callee.name;
  }
  if (callee.type === 'MemberExpression' || callee.type === 'OptionalMemberExpression') {
    if (callee.property.type === 'Identifier' && !callee.computed) {
      return callee.property.name;
    }
    if (callee.property.type === 'StringLiteral') {
      return callee.property.value;
    }
  }
  return undefined;
}

/**
 * Whether an expression refers to the location object:
 * `location`, `window.location`, `document.location`, `top.location`, ...
 */
function isLocation(node: t.Node): boolean {
  return calleeName(node) === 'location';
}

/**
 * Literal value of a plain string or of a template literal without
 * substitutions; undefined for anything else.
 */
function literalValue(node: t.Node): string | undefined {
  if (node.type === 'StringLiteral') {
    return node.value;
  }
  if (node.type === 'TemplateLiteral' && node.expressions.length === 0 && node.quasis.length === 1) {
    return node.quasis[0].value.cooked ?? undefined;
  }
  return undefined;
}

/**
 * Whether `node` sits in a position where its value is fetched or navigated to
 */
function isUrlPosition(node: t.Node, parent: t.Node | null): boolean {
  if (!parent) return false;

  if (parent.type === 'CallExpression' || parent.type === 'NewExpression' || parent.type === 'OptionalCallExpression') {
    const args = parent.arguments;
    const index = args.findIndex(arg => arg === node);
    if (index < 0) return false;

    const name = calleeName(parent.callee);
    if (name === undefined) return false;

    if (index === 0 && URL_CALLEES.has(name)) {
      return true;
    }
    if (index === 0 && LOCATION_METHODS.has(name) && parent.callee.type === 'MemberExpression') {
      return isLocation(parent.callee.object);
    }
    if (name === 'open') {
      // xhr.open('GET', url) vs window.open(url)
      const method = args.length >= 2 ? literalValue(args[0]) : undefined;
      if (method !== undefined && HTTP_METHOD_PATTERN.test(method)) {
        return index === 1;
      }
      return index === 0;
    }
    return false;
  }

  if (parent.type === 'AssignmentExpression' && parent.right === node && parent.operator === '=') {
    const left = parent.left;
    if (left.type === 'Identifier') {
      return left.name === 'location';
    }
    const name = calleeName(left);
    return name !== undefined && URL_PROPERTIES.has(name);
  }

  return false;
}

/**
 * Whether `node` is the specifier of a static or dynamic import
 */
function isModuleSource(node: t.Node, parent: t.Node | null): boolean {
  if (!parent) return false;

  switch (parent.type) {
    case 'ImportDeclaration':
    case 'ExportAllDeclaration':
    case 'ExportNamedDeclaration':
      return parent.source === node;
    case 'CallExpression':
      return parent.callee.type === 'Import' && parent.arguments[0] === node;
    default:
      return false;
  }
}

/**
 * Quote a rewritten value with the quote character the literal used
 */
function quoteLike(quote: string, value: string): string {
  const escaped = JSON.stringify(value).slice(1, -1);
  if (quote === "'") {
    return `'${escaped.replace(/\\"/g, '"').replace(/'/g, "\\'")}'`;
  }
  if (quote === '`') {
    return `\`${escaped.replace(/\\"/g, '"').replace(/`/g, '\\`').replace(/\$\{/g, '\\${')}\``;
  }
  return `"${escaped}"`;
}

/**
 * Rewrite URL string literals in fetch/navigation positions.
 *
 * @throws RewriteError when the script cannot be parsed
 */
export function rewriteJs(code: string, ctx: RewriteContext, options: JsRewriteOptions = {}): string {
  let ast: t.File | null;
  try {
    ast = parseSync(code, {
      babelrc: false,
      configFile: false,
      sourceType: options.sourceType ?? 'unambiguous',
      parserOpts: {
        allowReturnOutsideFunction: true,
        allowAwaitOutsideFunction: true,
      },
    });
  } catch (err) {
    throw new RewriteError('js', err);
  }
  if (!ast) {
    return code;
  }

  const edits: Edit[] = [];

  walk(ast.program, null, (node, parent) => {
    const value = literalValue(node);
    if (value === undefined) {
      return;
    }
    const matches = isModuleSource(node, parent)
      ? MODULE_SPECIFIER_PATTERN.test(value)
      : URL_LIKE_PATTERN.test(value) && isUrlPosition(node, parent);
    if (!matches) {
      return;
    }
    if (typeof node.start !== 'number' || typeof node.end !== 'number') {
      return;
    }

    const rewritten = rewriteUrlToken(value, ctx);
    if (rewritten !== value) {
      edits.push({ start: node.start, end: node.end, text: quoteLike(code[node.start], rewritten) });
    }
  });

  if (edits.length === 0) {
    return code;
  }

  edits.sort((a, b) => a.start - b.start);
  let result = '';
  let position = 0;
  for (const edit of edits) {
    result += code.slice(position, edit.start) + edit.text;
    position = edit.end;
  }
  return result + code.slice(position);
}
