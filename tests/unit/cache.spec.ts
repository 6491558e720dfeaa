// numeval/tests/unit/cache.spec.ts
//
// Unit tests for the parse cache and parser instances.
//
// Focus areas:
//  - Repeated parses of the same text reuse the cached tree.
//  - clearCache (whole cache or one entry) forces a new parse.
//  - Parser instances own separate caches.

import { describe, it, expect, vi } from 'vitest';
import {
  Cursor,
  Expression,
  ExpressionCache,
  DEFAULT_MAX_DEPTH,
  clearCache,
  createParser,
  isCached,
  normalizeParserOptions,
  parse,
  literalNode,
} from '../../src';

describe('ExpressionParser – caching', () => {
  it('parses a repeated source only once', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    const first = parser.parse('1 + 2');
    const second = parser.parse('1 + 2');

    expect(onParse).toHaveBeenCalledTimes(1);
    expect(onParse).toHaveBeenCalledWith('1 + 2');
    expect(second.root).toBe(first.root);
    expect(parser.isCached('1 + 2')).toBe(true);
  });

  it('parses again after clearCache()', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    parser.parse('a * b');
    parser.clearCache();
    parser.parse('a * b');

    expect(onParse).toHaveBeenCalledTimes(2);
  });

  it('clears a single entry', () => {
    const parser = createParser();
    parser.parse('a');
    parser.parse('b');

    parser.clearCache('a');

    expect(parser.isCached('a')).toBe(false);
    expect(parser.isCached('b')).toBe(true);
  });

  it('bypasses the cache when asked', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    parser.parse('x', false);
    parser.parse('x', false);

    expect(onParse).toHaveBeenCalledTimes(2);
    expect(parser.isCached('x')).toBe(false);
  });

  it('does not cache when caching is off', () => {
    const parser = createParser({ cache: false });

    parser.parse('x');

    expect(parser.isCached('x')).toBe(false);
    expect(parser.cache.size).toBe(0);
  });

  it('caches failed parses too', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    expect(parser.parse('(1').error?.code).toBe('E_MISSING_DELIMITER');
    expect(parser.parse('(1').error?.code).toBe('E_MISSING_DELIMITER');
    expect(onParse).toHaveBeenCalledTimes(1);
  });

  it('keeps caches of separate parsers apart', () => {
    const a = createParser();
    const b = createParser();

    a.parse('1 + 1');

    expect(a.isCached('1 + 1')).toBe(true);
    expect(b.isCached('1 + 1')).toBe(false);
  });

  it('reports sub-expression parses without caching them', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    parser.parseSubExpression(Cursor.from('1 + 2} tail'), ['}']);

    expect(onParse).toHaveBeenCalledWith('1 + 2} tail');
    expect(parser.cache.size).toBe(0);
  });

  it('is used by Expression through the parser option', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    const first = new Expression('x + 1', { parser, constants: { x: 1 } });
    const second = new Expression('x + 1', { parser, constants: { x: 2 } });

    expect(onParse).toHaveBeenCalledTimes(1);
    expect(first.evaluate()).toBe(2);
    expect(second.evaluate()).toBe(3);
  });
});

describe('Shared parser helpers', () => {
  it('caches through parse() and clears through clearCache()', () => {
    parse('a + b');
    expect(isCached('a + b')).toBe(true);

    clearCache('a + b');
    expect(isCached('a + b')).toBe(false);
  });

  it('skips the cache with useCache = false', () => {
    parse('c + d', false);

    expect(isCached('c + d')).toBe(false);
  });
});

describe('normalizeParserOptions', () => {
  it('fills in defaults', () => {
    expect(normalizeParserOptions()).toEqual({
      maxExpressionLength: undefined,
      maxDepth: DEFAULT_MAX_DEPTH,
      cache: true,
      onParse: undefined,
    });
  });

  it('ignores negative limits', () => {
    const options = normalizeParserOptions({ maxExpressionLength: -1, maxDepth: -5 });

    expect(options.maxExpressionLength).toBeUndefined();
    expect(options.maxDepth).toBe(1024);
  });
});

describe('ExpressionCache', () => {
  it('stores, reports and removes trees', () => {
    const cache = new ExpressionCache();
    const root = literalNode(1);

    cache.set('1', root);

    expect(cache.get('1')).toBe(root);
    expect(cache.has('1')).toBe(true);
    expect(cache.size).toBe(1);
    expect(cache.delete('1')).toBe(true);
    expect(cache.delete('1')).toBe(false);
    expect(cache.get('1')).toBeUndefined();
  });

  it('clears every entry', () => {
    const cache = new ExpressionCache();
    cache.set('a', literalNode(1));
    cache.set('b', literalNode(2));

    cache.clear();

    expect(cache.size).toBe(0);
  });
});
