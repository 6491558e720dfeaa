// numeval/tests/security/limits.spec.ts
//
// Parser limits against oversized or deeply nested input. Limit failures
// are deferred like any other parse error and surface as E_LIMIT.

import { describe, it, expect } from 'vitest';
import { Expression, ExpressionError, createParser, evaluate, parse } from '../../src';

function captureError(fn: () => unknown): ExpressionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExpressionError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected an ExpressionError');
}

describe('maxExpressionLength', () => {
  const parser = createParser({ maxExpressionLength: 10 });

  it('rejects longer sources without scanning them', () => {
    const expression = new Expression('1 + 2 + 3 + 4', { parser });
    const error = captureError(() => expression.evaluate());

    expect(expression.description).toBe('1 + 2 + 3 + 4');
    expect(error.code).toBe('E_LIMIT');
    expect(error.message).toBe('Expression length 13 exceeds the maximum of 10');
  });

  it('accepts a source of exactly the maximum length', () => {
    expect(new Expression('1 + 2 + 34', { parser }).evaluate()).toBe(37);
  });
});

describe('maxDepth', () => {
  const parser = createParser({ maxDepth: 3 });

  it('rejects nesting past the limit', () => {
    const error = captureError(() => new Expression('((((1))))', { parser }).evaluate());

    expect(error.code).toBe('E_LIMIT');
    expect(error.message).toBe('Expression nesting depth exceeds the maximum of 3');
  });

  it('accepts nesting within the limit', () => {
    expect(new Expression('((1))', { parser }).evaluate()).toBe(1);
  });

  it('measures the depth of the finished tree', () => {
    const error = captureError(() => new Expression('1 + 2 + 3 + 4 + 5', { parser }).evaluate());

    expect(error.detail).toEqual({ kind: 'limit', limit: 'maxDepth', max: 3, actual: 5 });
  });
});

describe('Default limits', () => {
  it('stops runaway parentheses', () => {
    const source = `${'('.repeat(2000)}1${')'.repeat(2000)}`;

    expect(parse(source, false).error?.code).toBe('E_LIMIT');
  });

  it('stops a long chain of prefix operators while scanning', () => {
    const parser = createParser({ cache: false });
    const error = captureError(() => parser.parseOrThrow(`${'- '.repeat(20000)}1`));

    expect(error.code).toBe('E_LIMIT');
    expect(error.detail).toEqual({ kind: 'limit', limit: 'maxDepth', max: 1024, actual: 1025 });
  });

  it('collapses a prefix chain within the limit', () => {
    expect(evaluate(`${'- '.repeat(1000)}1`)).toBe(1);
    expect(evaluate(`${'- '.repeat(999)}1`)).toBe(-1);
  });

  it('evaluates long flat sums and stops very long ones', () => {
    const terms = (count: number) => Array.from({ length: count }, () => '1').join(' + ');

    expect(new Expression(terms(500), { noOptimize: true }).evaluate()).toBe(500);
    expect(parse(terms(2000), false).error?.code).toBe('E_LIMIT');
  });
});
