// numeval/tests/integration/tooling.spec.ts
//
// Tests for the inspection and validation utilities.

import { describe, it, expect, vi } from 'vitest';
import {
  Expression,
  analyzeAst,
  formatExpressionError,
  inspectExpression,
  isValidIdentifier,
  isValidOperator,
  parse,
  sym,
  undefinedSymbolError,
  validateSourceExpression,
  validateSymbolTable,
} from '../../src';

// -----------------------------------------------------------------------------
// Inspection
// -----------------------------------------------------------------------------

describe('formatExpressionError', () => {
  it('formats an ExpressionError', () => {
    expect(formatExpressionError(undefinedSymbolError(sym.variable('x')), 'x')).toEqual({
      code: 'E_UNDEFINED_SYMBOL',
      kind: 'undefinedSymbol',
      message: 'Undefined variable x',
      summary: '[E_UNDEFINED_SYMBOL] Undefined variable x',
      source: 'x',
    });
  });

  it('formats any other thrown value as internal', () => {
    expect(formatExpressionError(new Error('boom'))).toEqual({
      code: 'E_INTERNAL',
      message: 'boom',
      summary: 'Error: boom',
    });
  });
});

describe('analyzeAst', () => {
  it('counts nodes and collects symbol names per kind', () => {
    expect(analyzeAst(parse('max(a, 2) + b').root)).toEqual({
      nodeCount: 5,
      literalCount: 1,
      errorCount: 0,
      maxDepth: 3,
      symbols: { infix: ['+'], function: ['max'], variable: ['a', 'b'] },
    });
  });
});

describe('inspectExpression', () => {
  it('reports on a source string as written', () => {
    expect(inspectExpression('a + 2')).toBe(
      [
        'Expression: a + 2',
        'Nodes: 3 (1 literal, 0 errors)',
        'Depth: 2',
        'Symbols: infix +; variable a',
        'Error: none',
      ].join('\n'),
    );
  });

  it('reports on a bound expression after folding', () => {
    const expression = new Expression('x * 2', { constants: { x: 3 } });

    expect(inspectExpression(expression)).toBe(
      [
        'Expression: 6',
        'Nodes: 1 (1 literal, 0 errors)',
        'Depth: 1',
        'Symbols: none',
        'Error: none',
      ].join('\n'),
    );
  });

  it('includes the first error', () => {
    expect(inspectExpression('(1')).toBe(
      [
        'Expression: (1',
        'Nodes: 1 (0 literals, 1 error)',
        'Depth: 1',
        'Symbols: none',
        'Error: [E_MISSING_DELIMITER] Missing `)`',
      ].join('\n'),
    );
  });
});

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

describe('Name checks', () => {
  it.each([
    ['x', true],
    ['user.age', true],
    ['`my var`', true],
    ["x'", true],
    ['1x', false],
    ['a b', false],
  ])('isValidIdentifier(%s) is %s', (name, expected) => {
    expect(isValidIdentifier(name)).toBe(expected);
  });

  it.each([
    ['+', true],
    ['<=', true],
    ['()', true],
    ['abc', false],
    ['+a', false],
    ['(', false],
    ['[', false],
  ])('isValidOperator(%s) is %s', (name, expected) => {
    expect(isValidOperator(name)).toBe(expected);
  });
});

describe('validateSymbolTable', () => {
  it('flags unusable names and shadowed built-ins', () => {
    const noop = () => 0;
    const result = validateSymbolTable([
      [sym.variable('1x'), noop],
      [sym.function('sqrt', 1), noop],
      [sym.infix('and'), noop],
      [sym.prefix('abc'), noop],
      [sym.infix('('), noop],
    ]);

    expect(result.ok).toBe(false);
    expect(result.issues.map(({ code, severity, message }) => ({ code, severity, message }))).toEqual([
      { code: 'VAL_INVALID_NAME', severity: 'error', message: 'Invalid name for variable 1x' },
      {
        code: 'VAL_SHADOWS_BUILTIN',
        severity: 'info',
        message: 'Function sqrt() replaces a built-in symbol',
      },
      {
        code: 'VAL_INVALID_NAME',
        severity: 'error',
        message: 'Invalid name for prefix operator abc',
      },
      {
        code: 'VAL_INVALID_NAME',
        severity: 'error',
        message: 'Invalid name for infix operator (',
      },
    ]);
  });

  it('accepts a clean table', () => {
    expect(validateSymbolTable([[sym.variable('rate'), () => 1]])).toEqual({
      ok: true,
      issues: [],
    });
  });
});

describe('validateSourceExpression', () => {
  it('reports parse and resolution errors in tree order', () => {
    const result = validateSourceExpression('max(1, 2 3) + foo(1) + sqrt(1, 2)');

    expect(result.ok).toBe(false);
    expect(result.stats).toEqual({ nodeCount: 10, depth: 4 });
    expect(result.issues).toHaveLength(3);
    expect(result.issues[0]).toMatchObject({
      code: 'E_UNEXPECTED_TOKEN',
      rule: 'parse',
      message: 'Unexpected token `3`',
      meta: { source: '2 3' },
    });
    expect(result.issues[1]).toMatchObject({
      code: 'E_UNDEFINED_SYMBOL',
      rule: 'resolve',
      message: 'Undefined function foo()',
    });
    expect(result.issues[2]).toMatchObject({
      code: 'E_ARITY_MISMATCH',
      rule: 'resolve',
      message: 'Function sqrt() expects 1 argument',
    });
  });

  it('forbids named symbols', () => {
    const result = validateSourceExpression('pow(2, 3)', { forbiddenSymbols: ['pow'] });

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      code: 'VAL_SYMBOL_FORBIDDEN',
      message: 'Function pow() is not allowed',
    });
  });

  it('limits the node count', () => {
    const result = validateSourceExpression('1 + 2', { maxNodeCount: 2 });

    expect(result.issues).toEqual([
      {
        code: 'VAL_MAX_NODE_COUNT',
        rule: 'maxNodeCount',
        severity: 'error',
        message: 'Expression has 3 nodes; the limit is 2',
        meta: { nodeCount: 3, maxNodeCount: 2 },
      },
    ]);
  });

  it('resolves against the given options', () => {
    const result = validateSourceExpression('x + y', { constants: { x: 1 } });

    expect(result.issues.map((issue) => issue.message)).toEqual(['Undefined variable y']);
  });

  it('accepts a valid expression', () => {
    const result = validateSourceExpression('1 + 2');

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.parsed.description).toBe('1 + 2');
  });

  it('never calls an evaluator', () => {
    const spy = vi.fn(() => 1);

    validateSourceExpression('t * 2', { symbols: [[sym.variable('t'), spy]] });

    expect(spy).not.toHaveBeenCalled();
  });
});
