// numeval/tests/unit/errors.spec.ts
//
// Unit tests for ExpressionError: codes, detail payloads, rendered messages
// and structural equality.

import { describe, it, expect } from 'vitest';
import {
  ExpressionError,
  arityMismatchError,
  arrayBoundsError,
  atLeast,
  emptyExpressionError,
  errorsEqual,
  isExpressionError,
  limitError,
  messageError,
  missingDelimiterError,
  sym,
  undefinedSymbolError,
  unexpectedTokenError,
} from '../../src';

describe('ExpressionError – shape', () => {
  it('is an Error with a stable code and a detail payload', () => {
    const error = messageError('boom');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ExpressionError);
    expect(error.name).toBe('ExpressionError');
    expect(error.code).toBe('E_MESSAGE');
    expect(error.detail).toEqual({ kind: 'message', text: 'boom' });
    expect(error.message).toBe('boom');
  });

  it('keeps a cause', () => {
    const cause = new Error('inner');
    const error = new ExpressionError({ kind: 'message', text: 'outer' }, { cause });

    expect(error.cause).toBe(cause);
  });

  it('is recognized by isExpressionError', () => {
    expect(isExpressionError(messageError('x'))).toBe(true);
    expect(isExpressionError(new Error('x'))).toBe(false);
    expect(isExpressionError('x')).toBe(false);
  });
});

describe('ExpressionError – messages', () => {
  it.each([
    [emptyExpressionError(), 'E_UNEXPECTED_TOKEN', 'Empty expression'],
    [unexpectedTokenError('*'), 'E_UNEXPECTED_TOKEN', 'Unexpected token `*`'],
    [missingDelimiterError(')'), 'E_MISSING_DELIMITER', 'Missing `)`'],
    [undefinedSymbolError(sym.variable('x')), 'E_UNDEFINED_SYMBOL', 'Undefined variable x'],
    [
      undefinedSymbolError(sym.postfix('%')),
      'E_UNDEFINED_SYMBOL',
      'Undefined postfix operator %',
    ],
    [
      arityMismatchError(sym.function('sqrt', 1)),
      'E_ARITY_MISMATCH',
      'Function sqrt() expects 1 argument',
    ],
    [
      arityMismatchError(sym.function('max', atLeast(2))),
      'E_ARITY_MISMATCH',
      'Function max() expects at least 2 arguments',
    ],
    [
      arityMismatchError(sym.infix('?:')),
      'E_ARITY_MISMATCH',
      'Ternary operator ?: expects 3 arguments',
    ],
    [
      arrayBoundsError(sym.array('a'), 5),
      'E_ARRAY_BOUNDS',
      'Index 5 out of bounds for array a[]',
    ],
    [
      arrayBoundsError(sym.array('a'), -0),
      'E_ARRAY_BOUNDS',
      'Index 0 out of bounds for array a[]',
    ],
    [
      limitError('maxExpressionLength', 10, 12),
      'E_LIMIT',
      'Expression length 12 exceeds the maximum of 10',
    ],
    [
      limitError('maxDepth', 5, 9),
      'E_LIMIT',
      'Expression nesting depth exceeds the maximum of 5',
    ],
  ])('renders %s', (error, code, message) => {
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });

  it('marks only the empty expression as empty', () => {
    expect(emptyExpressionError().isEmptyExpression).toBe(true);
    expect(unexpectedTokenError('x').isEmptyExpression).toBe(false);
  });
});

describe('errorsEqual', () => {
  it('compares kind and payload', () => {
    expect(errorsEqual(messageError('a'), messageError('a'))).toBe(true);
    expect(errorsEqual(messageError('a'), messageError('b'))).toBe(false);
    expect(errorsEqual(messageError('a'), unexpectedTokenError('a'))).toBe(false);
  });

  it('compares function symbols by matching arity', () => {
    expect(
      errorsEqual(
        arityMismatchError(sym.function('f', atLeast(1))),
        arityMismatchError(sym.function('f', 2)),
      ),
    ).toBe(true);
    expect(
      errorsEqual(
        undefinedSymbolError(sym.function('f', 1)),
        undefinedSymbolError(sym.function('f', 2)),
      ),
    ).toBe(false);
  });

  it('treats NaN indexes as equal', () => {
    expect(
      errorsEqual(arrayBoundsError(sym.array('a'), NaN), arrayBoundsError(sym.array('a'), NaN)),
    ).toBe(true);
  });

  it('compares every limit field', () => {
    expect(errorsEqual(limitError('maxDepth', 5, 6), limitError('maxDepth', 5, 6))).toBe(true);
    expect(errorsEqual(limitError('maxDepth', 5, 6), limitError('maxDepth', 5, 7))).toBe(false);
  });
});
