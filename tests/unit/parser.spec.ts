// numeval/tests/unit/parser.spec.ts
//
// Unit tests for the stack parser and the pretty-printer.
//
// Focus areas:
//  - Precedence, associativity and the whitespace rule that tells prefix,
//    infix and postfix operators apart.
//  - Calls, subscripts, arrays and array literals.
//  - Failures embedded as Error leaves, with siblings still parsed.
//  - Printing: fewest parentheses, and printing twice gives the same text.

import { describe, it, expect } from 'vitest';
import {
  Cursor,
  createParser,
  evaluate,
  isErrorNode,
  operatorPrecedence,
  parse,
  parseSubExpression,
  sym,
  type ExpressionNode,
} from '../../src';

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function printed(source: string): string {
  return parse(source).description;
}

function argsOf(node: ExpressionNode): readonly ExpressionNode[] {
  return node.type === 'Symbol' ? node.args : [];
}

// -----------------------------------------------------------------------------
// Precedence & associativity
// -----------------------------------------------------------------------------

describe('Parser – precedence and associativity', () => {
  it('binds * tighter than +', () => {
    const { root } = parse('1 + 2 * 3');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.infix('+'));
    expect(argsOf(root)[1]).toMatchObject({ type: 'Symbol', symbol: sym.infix('*') });
    expect(printed('1 + 2 * 3')).toBe('1 + 2 * 3');
  });

  it.each([
    ['*', { precedence: 1, rightAssociative: false }],
    ['<=', { precedence: -4, rightAssociative: true }],
    ['=', { precedence: -8, rightAssociative: true }],
    ['+', { precedence: 0, rightAssociative: false }],
  ])('looks up the precedence of %s', (name, expected) => {
    expect(operatorPrecedence(name)).toEqual(expected);
  });

  it('keeps the parentheses that change the grouping', () => {
    expect(printed('(1 + 2) * 3')).toBe('(1 + 2) * 3');
    expect(printed('2 - (3 - 1)')).toBe('2 - (3 - 1)');
  });

  it('drops the parentheses that do not', () => {
    expect(printed('(2 - 3) - 1')).toBe('2 - 3 - 1');
    expect(printed('1 + (2 * 3)')).toBe('1 + 2 * 3');
    expect(printed('((x))')).toBe('x');
  });

  it('groups comparisons under logical operators', () => {
    const { root } = parse('a == 1 && b > 2');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.infix('&&'));
    expect(printed('a == 1 && b > 2')).toBe('a == 1 && b > 2');
  });

  it('combines ? and : into a ternary node', () => {
    const { root } = parse('x > 0 ? 10 : 20');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.infix('?:'));
    expect(argsOf(root)).toHaveLength(3);
    expect(printed('x > 0 ? 10 : 20')).toBe('x > 0 ? 10 : 20');
  });

  it('reads an identifier in operator position as an infix operator', () => {
    const { root } = parse('a and b');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.infix('and'));
    expect(printed('a and b')).toBe('a and b');
  });
});

// -----------------------------------------------------------------------------
// Whitespace rule
// -----------------------------------------------------------------------------

describe('Parser – operator whitespace rule', () => {
  it.each([
    ['a+b', 'a + b'],
    ['a + b', 'a + b'],
    ['a -b', 'a - b'],
    ['a- b', 'a - b'],
    ['a% b', 'a % b'],
    ['-a', '-a'],
    ['--a', '--a'],
    ['5%', '5%'],
    ['50% + 1', '50% + 1'],
    ['5 - -3', '5 - -3'],
    ['- -1', '-(-1)'],
    ['-(a + b)', '-(a + b)'],
  ])('%s prints as %s', (source, expected) => {
    expect(printed(source)).toBe(expected);
  });

  it('treats a prefix-spaced operator between operands as infix', () => {
    const { root } = parse('a -b');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.infix('-'));
  });

  it('reads a trailing operator as postfix', () => {
    const { root } = parse('5%');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.postfix('%'));
  });

  it('reads an operator with no right operand as postfix', () => {
    const { root } = parse('1 +');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.postfix('+'));
    expect(printed('1 +')).toBe('1+');
  });
});

// -----------------------------------------------------------------------------
// Calls, subscripts & arrays
// -----------------------------------------------------------------------------

describe('Parser – calls and subscripts', () => {
  it('turns name(...) into a function with the call-site arity', () => {
    const { root } = parse('max(1, 5, 3)');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.function('max', 3));
    expect(printed('max(1, 5, 3)')).toBe('max(1, 5, 3)');
    expect(printed('f()')).toBe('f()');
  });

  it('turns name[i] into an array access', () => {
    const { root } = parse('a[1]');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.array('a'));
    expect(printed('a[i + 1]')).toBe('a[i + 1]');
  });

  it('rejects an array access with more than one index', () => {
    const { error } = parse('a[1, 2]');

    expect(error?.code).toBe('E_ARITY_MISMATCH');
    expect(error?.message).toBe('Array a[] expects 1 argument');
  });

  it('reads a bracket list on its own as an array literal', () => {
    const { root } = parse('[1, 2]');

    expect(root.type === 'Symbol' && root.symbol).toEqual(sym.function('[]', 2));
    expect(printed('[1, 2]')).toBe('[1, 2]');
  });

  it('applies (...) and [...] to other operands as operators', () => {
    const call = parse('f(x)(y)').root;
    const subscript = parse('f(1)[0]').root;

    expect(call.type === 'Symbol' && call.symbol).toEqual(sym.infix('()'));
    expect(subscript.type === 'Symbol' && subscript.symbol).toEqual(sym.infix('[]'));
    expect(printed('f(x)(y)')).toBe('f(x)(y)');
    expect(printed('f(1)[0]')).toBe('f(1)[0]');
  });
});

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

describe('Parser – embedded errors', () => {
  it('keeps a bad argument as an Error leaf and parses its siblings', () => {
    const parsed = parse('max(1, 2 3, 4)');
    const args = argsOf(parsed.root);

    expect(parsed.root.type === 'Symbol' && parsed.root.symbol).toEqual(
      sym.function('max', 3),
    );
    expect(args[0]).toEqual({ type: 'Literal', value: 1 });
    expect(args[2]).toEqual({ type: 'Literal', value: 4 });
    expect(isErrorNode(args[1]) && args[1].source).toBe('2 3');
    expect(parsed.error?.message).toBe('Unexpected token `3`');
    expect(parsed.description).toBe('max(1, 2 3, 4)');
  });

  it('keeps a malformed quoted name inside a larger expression', () => {
    const parsed = parse('1 + `abc');

    expect(parsed.root.type === 'Symbol' && parsed.root.symbol).toEqual(sym.infix('+'));
    expect(parsed.error?.code).toBe('E_MISSING_DELIMITER');
    expect(parsed.description).toBe('1 + `abc');
  });

  it.each([
    ['', 'Empty expression'],
    ['(1 + 2', 'Missing `)`'],
    ['1 + 2)', 'Unexpected token `)`'],
    ['f(1,)', 'Unexpected token `)`'],
    ['1 2', 'Unexpected token `2`'],
  ])('turns %j into a single Error leaf: %s', (source, message) => {
    const parsed = parse(source);

    expect(parsed.root.type).toBe('Error');
    expect(parsed.error?.message).toBe(message);
    expect(parsed.description).toBe(source);
  });

  it('reads blank space between call parentheses as no arguments', () => {
    const parsed = parse('f( )');

    expect(parsed.error).toBeUndefined();
    expect(parsed.root).toEqual(parse('f()').root);
    expect(parsed.description).toBe('f()');
  });

  it('flags the empty expression', () => {
    expect(parse('   ').error?.isEmptyExpression).toBe(true);
  });

  it('throws the first error from parseOrThrow', () => {
    const parser = createParser();

    expect(() => parser.parseOrThrow('(1')).toThrow('Missing `)`');
    expect(parser.parseOrThrow('1 + 1').description).toBe('1 + 1');
  });
});

// -----------------------------------------------------------------------------
// Sub-expressions
// -----------------------------------------------------------------------------

describe('parseSubExpression', () => {
  it('stops at a delimiter and leaves it unconsumed', () => {
    const cursor = Cursor.from('1 + 2} tail');

    expect(parseSubExpression(cursor, ['}']).description).toBe('1 + 2');
    expect(cursor.toString()).toBe('} tail');
  });

  it('parses to the end when no delimiter appears', () => {
    const cursor = Cursor.from('a * b');

    expect(parseSubExpression(cursor, ['}']).description).toBe('a * b');
    expect(cursor.isEmpty()).toBe(true);
  });
});

// -----------------------------------------------------------------------------
// Printing
// -----------------------------------------------------------------------------

describe('Parser – printing round trip', () => {
  const sources = [
    '1 + 2 * 3',
    '(1 + 2) * 3',
    '2 - (3 - 1)',
    '-2 + 3',
    'max(1, 5, 3)',
    'a[1] + b',
    'x ? y : z',
    '-(a + b)',
    'f(x)(y)',
    '5 - -3',
    '- -1',
    '50% + 1',
    '`my var` * 2',
    "'a\\tb' + 1",
    'pow(2, 0.5) / 1e-3',
  ];

  it.each(sources)('prints %s the same way twice', (source) => {
    const once = parse(source).description;
    expect(parse(once).description).toBe(once);
  });

  it.each([
    ['1 ? 2 : (0 ? 3 : 4)', 2],
    ['(1 ? 0 : 1) ? 3 : 4', 4],
  ])('keeps the grouping of ternary operands in %s', (source, expected) => {
    const once = printed(source);
    const options = { boolSymbols: true };

    expect(once).toBe(source);
    expect(evaluate(once, options)).toBe(evaluate(source, options));
    expect(evaluate(source, options)).toBe(expected);
  });

  it('prints a failed group with its parentheses', () => {
    const parsed = parse('(1 2) + 3');

    expect(parsed.description).toBe('(1 2) + 3');
    expect(parsed.error?.message).toBe('Unexpected token `2`');
    expect(printed('-(1 2)')).toBe('-(1 2)');
    expect(printed('(1 2)(3)')).toBe('(1 2)(3)');
  });

  it('re-escapes quoted names', () => {
    expect(printed("'a\\tb' + 1")).toBe("'a\\tb' + 1");
  });

  it('reports the symbols of a parsed tree in first-seen order', () => {
    expect(parse('x + y * x').symbols).toEqual([
      sym.infix('+'),
      sym.variable('x'),
      sym.infix('*'),
      sym.variable('y'),
    ]);
  });
});
