// numeval/tests/integration/properties.spec.ts
//
// End-to-end behavior through the public entry points: parse, bind and
// evaluate in one go, the way an application uses the library.

import { describe, it, expect, vi } from 'vitest';
import {
  Expression,
  ExpressionError,
  createParser,
  evaluate,
  parse,
  sym,
} from '../../src';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExpressionError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe('Arithmetic', () => {
  it('follows operator precedence', () => {
    expect(evaluate('1 + 2 * 3')).toBe(7);
    expect(evaluate('(1 + 2) * 3')).toBe(9);
  });

  it('associates to the left and applies prefix minus', () => {
    expect(evaluate('2 - 3 - 1')).toBe(-2);
    expect(evaluate('-2 + 3')).toBe(1);
  });
});

describe('Functions and arity', () => {
  it('calls built-in functions', () => {
    expect(evaluate('pow(2, 3)')).toBe(8);
    expect(evaluate('max(1, 5, 3)')).toBe(5);
  });

  it('names the function and its arity on a mismatch', () => {
    expect(codeOf(() => evaluate('sqrt(1,2)'))).toBe('E_ARITY_MISMATCH');
    expect(() => evaluate('sqrt(1,2)')).toThrow('Function sqrt() expects 1 argument');
  });

  it('reports a function nothing defines', () => {
    expect(codeOf(() => evaluate('foo(1)'))).toBe('E_UNDEFINED_SYMBOL');
  });
});

describe('Booleans', () => {
  it('evaluates the ternary with boolean symbols on', () => {
    expect(evaluate('1 > 0 ? 10 : 20', { boolSymbols: true })).toBe(10);
  });
});

describe('Arrays', () => {
  const arrays = { a: [10, 20, 30] };

  it('reads elements by index', () => {
    expect(evaluate('a[1]', { arrays })).toBe(20);
    expect(evaluate('a[1.7]', { arrays })).toBe(20);
  });

  it('rejects indexes outside the array', () => {
    expect(codeOf(() => evaluate('a[5]', { arrays }))).toBe('E_ARRAY_BOUNDS');
    expect(() => evaluate('a[5]', { arrays })).toThrow(
      'Index 5 out of bounds for array a[]',
    );
    expect(() => evaluate('a[-1]', { arrays })).toThrow(
      'Index -1 out of bounds for array a[]',
    );
  });

  it('reads caller arrays on every evaluate()', () => {
    const values = [1, 2];
    const expression = new Expression('b[0] + b[1]', {
      symbols: [[sym.array('b'), ([i]) => values[i]]],
    });

    expect(expression.evaluate()).toBe(3);
    values[1] = 40;
    expect(expression.evaluate()).toBe(41);
  });
});

describe('Printing', () => {
  it.each([
    '1+2*3',
    '(a + b) * (c - d)',
    'max(a, -b, c%)',
    'x ? y : z',
    '-(-x)',
    'f(a)[b](c)',
    '`two words` / 2',
  ])('prints %s the same after a second parse', (source) => {
    const description = parse(source).description;
    expect(parse(description).description).toBe(description);
  });
});

describe('Folding', () => {
  it('folds a pure constant expression completely', () => {
    expect(new Expression('1+2').symbols).toEqual([]);
  });

  it('keeps an unbound variable', () => {
    const variables = new Expression('x+2').symbols.filter((s) => s.kind === 'variable');

    expect(variables).toEqual([sym.variable('x')]);
  });
});

describe('Cache', () => {
  it('tokenizes an identical string once and again after clearing', () => {
    const onParse = vi.fn();
    const parser = createParser({ onParse });

    const first = parser.parse('a * (b + 1)', true);
    const second = parser.parse('a * (b + 1)', true);
    expect(second.root).toEqual(first.root);
    expect(onParse).toHaveBeenCalledTimes(1);

    parser.clearCache();
    parser.parse('a * (b + 1)', true);
    expect(onParse).toHaveBeenCalledTimes(2);
  });
});

describe('Concurrency', () => {
  it('evaluates one expression from many tasks with the sequential result', async () => {
    const expression = new Expression('sqrt(x) * max(y, 3) - a[2]', {
      noOptimize: true,
      constants: { x: 16, y: 5 },
      arrays: { a: [0, 1, 2] },
    });
    const sequential = expression.evaluate();

    const results = await Promise.all(
      Array.from({ length: 100 }, (_, i) =>
        new Promise<number>((resolve) => {
          setTimeout(() => resolve(expression.evaluate()), i % 5);
        }),
      ),
    );

    expect(sequential).toBe(18);
    expect(new Set(results)).toEqual(new Set([18]));
  });
});

describe('All-or-nothing evaluation', () => {
  it('never returns a partial result', () => {
    const expression = new Expression('1 + foo + 2');

    expect(() => expression.evaluate()).toThrow('Undefined variable foo');
  });

  it('surfaces an embedded parse error only on evaluate()', () => {
    const expression = new Expression('max(1, 2 3)');

    expect(expression.description).toBe('max(1, 2 3)');
    expect(() => expression.evaluate()).toThrow('Unexpected token `3`');
  });
});
