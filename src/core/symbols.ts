/**
 * numeval – Symbols & arity
 *
 * Every name an expression can refer to is an `ExpressionSymbol`: a variable,
 * an infix/prefix/postfix operator, a function with an arity, or an array.
 *
 * Equality is by kind and name; functions additionally compare arity with
 * `arityMatches`, so a variadic declaration such as `max(at least 2)` matches
 * a call site like `max(1, 2, 3)`.
 *
 * License: Apache-2.0
 */

import { escapeIdentifier } from './characters';

/////////////////////
// Arity           //
/////////////////////

export type Arity =
  | { readonly kind: 'exactly'; readonly count: number }
  | { readonly kind: 'atLeast'; readonly count: number };

export function exactly(count: number): Arity {
  return { kind: 'exactly', count };
}

export function atLeast(count: number): Arity {
  return { kind: 'atLeast', count };
}

/** Any number of arguments. */
export const ANY_ARITY: Arity = atLeast(0);

/**
 * Arity comparison. Works like `contains` when one side is a minimum and the
 * other an exact count.
 */
export function arityMatches(a: Arity, b: Arity): boolean {
  if (a.kind === b.kind) {
    return a.count === b.count;
  }
  const min = a.kind === 'atLeast' ? a.count : b.count;
  const value = a.kind === 'exactly' ? a.count : b.count;
  return value >= min;
}

/**
 * `"1 argument"`, `"3 arguments"`, `"at least 2 arguments"`.
 */
export function describeArity(arity: Arity): string {
  const noun = arity.count === 1 ? 'argument' : 'arguments';
  return arity.kind === 'exactly'
    ? `${arity.count} ${noun}`
    : `at least ${arity.count} ${noun}`;
}

/////////////////////
// Symbols         //
/////////////////////

export type OperatorKind = 'infix' | 'prefix' | 'postfix';

export interface NamedSymbol<K extends string> {
  readonly kind: K;
  readonly name: string;
}

export type VariableSymbol = NamedSymbol<'variable'>;
export type OperatorSymbol = NamedSymbol<OperatorKind>;
export type ArraySymbol = NamedSymbol<'array'>;

export interface FunctionSymbol extends NamedSymbol<'function'> {
  readonly arity: Arity;
}

export type ExpressionSymbol =
  | VariableSymbol
  | OperatorSymbol
  | FunctionSymbol
  | ArraySymbol;

export type SymbolKind = ExpressionSymbol['kind'];

/**
 * Symbol constructors:
 *
 *   sym.variable('x')
 *   sym.infix('+')
 *   sym.function('max', atLeast(2))
 *   sym.function('sqrt', 1)        // shorthand for exactly(1)
 */
export const sym = {
  variable(name: string): VariableSymbol {
    return Object.freeze({ kind: 'variable', name });
  },
  infix(name: string): OperatorSymbol {
    return Object.freeze({ kind: 'infix', name });
  },
  prefix(name: string): OperatorSymbol {
    return Object.freeze({ kind: 'prefix', name });
  },
  postfix(name: string): OperatorSymbol {
    return Object.freeze({ kind: 'postfix', name });
  },
  function(name: string, arity: Arity | number = ANY_ARITY): FunctionSymbol {
    const normalized = typeof arity === 'number' ? exactly(arity) : arity;
    return Object.freeze({ kind: 'function', name, arity: normalized });
  },
  array(name: string): ArraySymbol {
    return Object.freeze({ kind: 'array', name });
  },
} as const;

export function isOperatorSymbol(symbol: ExpressionSymbol): symbol is OperatorSymbol {
  return symbol.kind === 'infix' || symbol.kind === 'prefix' || symbol.kind === 'postfix';
}

export function symbolsEqual(a: ExpressionSymbol, b: ExpressionSymbol): boolean {
  if (a.kind === 'function' && b.kind === 'function') {
    return a.name === b.name && arityMatches(a.arity, b.arity);
  }
  return a.kind === b.kind && a.name === b.name;
}

/**
 * Hash key shared by all symbols that can compare equal. Functions with the
 * same name share a key regardless of arity.
 */
export function symbolKey(symbol: ExpressionSymbol): string {
  return `${symbol.kind}:${symbol.name}`;
}

/** The name as it must be written in source text. */
export function escapedName(symbol: ExpressionSymbol): string {
  return escapeIdentifier(symbol.name);
}

export function describeSymbol(symbol: ExpressionSymbol): string {
  const name = escapedName(symbol);
  switch (symbol.kind) {
    case 'variable':
      return `variable ${name}`;
    case 'infix':
      switch (symbol.name) {
        case '?:':
          return `ternary operator ${name}`;
        case '[]':
          return `subscript operator ${name}`;
        case '()':
          return `function call operator ${name}`;
        default:
          return `infix operator ${name}`;
      }
    case 'prefix':
      return `prefix operator ${name}`;
    case 'postfix':
      return `postfix operator ${name}`;
    case 'function':
      return `function ${name}()`;
    case 'array':
      return `array ${name}[]`;
  }
}

/**
 * The number of arguments a symbol takes, as reported in arity errors.
 */
export function expectedArity(symbol: ExpressionSymbol): Arity {
  switch (symbol.kind) {
    case 'function':
      return symbol.arity;
    case 'array':
      return exactly(1);
    case 'infix':
      switch (symbol.name) {
        case '()':
          return atLeast(1);
        case '[]':
          return exactly(1);
        case '?:':
          return exactly(3);
        default:
          return exactly(2);
      }
    case 'prefix':
    case 'postfix':
      return exactly(1);
    case 'variable':
      return exactly(0);
  }
}
