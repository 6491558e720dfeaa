/**
 * numeval – Symbol resolution
 *
 * Builds the impure/pure resolver pair handed to `optimize`:
 *
 *  - `createResolvers(options)` – the policy behind `new Expression(...)`:
 *    constants and arrays first, then the caller's symbol table, then the
 *    math (and optionally boolean) tables, then an evaluator that raises the
 *    most useful error.
 *  - `advancedResolvers(impure, pure)` – the policy behind
 *    `Expression.advanced(...)`: caller resolvers with the built-in tables as
 *    a pure fallback.
 *
 * Errors for unknown symbols are not raised while binding. They are wrapped
 * in evaluators that throw when the expression is evaluated; `diagnose`
 * reports the same error up front for tooling.
 *
 * License: Apache-2.0
 */

import type { SymbolEvaluator } from './ast';
import {
  arityMismatchError,
  arrayBoundsError,
  undefinedSymbolError,
  unexpectedTokenError,
  type ExpressionError,
} from './errors';
import type { ImpureResolver, PureResolver } from './optimizer';
import type { SymbolTable } from './symbol-table';
import {
  arityMatches,
  exactly,
  sym,
  type ArraySymbol,
  type ExpressionSymbol,
} from './symbols';
import { BOOLEAN_SYMBOLS } from '../plugins/boolean';
import { MATH_SYMBOLS } from '../plugins/math';

export interface ResolutionPolicy {
  readonly noOptimize: boolean;
  readonly boolSymbols: boolean;
  readonly pureSymbols: boolean;
  readonly constants: ReadonlyMap<string, number>;
  readonly arrays: ReadonlyMap<string, readonly number[]>;
  readonly symbols: SymbolTable;
}

export interface Resolvers {
  readonly impure: ImpureResolver;
  readonly pure: PureResolver;
  /**
   * The error binding `symbol` would defer to evaluation time, if any.
   * Never calls an evaluator.
   */
  readonly diagnose: (symbol: ExpressionSymbol) => ExpressionError | undefined;
}

/** Highest function arity tried when reporting an arity mismatch. */
const MAX_PROBED_ARITY = 10;

const throwing =
  (error: () => ExpressionError): SymbolEvaluator =>
  () => {
    throw error();
  };

/////////////////////////////
// Default policy          //
/////////////////////////////

export function createResolvers(policy: ResolutionPolicy): Resolvers {
  const { constants, arrays, symbols, pureSymbols } = policy;
  const booleans = policy.boolSymbols ? BOOLEAN_SYMBOLS : undefined;

  const symbolEvaluator = (symbol: ExpressionSymbol): SymbolEvaluator | undefined => {
    const fn = symbols.get(symbol);
    if (fn) {
      return fn;
    }
    if (!booleans && symbol.kind === 'infix' && symbol.name === '?:') {
      // `a ? b : c` from separately supplied `?` and `:` operators
      const lhs = symbols.get(sym.infix('?'));
      const rhs = symbols.get(sym.infix(':'));
      if (lhs && rhs) {
        return (args) => rhs([lhs([args[0], args[1]]), args[2]]);
      }
    }
    return undefined;
  };

  const resolve = (symbol: ExpressionSymbol): SymbolEvaluator | undefined => {
    switch (symbol.kind) {
      case 'variable': {
        const constant = constants.get(symbol.name);
        if (constant !== undefined) {
          return () => constant;
        }
        const fn = pureSymbols ? symbols.get(symbol) : undefined;
        if (fn) {
          return fn;
        }
        break;
      }
      case 'array': {
        const values = arrays.get(symbol.name);
        if (values) {
          return arrayEvaluator(symbol, values);
        }
        const fn = pureSymbols ? symbols.get(symbol) : undefined;
        if (fn) {
          return fn;
        }
        break;
      }
      default: {
        const fn = symbolEvaluator(symbol);
        if (fn) {
          return fn;
        }
      }
    }
    return MATH_SYMBOLS.get(symbol) ?? booleans?.get(symbol);
  };

  const failure = (symbol: ExpressionSymbol): ExpressionError => {
    if (symbol.kind === 'function') {
      const [arity] = symbols.functionArities(symbol.name);
      if (arity) {
        return arityMismatchError(sym.function(symbol.name, arity));
      }
    }
    return unresolvedError(symbol);
  };

  const pure = (symbol: ExpressionSymbol): SymbolEvaluator =>
    resolve(symbol) ?? throwing(() => failure(symbol));

  const impure = (symbol: ExpressionSymbol): SymbolEvaluator | undefined => {
    switch (symbol.kind) {
      case 'variable':
        if (!pureSymbols && !constants.has(symbol.name)) {
          const fn = symbols.get(symbol);
          if (fn) return fn;
        }
        break;
      case 'array':
        if (!pureSymbols && !arrays.has(symbol.name)) {
          const fn = symbols.get(symbol);
          if (fn) return fn;
        }
        break;
      default:
        if (!pureSymbols) {
          const fn = symbolEvaluator(symbol);
          if (fn) return fn;
        }
    }
    // Without optimization everything is bound through this path, so
    // nothing is ever folded.
    return policy.noOptimize ? pure(symbol) : undefined;
  };

  const diagnose = (symbol: ExpressionSymbol): ExpressionError | undefined =>
    (resolve(symbol) ?? symbolEvaluator(symbol)) ? undefined : failure(symbol);

  return { impure, pure, diagnose };
}

/**
 * Reads `values[floor(index)]`; anything outside the array is an error.
 */
function arrayEvaluator(symbol: ArraySymbol, values: readonly number[]): SymbolEvaluator {
  return (args) => {
    const requested = args[0];
    const index = Math.floor(requested);
    if (!Number.isInteger(index) || index < 0 || index >= values.length) {
      throw arrayBoundsError(symbol, requested);
    }
    return values[index];
  };
}

/////////////////////////////
// Advanced policy         //
/////////////////////////////

export type OptionalPureResolver = (symbol: ExpressionSymbol) => SymbolEvaluator | undefined;

export function advancedResolvers(
  impure: ImpureResolver,
  pure: OptionalPureResolver,
): Resolvers {
  const resolve = (symbol: ExpressionSymbol): SymbolEvaluator | undefined =>
    pure(symbol) ?? MATH_SYMBOLS.get(symbol) ?? BOOLEAN_SYMBOLS.get(symbol);

  const failure = (symbol: ExpressionSymbol): ExpressionError => {
    if (symbol.kind === 'function') {
      for (let count = 0; count <= MAX_PROBED_ARITY; count++) {
        const candidate = sym.function(symbol.name, exactly(count));
        if ((impure(candidate) ?? pure(candidate)) !== undefined) {
          return arityMismatchError(candidate);
        }
      }
    }
    return unresolvedError(symbol);
  };

  return {
    impure,
    pure: (symbol) => resolve(symbol) ?? throwing(() => failure(symbol)),
    diagnose: (symbol) =>
      (impure(symbol) ?? resolve(symbol)) ? undefined : failure(symbol),
  };
}

/////////////////////////////
// Fallback errors         //
/////////////////////////////

/**
 * The error for a symbol nothing could resolve. Structural symbols the
 * parser synthesizes (`,`, `[]`, `()`) report the token they came from;
 * known math functions called with the wrong argument count report an
 * arity mismatch.
 */
export function unresolvedError(symbol: ExpressionSymbol): ExpressionError {
  const structural =
    (symbol.kind === 'infix' && [',', '[]', '()'].includes(symbol.name)) ||
    (symbol.kind === 'function' && symbol.name === '[]');
  if (structural) {
    return unexpectedTokenError(symbol.name.charAt(0));
  }
  if (symbol.kind === 'function') {
    const called = symbol.arity;
    const expected = MATH_SYMBOLS.functionArities(symbol.name).find(
      (arity) => !arityMatches(arity, called),
    );
    if (expected) {
      return arityMismatchError(sym.function(symbol.name, expected));
    }
  }
  return undefinedSymbolError(symbol);
}
