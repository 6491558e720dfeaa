/**
 * numeval – Math plugin
 *
 * The standard arithmetic symbol table. Every entry is pure, so calls with
 * literal arguments are folded when an expression is bound.
 *
 *   pi
 *   a + b, a - b, a * b, a / b, a % b     (% is the floating-point remainder)
 *   -a
 *   sqrt floor ceil round cos acos sin asin tan atan abs   (1 argument)
 *   pow atan2 mod                                          (2 arguments)
 *   max min                                                (2 or more)
 *
 * Example:
 *
 *   const table = mathPlugin(createSymbolTable(), { angleUnit: 'deg' });
 *   new Expression('sin(90)', { symbols: table }).evaluate(); // 1
 *
 * License: Apache-2.0
 */

import type { SymbolEvaluator } from '../core/ast';
import { SymbolTable, type SymbolEntry } from '../core/symbol-table';
import { atLeast, sym } from '../core/symbols';

/////////////////////////////
// Plugin configuration    //
/////////////////////////////

/**
 *  - 'rad' (default): sin(pi / 2) → 1
 *  - 'deg': sin(90) → 1
 */
export type AngleUnit = 'rad' | 'deg';

export interface MathPluginOptions {
  /**
   * Unit used by the trigonometric functions, for both arguments of
   * `sin`/`cos`/`tan` and results of `asin`/`acos`/`atan`/`atan2`.
   *
   * Default: 'rad'.
   */
  angleUnit?: AngleUnit;
}

/**
 * Math plugin entry point. Existing entries with the same symbols are
 * replaced.
 */
export function mathPlugin(
  table: SymbolTable,
  options: MathPluginOptions = {},
): SymbolTable {
  return table.withSymbols(mathEntries(options));
}

export default mathPlugin;

/** The math table with default options. */
export const MATH_SYMBOLS: SymbolTable = mathPlugin(SymbolTable.empty());

/////////////////////////////
// Entries                 //
/////////////////////////////

function mathEntries({ angleUnit = 'rad' }: MathPluginOptions): SymbolEntry[] {
  const toRadians = angleUnit === 'deg' ? (x: number) => (x * Math.PI) / 180 : identity;
  const fromRadians = angleUnit === 'deg' ? (x: number) => (x * 180) / Math.PI : identity;

  const unary = (fn: (x: number) => number): SymbolEvaluator => (args) => fn(args[0]);
  const binary =
    (fn: (a: number, b: number) => number): SymbolEvaluator =>
    (args) =>
      fn(args[0], args[1]);

  return [
    // constants
    [sym.variable('pi'), () => Math.PI],

    // infix operators
    [sym.infix('+'), binary((a, b) => a + b)],
    [sym.infix('-'), binary((a, b) => a - b)],
    [sym.infix('*'), binary((a, b) => a * b)],
    [sym.infix('/'), binary((a, b) => a / b)],
    [sym.infix('%'), binary((a, b) => a % b)],

    // prefix operators
    [sym.prefix('-'), unary((x) => -x)],

    // functions – 1 argument
    [sym.function('sqrt', 1), unary(Math.sqrt)],
    [sym.function('floor', 1), unary(Math.floor)],
    [sym.function('ceil', 1), unary(Math.ceil)],
    [sym.function('round', 1), unary(roundHalfAwayFromZero)],
    [sym.function('cos', 1), unary((x) => Math.cos(toRadians(x)))],
    [sym.function('acos', 1), unary((x) => fromRadians(Math.acos(x)))],
    [sym.function('sin', 1), unary((x) => Math.sin(toRadians(x)))],
    [sym.function('asin', 1), unary((x) => fromRadians(Math.asin(x)))],
    [sym.function('tan', 1), unary((x) => Math.tan(toRadians(x)))],
    [sym.function('atan', 1), unary((x) => fromRadians(Math.atan(x)))],
    [sym.function('abs', 1), unary(Math.abs)],

    // functions – 2 arguments
    [sym.function('pow', 2), binary(Math.pow)],
    [sym.function('atan2', 2), binary((y, x) => fromRadians(Math.atan2(y, x)))],
    [sym.function('mod', 2), binary((a, b) => a % b)],

    // functions – variadic
    [sym.function('max', atLeast(2)), (args) => args.reduce((a, b) => Math.max(a, b), args[0])],
    [sym.function('min', atLeast(2)), (args) => args.reduce((a, b) => Math.min(a, b), args[0])],
  ];
}

function identity(x: number): number {
  return x;
}

/**
 * `Math.round` rounds halves towards +∞; this rounds them away from zero,
 * so `round(-2.5)` is -3.
 */
function roundHalfAwayFromZero(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}
