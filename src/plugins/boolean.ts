/**
 * numeval – Boolean plugin
 *
 * Comparison and logic symbols. Truth values are numbers: results are 1 or
 * 0, and any non-zero argument counts as true.
 *
 *   true, false
 *   a == b, a != b, a > b, a >= b, a < b, a <= b
 *   a && b, a || b      (both sides are always evaluated)
 *   !a
 *   a ? b : c, a ?: b
 *
 * License: Apache-2.0
 */

import type { SymbolEvaluator } from '../core/ast';
import { SymbolTable, type SymbolEntry } from '../core/symbol-table';
import { sym } from '../core/symbols';

export function booleanPlugin(table: SymbolTable): SymbolTable {
  return table.withSymbols(BOOLEAN_ENTRIES);
}

export default booleanPlugin;

const truth = (value: boolean): number => (value ? 1 : 0);

const compare =
  (fn: (a: number, b: number) => boolean): SymbolEvaluator =>
  (args) =>
    truth(fn(args[0], args[1]));

/**
 * `a ? b : c` with three arguments; `a ?: b` (a if non-zero, else b) with two.
 */
const ternary: SymbolEvaluator = (args) => {
  if (args.length === 3) {
    return args[0] !== 0 ? args[1] : args[2];
  }
  return args[0] !== 0 ? args[0] : args[1];
};

const BOOLEAN_ENTRIES: readonly SymbolEntry[] = [
  [sym.variable('true'), () => 1],
  [sym.variable('false'), () => 0],

  [sym.infix('=='), compare((a, b) => a === b)],
  [sym.infix('!='), compare((a, b) => a !== b)],
  [sym.infix('>'), compare((a, b) => a > b)],
  [sym.infix('>='), compare((a, b) => a >= b)],
  [sym.infix('<'), compare((a, b) => a < b)],
  [sym.infix('<='), compare((a, b) => a <= b)],
  [sym.infix('&&'), compare((a, b) => a !== 0 && b !== 0)],
  [sym.infix('||'), compare((a, b) => a !== 0 || b !== 0)],

  [sym.prefix('!'), (args) => truth(args[0] === 0)],

  [sym.infix('?:'), ternary],
];

/** The boolean table on its own. */
export const BOOLEAN_SYMBOLS: SymbolTable = booleanPlugin(SymbolTable.empty());
