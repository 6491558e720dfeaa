/**
 * numeval – Plugin index
 *
 * Built-in symbol tables are plugins: functions that take a `SymbolTable`
 * and return a new one with extra entries. Applications write their own the
 * same way and compose them with `applyPlugins` or `createPluginSet`.
 *
 *   import { createSymbolTable } from '../core/symbol-table';
 *   import { applyPlugins, booleanPlugin, mathPlugin } from '../plugins';
 *
 *   const table = applyPlugins(
 *     createSymbolTable(),
 *     booleanPlugin,
 *     (t) => mathPlugin(t, { angleUnit: 'deg' }),
 *   );
 *
 * Plugins are applied left to right: later plugins replace earlier entries
 * for the same symbol.
 *
 * License: Apache-2.0
 */

import type { SymbolTable } from '../core/symbol-table';

/////////////////////////////
// Individual plugin exports
/////////////////////////////

export { mathPlugin, MATH_SYMBOLS } from './math';
export type { AngleUnit, MathPluginOptions } from './math';

export { booleanPlugin, BOOLEAN_SYMBOLS } from './boolean';

/////////////////////////////
// Plugin composition types
/////////////////////////////

/**
 * Example:
 *
 *   const squarePlugin: Plugin = (table) =>
 *     table.withSymbol(sym.function('square', 1), ([x]) => x * x);
 */
export type Plugin = (table: SymbolTable) => SymbolTable;

export function applyPlugins(table: SymbolTable, ...plugins: Plugin[]): SymbolTable {
  return plugins.reduce((current, plugin) => plugin(current), table);
}

/////////////////////////////
// Helper: createPluginSet //
/////////////////////////////

export interface PluginSet {
  /** Name for debugging. */
  readonly name: string;
  readonly plugins: readonly Plugin[];
  /** Same as `applyPlugins(table, ...plugins)`. */
  attach(table: SymbolTable): SymbolTable;
}

/**
 * Bundle plugins under a name for reuse:
 *
 *   export const formulaPlugins = createPluginSet('formulas', mathPlugin, booleanPlugin);
 *   const table = formulaPlugins.attach(createSymbolTable());
 */
export function createPluginSet(name: string, ...plugins: Plugin[]): PluginSet {
  const frozenPlugins: readonly Plugin[] = Object.freeze([...plugins]);

  return {
    name,
    plugins: frozenPlugins,
    attach(table: SymbolTable): SymbolTable {
      return applyPlugins(table, ...frozenPlugins);
    },
  };
}
