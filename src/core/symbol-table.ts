/**
 * numeval – Symbol tables
 *
 * An immutable map from `ExpressionSymbol` to `SymbolEvaluator`. Entries are
 * bucketed by kind and name, and function lookups are arity-aware: a table
 * holding `max` with `atLeast(2)` answers `get(sym.function('max', 3))`.
 *
 *   const table = createSymbolTable()
 *     .withSymbol(sym.variable('tau'), () => 2 * Math.PI)
 *     .withSymbol(sym.function('hypot', 2), ([a, b]) => Math.hypot(a, b));
 *
 * `withSymbol` returns a new table; the original is never modified.
 *
 * License: Apache-2.0
 */

import type { SymbolEvaluator } from './ast';
import {
  sym,
  symbolKey,
  symbolsEqual,
  type Arity,
  type ExpressionSymbol,
} from './symbols';

export type SymbolEntry = readonly [ExpressionSymbol, SymbolEvaluator];

type Buckets = ReadonlyMap<string, readonly SymbolEntry[]>;

export class SymbolTable implements Iterable<SymbolEntry> {
  private static readonly EMPTY = new SymbolTable(new Map<string, readonly SymbolEntry[]>());

  private readonly buckets: Buckets;

  private constructor(buckets: Buckets) {
    this.buckets = buckets;
  }

  static empty(): SymbolTable {
    return SymbolTable.EMPTY;
  }

  static from(entries: Iterable<SymbolEntry>): SymbolTable {
    return SymbolTable.EMPTY.withSymbols(entries);
  }

  /**
   * Add or replace a symbol. Replacing a function drops any existing entry
   * whose arity matches the new one.
   */
  withSymbol(symbol: ExpressionSymbol, evaluator: SymbolEvaluator): SymbolTable {
    return this.withSymbols([[symbol, evaluator]]);
  }

  withSymbols(entries: Iterable<SymbolEntry>): SymbolTable {
    const buckets = new Map(this.buckets);
    for (const [symbol, evaluator] of entries) {
      const key = symbolKey(symbol);
      const bucket = (buckets.get(key) ?? []).filter(
        ([existing]) => !symbolsEqual(existing, symbol),
      );
      bucket.push([symbol, evaluator]);
      buckets.set(key, bucket);
    }
    return new SymbolTable(buckets);
  }

  get(symbol: ExpressionSymbol): SymbolEvaluator | undefined {
    const bucket = this.buckets.get(symbolKey(symbol));
    return bucket?.find(([existing]) => symbolsEqual(existing, symbol))?.[1];
  }

  has(symbol: ExpressionSymbol): boolean {
    return this.get(symbol) !== undefined;
  }

  /**
   * Declared arities of every function named `name`.
   */
  functionArities(name: string): readonly Arity[] {
    const arities: Arity[] = [];
    for (const [symbol] of this.buckets.get(symbolKey(sym.function(name))) ?? []) {
      if (symbol.kind === 'function') {
        arities.push(symbol.arity);
      }
    }
    return arities;
  }

  get size(): number {
    let size = 0;
    for (const bucket of this.buckets.values()) {
      size += bucket.length;
    }
    return size;
  }

  *entries(): IterableIterator<SymbolEntry> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }

  symbols(): ExpressionSymbol[] {
    return Array.from(this.entries(), ([symbol]) => symbol);
  }

  [Symbol.iterator](): Iterator<SymbolEntry> {
    return this.entries();
  }
}

export type SymbolSource = SymbolTable | Iterable<SymbolEntry>;

export function createSymbolTable(source: SymbolSource = []): SymbolTable {
  return source instanceof SymbolTable ? source : SymbolTable.from(source);
}
