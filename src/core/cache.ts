/**
 * numeval – Parse cache
 *
 * A source-text → tree map owned by an `ExpressionParser`. Reads and writes
 * are synchronous and run to completion on the single JS thread, so they
 * never interleave. Two callers parsing the same uncached text both parse
 * it and the last write wins.
 *
 * License: Apache-2.0
 */

import type { ExpressionNode } from './ast';

export class ExpressionCache {
  private readonly entries = new Map<string, ExpressionNode>();

  get(source: string): ExpressionNode | undefined {
    return this.entries.get(source);
  }

  set(source: string, root: ExpressionNode): void {
    this.entries.set(source, root);
  }

  has(source: string): boolean {
    return this.entries.has(source);
  }

  /** Returns whether an entry was removed. */
  delete(source: string): boolean {
    return this.entries.delete(source);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
