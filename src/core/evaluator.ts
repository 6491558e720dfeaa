/**
 * numeval – Evaluator
 *
 * A plain recursive walk over a bound tree. Nothing is mutated, so a bound
 * tree can be evaluated any number of times, including concurrently from
 * independent async tasks.
 *
 * License: Apache-2.0
 */

import type { ExpressionNode } from './ast';
import { undefinedSymbolError } from './errors';

export function evaluateNode(node: ExpressionNode): number {
  switch (node.type) {
    case 'Literal':
      return node.value;
    case 'Error':
      throw node.error;
    case 'Symbol': {
      const { evaluator } = node;
      if (!evaluator) {
        throw undefinedSymbolError(node.symbol);
      }
      return evaluator(node.args.map(evaluateNode));
    }
  }
}
