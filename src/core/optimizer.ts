/**
 * numeval – Binding & constant folding
 *
 * Binds an evaluator to every symbol node, bottom-up:
 *
 *  1. Children are bound first.
 *  2. If the impure resolver knows the symbol, its evaluator is bound and the
 *     node is kept as is; the evaluator runs on every `evaluate()`.
 *  3. Otherwise the pure resolver's evaluator is used. When every argument
 *     is already a literal it is called once and the node is replaced by the
 *     result. If that call throws, the node is bound unfolded so the error is
 *     raised at evaluation time instead.
 *
 * Nodes that already carry an evaluator are left untouched, so binding an
 * already-bound tree returns it unchanged.
 *
 * License: Apache-2.0
 */

import {
  literalNode,
  symbolNode,
  type ExpressionNode,
  type SymbolEvaluator,
} from './ast';
import type { ExpressionSymbol } from './symbols';

export type ImpureResolver = (symbol: ExpressionSymbol) => SymbolEvaluator | undefined;
export type PureResolver = (symbol: ExpressionSymbol) => SymbolEvaluator;

export function optimize(
  node: ExpressionNode,
  impure: ImpureResolver,
  pure: PureResolver,
): ExpressionNode {
  if (node.type !== 'Symbol' || node.evaluator) {
    return node;
  }

  const args = node.args.map((arg) => optimize(arg, impure, pure));

  const impureEvaluator = impure(node.symbol);
  if (impureEvaluator) {
    return symbolNode(node.symbol, args, impureEvaluator);
  }

  const evaluator = pure(node.symbol);
  const values: number[] = [];
  for (const arg of args) {
    if (arg.type !== 'Literal') {
      return symbolNode(node.symbol, args, evaluator);
    }
    values.push(arg.value);
  }
  return tryFold(evaluator, values) ?? symbolNode(node.symbol, args, evaluator);
}

function tryFold(
  evaluator: SymbolEvaluator,
  values: readonly number[],
): ExpressionNode | undefined {
  let result: number;
  try {
    result = evaluator(values);
  } catch {
    // Left unfolded; the same error is raised by evaluate()
    return undefined;
  }
  return literalNode(result);
}
