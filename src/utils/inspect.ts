/**
 * numeval – Utils / inspect
 *
 * Helpers for logs, debug output and playgrounds:
 *  - `formatExpressionError` – a JSON-safe record for any thrown value.
 *  - `analyzeAst` – counts and symbol names for a tree.
 *  - `inspectExpression` – a multi-line report for a source string or an
 *    already-built expression.
 *
 * Nothing here evaluates an expression.
 *
 * License: Apache-2.0
 */

import { describeNode, firstError, type ExpressionNode } from '../core/ast';
import { defaultParser, Expression, type ExpressionParser } from '../core/engine';
import {
  isExpressionError,
  type ExpressionErrorCode,
  type ExpressionErrorKind,
} from '../core/errors';
import { escapedName, type SymbolKind } from '../core/symbols';

/////////////////////////////
// Error formatting        //
/////////////////////////////

export interface FormattedExpressionError {
  /** `E_*` code, or "E_INTERNAL" for anything that is not an ExpressionError. */
  code: ExpressionErrorCode | 'E_INTERNAL';
  kind?: ExpressionErrorKind;
  message: string;
  /** Compact one-line form: `[E_UNDEFINED_SYMBOL] Undefined variable x`. */
  summary: string;
  /** Offending source text, when known. */
  source?: string;
}

/**
 * Format any thrown value. `source` is the text the error came from, when
 * the caller has it (an error leaf's fragment, or the whole expression).
 */
export function formatExpressionError(
  err: unknown,
  source?: string,
): FormattedExpressionError {
  if (!isExpressionError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      code: 'E_INTERNAL',
      message,
      summary: `Error: ${message}`,
      ...(source === undefined ? {} : { source }),
    };
  }

  return {
    code: err.code,
    kind: err.detail.kind,
    message: err.message,
    summary: `[${err.code}] ${err.message}`,
    ...(source === undefined ? {} : { source }),
  };
}

/////////////////////////////
// Tree analysis           //
/////////////////////////////

export interface ExpressionAstInsight {
  nodeCount: number;
  literalCount: number;
  errorCount: number;
  /** Root = 1. */
  maxDepth: number;
  /**
   * Distinct symbol names (as written in source) per kind, sorted. Kinds
   * that do not occur are absent.
   */
  symbols: Partial<Record<SymbolKind, string[]>>;
}

export function analyzeAst(root: ExpressionNode): ExpressionAstInsight {
  let nodeCount = 0;
  let literalCount = 0;
  let errorCount = 0;
  let maxDepth = 0;
  const names = new Map<SymbolKind, Set<string>>();

  const pending: Array<[ExpressionNode, number]> = [[root, 1]];
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const [node, depth] = entry;
    nodeCount++;
    if (depth > maxDepth) maxDepth = depth;

    switch (node.type) {
      case 'Literal':
        literalCount++;
        break;
      case 'Error':
        errorCount++;
        break;
      case 'Symbol': {
        const kind = node.symbol.kind;
        const set = names.get(kind) ?? new Set<string>();
        set.add(escapedName(node.symbol));
        names.set(kind, set);
        for (const arg of node.args) {
          pending.push([arg, depth + 1]);
        }
        break;
      }
    }
  }

  const symbols: Partial<Record<SymbolKind, string[]>> = {};
  for (const [kind, set] of names) {
    symbols[kind] = Array.from(set).sort();
  }

  return { nodeCount, literalCount, errorCount, maxDepth, symbols };
}

/////////////////////////////
// Report                  //
/////////////////////////////

export interface InspectExpressionOptions {
  /** Parser for string sources. Default: `defaultParser`. */
  parser?: ExpressionParser;
}

/**
 * Multi-line report on an expression:
 *
 *   Expression: a + 2
 *   Nodes: 3 (1 literal, 0 errors)
 *   Depth: 2
 *   Symbols: infix +; variable a
 *   Error: none
 *
 * A string is parsed but not bound, so it reports what was written; an
 * `Expression` reports the bound tree, after folding.
 */
export function inspectExpression(
  source: string | Expression,
  options: InspectExpressionOptions = {},
): string {
  const root =
    source instanceof Expression
      ? source.root
      : (options.parser ?? defaultParser).parse(source).root;

  const insight = analyzeAst(root);
  const error = firstError(root);

  const symbolParts: string[] = [];
  for (const [kind, list] of Object.entries(insight.symbols)) {
    if (list) symbolParts.push(`${kind} ${list.join(', ')}`);
  }
  symbolParts.sort();

  const lines = [
    `Expression: ${describeNode(root)}`,
    `Nodes: ${insight.nodeCount} (${plural(insight.literalCount, 'literal')}, ${plural(
      insight.errorCount,
      'error',
    )})`,
    `Depth: ${insight.maxDepth}`,
    `Symbols: ${symbolParts.length > 0 ? symbolParts.join('; ') : 'none'}`,
    `Error: ${error ? formatExpressionError(error).summary : 'none'}`,
  ];
  return lines.join('\n');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
