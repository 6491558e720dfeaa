/**
 * numeval – Utils / validation
 *
 * Checks that go beyond what parsing and evaluation enforce on their own:
 *
 *  - `isValidIdentifier` / `isValidOperator` – whether a symbol name can be
 *    written in source text at all.
 *  - `validateSymbolTable` – lint a caller-supplied table before use.
 *  - `validateSourceExpression` – parse an expression and report every
 *    problem `evaluate()` would otherwise raise one at a time, without
 *    evaluating anything.
 *
 * Nothing here throws on invalid input; problems come back as issues.
 *
 * License: Apache-2.0
 */

import { measureDepth, traverse } from '../core/ast';
import { escapeIdentifier } from '../core/characters';
import { Cursor } from '../core/cursor';
import {
  defaultParser,
  normalizeExpressionOptions,
  type ExpressionOptions,
} from '../core/engine';
import type { ExpressionError } from '../core/errors';
import type { ParsedExpression } from '../core/parser';
import { createResolvers } from '../core/resolution';
import { scanEscapedIdentifier, scanIdentifier, scanOperator } from '../core/scanner';
import { createSymbolTable, type SymbolSource } from '../core/symbol-table';
import {
  describeSymbol,
  isOperatorSymbol,
  type ExpressionSymbol,
} from '../core/symbols';
import { MATH_SYMBOLS } from '../plugins/math';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning' | 'info';

/**
 * Single validation issue.
 */
export interface ValidationIssue {
  /**
   * Machine-readable code: an `ExpressionErrorCode` for problems the engine
   * itself would raise, or a `VAL_*` code for checks made here.
   */
  code: string;

  message: string;

  /**
   * - error   → the expression or table should be rejected
   * - warning → usable, but likely not what was meant
   * - info    → worth knowing
   */
  severity: IssueSeverity;

  /** The check that produced the issue, e.g. "parse" or "maxNodeCount". */
  rule: string;

  /** The symbol the issue is about, where there is one. */
  symbol?: ExpressionSymbol;

  meta?: Record<string, unknown>;
}

export interface ValidationResult {
  /** `issues.every(i => i.severity !== 'error')` */
  ok: boolean;
  issues: ValidationIssue[];
}

export interface ValidateSourceExpressionOptions extends ExpressionOptions {
  /** Maximum number of tree nodes. Exceeding it is an error. */
  maxNodeCount?: number;

  /** Symbol names that may not appear, whatever their kind. */
  forbiddenSymbols?: readonly string[];
}

export interface SourceExpressionStats {
  nodeCount: number;
  /** Tree depth; a single leaf has depth 1. */
  depth: number;
}

export interface SourceExpressionValidationResult extends ValidationResult {
  stats: SourceExpressionStats;
  parsed: ParsedExpression;
}

/////////////////////////////
// Name checks             //
/////////////////////////////

/**
 * Whether `name` scans back as a single identifier with the same name. Quoted
 * names (`` `my var` ``) are valid when their escaped form round-trips.
 */
export function isValidIdentifier(name: string): boolean {
  const cursor = Cursor.from(escapeIdentifier(name));
  const node = scanIdentifier(cursor) ?? scanEscapedIdentifier(cursor);
  return (
    node !== undefined &&
    node.type === 'Symbol' &&
    node.symbol.name === name &&
    cursor.isEmpty()
  );
}

const SYNTHESIZED_OPERATORS: ReadonlySet<string> = new Set(['()', '[]', '?:']);

// The parser always treats these as brackets, never as operators
const STRUCTURAL_TOKENS: ReadonlySet<string> = new Set(['(', '[']);

/**
 * Whether `name` scans back as a single operator token. The names the parser
 * synthesizes for calls, subscripts and the ternary are accepted as well.
 */
export function isValidOperator(name: string): boolean {
  if (SYNTHESIZED_OPERATORS.has(name)) {
    return true;
  }
  if (STRUCTURAL_TOKENS.has(name)) {
    return false;
  }
  const cursor = Cursor.from(name);
  const node = scanOperator(cursor);
  return (
    node !== undefined &&
    node.type === 'Symbol' &&
    node.symbol.name === name &&
    cursor.isEmpty()
  );
}

function ok(issues: readonly ValidationIssue[]): boolean {
  return issues.every((issue) => issue.severity !== 'error');
}

/////////////////////////////
// Symbol tables           //
/////////////////////////////

/**
 * Lint a symbol table:
 *
 *  - VAL_INVALID_NAME (error): the name cannot be written in an expression.
 *    Infix operators may also be word-like (`and`, `or`).
 *  - VAL_SHADOWS_BUILTIN (info): the entry replaces a built-in math symbol.
 */
export function validateSymbolTable(source: SymbolSource): ValidationResult {
  const issues: ValidationIssue[] = [];

  for (const symbol of createSymbolTable(source).symbols()) {
    if (!isValidName(symbol)) {
      issues.push({
        code: 'VAL_INVALID_NAME',
        rule: 'name',
        severity: 'error',
        message: `Invalid name for ${describeSymbol(symbol)}`,
        symbol,
      });
    }

    if (MATH_SYMBOLS.has(symbol)) {
      issues.push({
        code: 'VAL_SHADOWS_BUILTIN',
        rule: 'shadowing',
        severity: 'info',
        message: `${capitalize(describeSymbol(symbol))} replaces a built-in symbol`,
        symbol,
      });
    }
  }

  return { ok: ok(issues), issues };
}

function isValidName(symbol: ExpressionSymbol): boolean {
  if (isOperatorSymbol(symbol)) {
    return (
      isValidOperator(symbol.name) ||
      (symbol.kind === 'infix' && isValidIdentifier(symbol.name))
    );
  }
  // `[a, b]` array literals bind to a function named `[]`
  if (symbol.kind === 'function' && symbol.name === '[]') {
    return true;
  }
  return isValidIdentifier(symbol.name);
}

/////////////////////////////
// Source expressions      //
/////////////////////////////

/**
 * Parse `source` (with `options.parser`, or the shared parser) and report:
 *
 *  - every error leaf in the tree (rule "parse");
 *  - every symbol binding would fail to resolve, as the undefined-symbol or
 *    arity error `evaluate()` would raise (rule "resolve");
 *  - VAL_MAX_NODE_COUNT and VAL_SYMBOL_FORBIDDEN.
 *
 * No evaluator is called.
 */
export function validateSourceExpression(
  source: string,
  options: ValidateSourceExpressionOptions = {},
): SourceExpressionValidationResult {
  const { maxNodeCount, forbiddenSymbols = [], ...expressionOptions } = options;
  const parser = expressionOptions.parser ?? defaultParser;
  const parsed = parser.parse(source);
  const issues: ValidationIssue[] = [];

  let nodeCount = 0;
  traverse(parsed.root, {
    enter() {
      nodeCount++;
    },
    Error(node) {
      issues.push({
        ...fromError(node.error, 'parse'),
        meta: { source: node.source },
      });
    },
  });

  const { diagnose } = createResolvers(normalizeExpressionOptions(expressionOptions));
  const forbidden = new Set(forbiddenSymbols);

  for (const symbol of parsed.symbols) {
    if (forbidden.has(symbol.name)) {
      issues.push({
        code: 'VAL_SYMBOL_FORBIDDEN',
        rule: 'forbiddenSymbols',
        severity: 'error',
        message: `${capitalize(describeSymbol(symbol))} is not allowed`,
        symbol,
      });
      continue;
    }
    const error = diagnose(symbol);
    if (error) {
      issues.push({ ...fromError(error, 'resolve'), symbol });
    }
  }

  if (typeof maxNodeCount === 'number' && maxNodeCount >= 0 && nodeCount > maxNodeCount) {
    issues.push({
      code: 'VAL_MAX_NODE_COUNT',
      rule: 'maxNodeCount',
      severity: 'error',
      message: `Expression has ${nodeCount} nodes; the limit is ${maxNodeCount}`,
      meta: { nodeCount, maxNodeCount },
    });
  }

  return {
    ok: ok(issues),
    issues,
    stats: { nodeCount, depth: measureDepth(parsed.root) },
    parsed,
  };
}

function fromError(error: ExpressionError, rule: string): ValidationIssue {
  return {
    code: error.code,
    rule,
    severity: 'error',
    message: error.message,
  };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
