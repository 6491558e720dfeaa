/**
 * numeval – AST
 *
 * The expression tree is a small discriminated union on `node.type`:
 *
 *  - `Literal`  – a number.
 *  - `Symbol`   – a variable, operator, function or array reference applied
 *                 to zero or more argument nodes, plus the evaluator bound to
 *                 it by the optimizer (absent straight after parsing).
 *  - `Error`    – a parse failure kept in the tree as a leaf, together with
 *                 the source fragment it came from.
 *
 * Nodes are frozen on construction. Binding and folding build new nodes.
 *
 * License: Apache-2.0
 */

import { Char, isOperatorCharacter } from './characters';
import type { ExpressionError } from './errors';
import { stringifyNumber } from './errors';
import { operatorPrecedence, takesPrecedenceOver } from './operators';
import {
  escapedName,
  isOperatorSymbol,
  symbolKey,
  symbolsEqual,
  type ExpressionSymbol,
  type OperatorSymbol,
} from './symbols';

/**
 * Computes a symbol's value from its already-evaluated arguments.
 * May throw (typically an `ExpressionError`).
 */
export type SymbolEvaluator = (args: readonly number[]) => number;

//////////////////////
// Node types       //
//////////////////////

export type NodeType = 'Literal' | 'Symbol' | 'Error';

export interface LiteralNode {
  readonly type: 'Literal';
  readonly value: number;
}

export interface SymbolNode {
  readonly type: 'Symbol';
  readonly symbol: ExpressionSymbol;
  readonly args: readonly ExpressionNode[];
  /** Set once by the optimizer; absent on parsed trees. */
  readonly evaluator?: SymbolEvaluator;
}

export interface ErrorNode {
  readonly type: 'Error';
  readonly error: ExpressionError;
  /** The offending source fragment, printed verbatim. */
  readonly source: string;
}

export type ExpressionNode = LiteralNode | SymbolNode | ErrorNode;

/** An operator token that has not been applied to anything yet. */
export interface OperatorNode extends SymbolNode {
  readonly symbol: OperatorSymbol;
}

//////////////////////
// Constructors     //
//////////////////////

export function literalNode(value: number): LiteralNode {
  const node: LiteralNode = { type: 'Literal', value };
  return Object.freeze(node);
}

export function symbolNode(
  symbol: ExpressionSymbol,
  args: readonly ExpressionNode[] = [],
  evaluator?: SymbolEvaluator,
): SymbolNode {
  const frozenArgs = Object.freeze([...args]);
  const node: SymbolNode = evaluator
    ? { type: 'Symbol', symbol, args: frozenArgs, evaluator }
    : { type: 'Symbol', symbol, args: frozenArgs };
  return Object.freeze(node);
}

export function errorNode(error: ExpressionError, source: string): ErrorNode {
  const node: ErrorNode = { type: 'Error', error, source };
  return Object.freeze(node);
}

//////////////////////
// Guards           //
//////////////////////

export function isLiteral(node: ExpressionNode): node is LiteralNode {
  return node.type === 'Literal';
}

export function isSymbolNode(node: ExpressionNode): node is SymbolNode {
  return node.type === 'Symbol';
}

export function isErrorNode(node: ExpressionNode): node is ErrorNode {
  return node.type === 'Error';
}

/**
 * A bare infix/prefix/postfix token with no arguments.
 */
export function isBareOperator(node: ExpressionNode): node is OperatorNode {
  return (
    node.type === 'Symbol' &&
    node.args.length === 0 &&
    isOperatorSymbol(node.symbol)
  );
}

/**
 * Whether the node can stand where a value is expected: literals, error
 * leaves, applied symbols and variable/function/array references.
 */
export function isOperand(node: ExpressionNode): boolean {
  return !isBareOperator(node);
}

/**
 * An applied symbol node of the given operator kind, optionally with a
 * specific name.
 */
function isApplied(
  node: ExpressionNode,
  kind: OperatorSymbol['kind'],
  name?: string,
): node is OperatorNode {
  return (
    node.type === 'Symbol' &&
    node.symbol.kind === kind &&
    (name === undefined || node.symbol.name === name)
  );
}

///////////////////////////////
// Traversal / visitor utils //
///////////////////////////////

/**
 * Returning `"skip"` from `enter` skips the children of that node;
 * `"break"` aborts the whole traversal.
 */
export type VisitResult = void | 'skip' | 'break';

export interface Visitor {
  enter?(node: ExpressionNode, parent: SymbolNode | null): VisitResult;
  leave?(node: ExpressionNode, parent: SymbolNode | null): void;

  Literal?(node: LiteralNode, parent: SymbolNode | null): VisitResult;
  Symbol?(node: SymbolNode, parent: SymbolNode | null): VisitResult;
  Error?(node: ErrorNode, parent: SymbolNode | null): VisitResult;
}

/**
 * Depth-first, pre-order traversal.
 */
export function traverse(root: ExpressionNode, visitor: Visitor): void {
  walk(root, null, visitor);
}

function walk(
  node: ExpressionNode,
  parent: SymbolNode | null,
  visitor: Visitor,
): 'break' | void {
  const genericEnter = visitor.enter?.(node, parent);
  if (genericEnter === 'break') return 'break';
  if (genericEnter === 'skip') return;

  let specificEnter: VisitResult;
  switch (node.type) {
    case 'Literal':
      specificEnter = visitor.Literal?.(node, parent);
      break;
    case 'Symbol':
      specificEnter = visitor.Symbol?.(node, parent);
      break;
    case 'Error':
      specificEnter = visitor.Error?.(node, parent);
      break;
  }
  if (specificEnter === 'break') return 'break';
  if (specificEnter === 'skip') return;

  if (node.type === 'Symbol') {
    for (const arg of node.args) {
      if (walk(arg, node, visitor) === 'break') return 'break';
    }
  }

  visitor.leave?.(node, parent);
}

/**
 * Depth of the tree (a single leaf has depth 1). Iterative, so it is safe
 * to call on trees that have not been depth-checked yet.
 */
export function measureDepth(root: ExpressionNode): number {
  let max = 0;
  const pending: Array<[ExpressionNode, number]> = [[root, 1]];
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const [node, depth] = entry;
    if (depth > max) max = depth;
    if (node.type === 'Symbol') {
      for (const arg of node.args) {
        pending.push([arg, depth + 1]);
      }
    }
  }
  return max;
}

/**
 * The first error leaf in depth-first order.
 */
export function firstError(root: ExpressionNode): ExpressionError | undefined {
  let found: ExpressionError | undefined;
  traverse(root, {
    Error(node) {
      found = node.error;
      return 'break';
    },
  });
  return found;
}

/**
 * Distinct symbols reachable from `root`, in first-seen order.
 */
export function collectSymbols(root: ExpressionNode): readonly ExpressionSymbol[] {
  const buckets = new Map<string, ExpressionSymbol[]>();
  const result: ExpressionSymbol[] = [];
  traverse(root, {
    Symbol(node) {
      const key = symbolKey(node.symbol);
      const bucket = buckets.get(key) ?? [];
      if (!bucket.some((existing) => symbolsEqual(existing, node.symbol))) {
        bucket.push(node.symbol);
        buckets.set(key, bucket);
        result.push(node.symbol);
      }
    },
  });
  return result;
}

//////////////////////
// Pretty-printing  //
//////////////////////

/**
 * Render a node as source text with the fewest parentheses that still
 * re-parse to the same tree. Error leaves print their original source.
 */
export function describeNode(node: ExpressionNode): string {
  switch (node.type) {
    case 'Literal':
      return describeLiteral(node.value);
    case 'Error':
      return node.source;
    case 'Symbol':
      return describeSymbolNode(node);
  }
}

function describeSymbolNode(node: SymbolNode): string {
  const { symbol, args } = node;
  if (isBareOperator(node)) {
    return escapedName(symbol);
  }
  const name = escapedName(symbol);

  switch (symbol.kind) {
    case 'prefix': {
      const arg = args[0];
      const description = describeNode(arg);
      return requiresParens(arg, name, description, 'prefix')
        ? `${name}(${description})`
        : `${name}${description}`;
    }
    case 'postfix': {
      const arg = args[0];
      const description = describeNode(arg);
      return requiresParens(arg, description, name, 'postfix')
        ? `(${description})${name}`
        : `${description}${name}`;
    }
    case 'infix':
      return describeInfix(node);
    case 'variable':
      return name;
    case 'function':
      return symbol.name === '[]'
        ? `[${describeArguments(args)}]`
        : `${name}(${describeArguments(args)})`;
    case 'array':
      return `${name}[${describeArguments(args)}]`;
  }
}

/**
 * Folding can produce values with no literal syntax; those print as a
 * division that evaluates back to them.
 */
function describeLiteral(value: number): string {
  if (Number.isNaN(value)) {
    return '(0 / 0)';
  }
  if (value === Infinity) {
    return '(1 / 0)';
  }
  if (value === -Infinity) {
    return '(-1 / 0)';
  }
  return stringifyNumber(value);
}

function describeInfix(node: SymbolNode): string {
  const { symbol, args } = node;
  const name = symbol.name;

  switch (name) {
    case ',':
      return `${describeNode(args[0])}, ${describeNode(args[1])}`;
    case '[]':
      return `${describeCallee(args[0])}[${describeNode(args[1])}]`;
    case '()':
      return `${describeCallee(args[0])}(${describeArguments(args.slice(1))})`;
    case '?:':
      if (args.length === 3) {
        const [condition, whenTrue, whenFalse] = args.map(describeTernaryOperand);
        return `${condition} ? ${whenTrue} : ${whenFalse}`;
      }
      break;
  }

  const [lhs, rhs] = args;
  const lhsDescription =
    isGroupingInfix(lhs) && !takesPrecedenceOver(lhs.symbol.name, name)
      ? `(${describeNode(lhs)})`
      : describeNode(lhs);
  const rhsDescription =
    isGroupingInfix(rhs) && takesPrecedenceOver(name, rhs.symbol.name)
      ? `(${describeNode(rhs)})`
      : describeNode(rhs);
  return `${lhsDescription} ${escapedName(symbol)} ${rhsDescription}`;
}

/**
 * A ternary operand, grouped when it is itself a ternary or an infix that
 * binds no tighter than `?` and `:`.
 */
function describeTernaryOperand(node: ExpressionNode): string {
  const description = describeNode(node);
  const group =
    isGroupingInfix(node) &&
    (node.symbol.name === '?:' ||
      operatorPrecedence(node.symbol.name).precedence <= operatorPrecedence('?').precedence);
  return group ? `(${description})` : description;
}

function describeArguments(args: readonly ExpressionNode[]): string {
  return args
    .map((arg) =>
      isApplied(arg, 'infix', ',') ? `(${describeNode(arg)})` : describeNode(arg),
    )
    .join(', ');
}

/** The left side of `x(…)` or `x[…]`. */
function describeCallee(node: ExpressionNode): string {
  const description = describeNode(node);
  const wrap =
    (node.type === 'Error' && !isParenthesized(node)) ||
    isApplied(node, 'prefix') ||
    isApplied(node, 'postfix') ||
    isGroupingInfix(node);
  return wrap ? `(${description})` : description;
}

/**
 * Infix nodes whose printed form depends on precedence. Subscript and call
 * nodes print as postfix brackets and never need grouping.
 */
function isGroupingInfix(node: ExpressionNode | undefined): node is OperatorNode {
  return (
    node !== undefined &&
    isApplied(node, 'infix') &&
    node.symbol.name !== '[]' &&
    node.symbol.name !== '()'
  );
}

function requiresParens(
  arg: ExpressionNode,
  left: string,
  right: string,
  position: 'prefix' | 'postfix',
): boolean {
  switch (arg.type) {
    case 'Error':
      return !isParenthesized(arg);
    case 'Literal':
      // `-` followed by `-2` would scan as the operator `--`
      return position === 'prefix' && needsSeparation(left, right);
    case 'Symbol':
      return (
        isApplied(arg, 'infix') ||
        isApplied(arg, 'postfix') ||
        needsSeparation(left, right)
      );
  }
}

/** An error leaf from a failed `( … )` group, which prints with its parentheses. */
function isParenthesized(node: ErrorNode): boolean {
  return node.source.startsWith('(') && node.source.endsWith(')');
}

function needsSeparation(lhs: string, rhs: string): boolean {
  const last = lhs.codePointAt(lastCodePointIndex(lhs));
  const first = rhs.codePointAt(0);
  if (last === undefined || first === undefined) {
    return false;
  }
  return last === Char.Dot || isOperatorLike(last) === isOperatorLike(first);
}

function isOperatorLike(c: number): boolean {
  return isOperatorCharacter(c) || c === Char.Minus;
}

function lastCodePointIndex(text: string): number {
  if (text.length >= 2) {
    const low = text.charCodeAt(text.length - 1);
    if (low >= 0xdc00 && low <= 0xdfff) {
      return text.length - 2;
    }
  }
  return text.length - 1;
}
