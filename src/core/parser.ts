/**
 * numeval – Parser core
 *
 * Turns source text into an expression tree using an operand/operator stack:
 * tokens are pushed as they are scanned, then `collapseStack` reduces the
 * stack using the precedence table in `operators.ts`.
 *
 * Operator tokens are classified by the whitespace around them:
 *
 *   a + b, a+b   infix    (space on both sides, or on neither)
 *   a -b         prefix   (space before only)
 *   a% b         postfix  (space after only)
 *
 * `(`, `[` and `,` are handled while scanning: `f(…)` becomes a function
 * node, `a[…]` an array node, `x(…)` / `x[…]` on any other operand become
 * the call / subscript operators `()` and `[]`, and `[…]` on its own is the
 * array-literal function `[]`.
 *
 * Failures do not propagate out of the public entry points. A bad argument
 * or parenthesized group becomes an `Error` leaf and its siblings still
 * parse; anything else turns the whole result into an `Error` leaf.
 *
 * License: Apache-2.0
 */

import {
  collectSymbols,
  describeNode,
  errorNode,
  firstError,
  isBareOperator,
  measureDepth,
  symbolNode,
  type ExpressionNode,
  type SymbolNode,
} from './ast';
import { Char } from './characters';
import { Cursor } from './cursor';
import {
  arityMismatchError,
  emptyExpressionError,
  isExpressionError,
  limitError,
  missingDelimiterError,
  unexpectedTokenError,
  type ExpressionError,
} from './errors';
import { takesPrecedenceOver } from './operators';
import {
  scanEscapedIdentifier,
  scanIdentifier,
  scanNumericLiteral,
  scanOperator,
} from './scanner';
import { exactly, sym, type ExpressionSymbol } from './symbols';

/////////////////////
// Public types    //
/////////////////////

export interface ParseLimits {
  /**
   * Maximum source length (UTF-16 code units). No limit when omitted.
   */
  maxExpressionLength?: number;
  /**
   * Maximum bracket nesting while parsing and maximum tree depth after.
   */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 1024;

/**
 * The result of parsing alone: a tree with no evaluators bound yet.
 */
export class ParsedExpression {
  readonly root: ExpressionNode;

  constructor(root: ExpressionNode) {
    this.root = root;
  }

  /**
   * Pretty-printed source. For invalid input this is the original text.
   */
  get description(): string {
    return describeNode(this.root);
  }

  /** Distinct symbols referenced by the tree. */
  get symbols(): readonly ExpressionSymbol[] {
    return collectSymbols(this.root);
  }

  /** The first error leaf found in the tree, if any. */
  get error(): ExpressionError | undefined {
    return firstError(this.root);
  }

  toString(): string {
    return this.description;
  }
}

/////////////////////
// Entry points    //
/////////////////////

/**
 * Parse a complete expression. Never throws: failures are embedded in the
 * tree, and a failure of the expression as a whole becomes an `Error` leaf
 * holding the entire source.
 */
export function parseExpression(
  source: string,
  limits: ParseLimits = {},
): ParsedExpression {
  const maxDepth = limits.maxDepth ?? DEFAULT_MAX_DEPTH;
  const maxLength = limits.maxExpressionLength;
  if (maxLength !== undefined && maxLength >= 0 && source.length > maxLength) {
    return new ParsedExpression(
      errorNode(limitError('maxExpressionLength', maxLength, source.length), source),
    );
  }

  const cursor = Cursor.from(source);
  let root: ExpressionNode;
  try {
    root = parseTokens(cursor, [], 0, maxDepth);
  } catch (err) {
    if (!isExpressionError(err)) throw err;
    root = errorNode(err, source);
  }
  return new ParsedExpression(checkDepth(root, source, maxDepth));
}

/**
 * Parse an expression embedded in a larger text, stopping (without
 * consuming) at the first of `delimiters` found in operator position.
 * `cursor` is left after the consumed text.
 *
 *   const cursor = Cursor.from('1 + 2} tail');
 *   parseSubExpression(cursor, ['}']).description; // "1 + 2"
 *   cursor.toString();                             // "} tail"
 */
export function parseSubExpression(
  cursor: Cursor,
  delimiters: readonly string[],
  limits: ParseLimits = {},
): ParsedExpression {
  const maxDepth = limits.maxDepth ?? DEFAULT_MAX_DEPTH;
  const start = cursor.mark();
  let root: ExpressionNode;
  try {
    root = parseTokens(cursor, delimiters, 0, maxDepth);
  } catch (err) {
    if (!isExpressionError(err)) throw err;
    root = errorNode(err, cursor.slice(start));
  }
  return new ParsedExpression(checkDepth(root, cursor.slice(start), maxDepth));
}

/**
 * Parse and throw the first embedded error, if any.
 */
export function parseOrThrow(
  source: string,
  limits: ParseLimits = {},
): ParsedExpression {
  const parsed = parseExpression(source, limits);
  const error = parsed.error;
  if (error) {
    throw error;
  }
  return parsed;
}

function checkDepth(
  root: ExpressionNode,
  source: string,
  maxDepth: number,
): ExpressionNode {
  if (root.type !== 'Symbol') {
    return root;
  }
  const depth = measureDepth(root);
  return depth > maxDepth
    ? errorNode(limitError('maxDepth', maxDepth, depth), source)
    : root;
}

/////////////////////
// Stack parser    //
/////////////////////

function scanToken(cursor: Cursor): ExpressionNode | undefined {
  return (
    scanNumericLiteral(cursor) ??
    scanIdentifier(cursor) ??
    scanOperator(cursor) ??
    scanEscapedIdentifier(cursor)
  );
}

function lastOf(stack: readonly ExpressionNode[]): ExpressionNode | undefined {
  return stack.length > 0 ? stack[stack.length - 1] : undefined;
}

/**
 * Parse up to a delimiter (or the end of input). Throws `ExpressionError`.
 */
function parseTokens(
  cursor: Cursor,
  delimiters: readonly string[],
  depth: number,
  maxDepth: number,
): ExpressionNode {
  if (depth > maxDepth) {
    throw limitError('maxDepth', maxDepth, depth);
  }

  const stack: ExpressionNode[] = [];

  const scanArguments = (closing: number): ExpressionNode[] => {
    const closingText = String.fromCodePoint(closing);
    const args: ExpressionNode[] = [];
    if (cursor.first() !== closing) {
      const argumentDelimiters = [',', closingText];
      do {
        try {
          args.push(parseEmbedded(cursor, argumentDelimiters, depth, maxDepth));
        } catch (err) {
          if (!isExpressionError(err) || !err.isEmptyExpression) throw err;
          // `f(,)` or `f(1,)`: report the token where the argument should be.
          // At the end of input there is none, and the missing `)` below
          // is reported instead.
          const token = cursor.scanCharacter();
          if (token !== undefined) {
            throw unexpectedTokenError(token);
          }
        }
      } while (cursor.scanCharacter(Char.Comma) !== undefined);
    }
    if (cursor.scanCharacter(closing) === undefined) {
      throw missingDelimiterError(closingText);
    }
    return args;
  };

  cursor.skipWhitespace();
  let operandPosition = true;
  let precededByWhitespace = true;
  // Consecutive operators nest, one tree level each
  let operatorRun = 0;
  const pushOperator = (node: ExpressionNode): void => {
    operatorRun += 1;
    if (operatorRun > maxDepth) {
      throw limitError('maxDepth', maxDepth, operatorRun);
    }
    stack.push(node);
  };

  while (!cursor.matchesDelimiter(delimiters)) {
    const tokenStart = cursor.mark();
    const token = scanToken(cursor);
    if (token === undefined) {
      break;
    }
    let followedByWhitespace = cursor.skipWhitespace() || cursor.isEmpty();
    const last = lastOf(stack);

    if (isBareOperator(token)) {
      const name = token.symbol.name;
      switch (name) {
        case '(': {
          if (last?.type === 'Symbol' && last.symbol.kind === 'variable') {
            const args = scanArguments(Char.CloseParen);
            stack[stack.length - 1] = symbolNode(
              sym.function(last.symbol.name, exactly(args.length)),
              args,
            );
          } else if (last !== undefined && !isBareOperator(last)) {
            const args = scanArguments(Char.CloseParen);
            stack[stack.length - 1] = symbolNode(sym.infix('()'), [last, ...args]);
          } else {
            const group = parseEmbedded(cursor, [')'], depth, maxDepth);
            if (cursor.scanCharacter(Char.CloseParen) === undefined) {
              throw missingDelimiterError(')');
            }
            // A failed group keeps its parentheses, so it prints as written
            stack.push(
              group.type === 'Error'
                ? errorNode(group.error, cursor.slice(tokenStart))
                : group,
            );
          }
          operandPosition = false;
          followedByWhitespace = cursor.skipWhitespace();
          break;
        }
        case ',': {
          if (last !== undefined && isBareOperator(last) && last.symbol.kind === 'infix') {
            // An infix operator directly before `,` has no right operand
            stack[stack.length - 1] = symbolNode(sym.postfix(last.symbol.name));
          }
          stack.push(token);
          operandPosition = true;
          followedByWhitespace = cursor.skipWhitespace();
          break;
        }
        case '[': {
          const args = scanArguments(Char.CloseBracket);
          if (last?.type === 'Symbol' && last.symbol.kind === 'variable') {
            if (args.length !== 1) {
              throw arityMismatchError(sym.array(last.symbol.name));
            }
            stack[stack.length - 1] = symbolNode(sym.array(last.symbol.name), args);
          } else if (last !== undefined && !isBareOperator(last)) {
            if (args.length !== 1) {
              throw arityMismatchError(sym.infix('[]'));
            }
            stack[stack.length - 1] = symbolNode(sym.infix('[]'), [last, args[0]]);
          } else {
            stack.push(symbolNode(sym.function('[]', exactly(args.length)), args));
          }
          operandPosition = false;
          followedByWhitespace = cursor.skipWhitespace();
          break;
        }
        default:
          if (precededByWhitespace === followedByWhitespace) {
            pushOperator(token);
          } else if (precededByWhitespace) {
            pushOperator(symbolNode(sym.prefix(name)));
          } else {
            pushOperator(symbolNode(sym.postfix(name)));
          }
          operandPosition = true;
          precededByWhitespace = followedByWhitespace;
          continue;
      }
    } else if (
      !operandPosition &&
      token.type === 'Symbol' &&
      token.symbol.kind === 'variable'
    ) {
      // An identifier where an operator is expected: `a and b`
      pushOperator(symbolNode(sym.infix(token.symbol.name)));
      operandPosition = true;
      precededByWhitespace = followedByWhitespace;
      continue;
    } else {
      stack.push(token);
      operandPosition = false;
    }

    operatorRun = 0;
    precededByWhitespace = followedByWhitespace;
  }

  const end = cursor.mark();
  if (!cursor.matchesDelimiter(delimiters)) {
    const junk = cursor.scanToEndOfToken();
    if (junk !== undefined) {
      cursor.reset(end);
      throw unexpectedTokenError(junk);
    }
  }

  collapseStack(stack);

  const [result, leftover] = stack;
  if (result === undefined) {
    throw emptyExpressionError();
  }
  if (isBareOperator(result)) {
    throw unexpectedTokenError(describeNode(result));
  }
  if (leftover !== undefined) {
    throw unexpectedTokenError(describeNode(leftover));
  }
  return result;
}

/**
 * Parse a bracketed argument or group. Failures that leave the cursor at
 * one of `delimiters` become an `Error` leaf holding the fragment; an empty
 * expression, a limit violation or a failure mid-fragment is rethrown.
 */
function parseEmbedded(
  cursor: Cursor,
  delimiters: readonly string[],
  depth: number,
  maxDepth: number,
): ExpressionNode {
  const start = cursor.mark();
  try {
    return parseTokens(cursor, delimiters, depth + 1, maxDepth);
  } catch (err) {
    if (
      !isExpressionError(err) ||
      err.isEmptyExpression ||
      err.code === 'E_LIMIT' ||
      !cursor.matchesDelimiter(delimiters)
    ) {
      throw err;
    }
    const fragment = cursor.slice(start).replace(/^[ \t\n\r]+|[ \t\n\r]+$/g, '');
    return errorNode(err, fragment);
  }
}

/////////////////////
// Stack collapse  //
/////////////////////

/**
 * Reduce the token stack in place. Each step rewrites the stack and either
 * restarts from the bottom or moves right, so the loop ends when no slot
 * pair can be reduced any further.
 */
function collapseStack(stack: ExpressionNode[]): void {
  let i = 0;
  // Steps taken into a run of nested prefix operators. Reducing inside the
  // run only changes the slot to its right, so the walk resumes one step
  // back instead of from the bottom.
  let prefixRun = 0;
  for (;;) {
    if (stack.length <= i + 1) {
      return;
    }
    const lhs = stack[i];
    const rhs = stack[i + 1];

    if (isBareOperator(lhs)) {
      if (isBareOperator(rhs)) {
        // Nested prefix operators: reduce the right-hand one first
        i += 1;
        prefixRun += 1;
      } else {
        stack.splice(i, 2, symbolNode(sym.prefix(lhs.symbol.name), [rhs]));
        if (prefixRun > 0) {
          i -= 1;
          prefixRun -= 1;
        } else {
          i = 0;
        }
      }
      continue;
    }
    prefixRun = 0;

    if (!isBareOperator(rhs)) {
      // Two operands in a row. Only valid if the left one was a postfix
      // operator that is really infix: `a% b` read as `a % b`.
      if (lhs.type === 'Symbol' && lhs.symbol.kind === 'postfix') {
        stack.splice(i, 1, lhs.args[0], symbolNode(sym.infix(lhs.symbol.name)));
        continue;
      }
      throw unexpectedTokenError(describeNode(rhs));
    }

    const op = rhs.symbol;
    if (stack.length <= i + 2 || op.kind === 'postfix') {
      stack.splice(i, 2, symbolNode(sym.postfix(op.name), [lhs]));
      i = 0;
      continue;
    }

    const next = stack[i + 2];
    if (!isBareOperator(next)) {
      if (stack.length > i + 3) {
        const following = stack[i + 3];
        if (
          !isBareOperator(following) ||
          following.symbol.kind !== 'infix' ||
          !takesPrecedenceOver(op.name, following.symbol.name)
        ) {
          i += 2;
          continue;
        }
      }
      stack.splice(i, 3, combine(op.name, lhs, next));
      i = 0;
      continue;
    }

    if (next.symbol.kind === 'prefix') {
      i += 2;
    } else if (op.name === '+' || op.name === '/' || op.name === '*') {
      // `a + -b`: the second operator is prefix
      stack[i + 2] = symbolNode(sym.prefix(next.symbol.name));
      i += 2;
    } else {
      // `a! + b`: the first operator is postfix
      stack[i + 1] = symbolNode(sym.postfix(op.name));
    }
  }
}

function combine(
  name: string,
  lhs: ExpressionNode,
  rhs: ExpressionNode,
): SymbolNode {
  if (
    name === ':' &&
    lhs.type === 'Symbol' &&
    lhs.symbol.kind === 'infix' &&
    lhs.symbol.name === '?' &&
    lhs.args.length === 2
  ) {
    return symbolNode(sym.infix('?:'), [lhs.args[0], lhs.args[1], rhs]);
  }
  return symbolNode(sym.infix(name), [lhs, rhs]);
}
