/**
 * numeval – Operator precedence
 *
 * Static precedence/associativity table shared by the parser (stack
 * collapse) and the pretty-printer (parenthesization). Unlisted operators
 * (`+`, `-`, `|`, `^`, …) have precedence 0 and associate to the left.
 *
 * License: Apache-2.0
 */

export interface OperatorPrecedence {
  readonly precedence: number;
  readonly rightAssociative: boolean;
}

const DEFAULT_PRECEDENCE: OperatorPrecedence = {
  precedence: 0,
  rightAssociative: false,
};

const LEFT_ASSOCIATIVE: Readonly<Record<string, number>> = {
  '[]': 100,
  // bit shift
  '<<': 2,
  '>>': 2,
  '>>>': 2,
  // multiplication
  '*': 1,
  '/': 1,
  '%': 1,
  '&': 1,
  // range formation
  '..': -1,
  '...': -1,
  '..<': -1,
  // casting
  is: -2,
  as: -2,
  isa: -2,
  // null-coalescing
  '??': -3,
  '?:': -3,
  // logical
  '&&': -5,
  and: -5,
  '||': -6,
  or: -6,
  // ternary
  '?': -7,
  ':': -7,
  ',': -100,
};

const COMPARISON_OPERATORS = [
  '<', '<=', '>=', '>',
  '==', '!=', '<>', '===', '!==',
  'lt', 'le', 'lte', 'gt', 'ge', 'gte', 'eq', 'ne',
] as const;

const ASSIGNMENT_OPERATORS = [
  '=', '*=', '/=', '%=', '+=', '-=',
  '<<=', '>>=', '&=', '^=', '|=', ':=',
] as const;

const PRECEDENCE_TABLE: ReadonlyMap<string, OperatorPrecedence> = new Map<
  string,
  OperatorPrecedence
>([
  ...Object.entries(LEFT_ASSOCIATIVE).map(
    ([name, precedence]) => [name, { precedence, rightAssociative: false }] as const,
  ),
  ...COMPARISON_OPERATORS.map(
    (name) => [name, { precedence: -4, rightAssociative: true }] as const,
  ),
  ...ASSIGNMENT_OPERATORS.map(
    (name) => [name, { precedence: -8, rightAssociative: true }] as const,
  ),
]);

export function operatorPrecedence(name: string): OperatorPrecedence {
  return PRECEDENCE_TABLE.get(name) ?? DEFAULT_PRECEDENCE;
}

/**
 * Whether `lhs` binds tighter than `rhs` when they meet as `a lhs b rhs c`.
 * Equal precedence falls back to the associativity of `lhs`.
 */
export function takesPrecedenceOver(lhs: string, rhs: string): boolean {
  const left = operatorPrecedence(lhs);
  const right = operatorPrecedence(rhs);
  if (left.precedence === right.precedence) {
    return !left.rightAssociative;
  }
  return left.precedence > right.precedence;
}
