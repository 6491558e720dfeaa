/**
 * numeval – Error types & helpers
 *
 * One error class (`ExpressionError`) is used for parse, bind and evaluation
 * failures. Each error carries a stable `code` for programmatic handling and
 * a structured `detail` payload; `message` is the human rendering.
 *
 * Parse and bind errors are not thrown while a tree is being built. They are
 * stored in the tree (as `Error` leaves or always-throwing evaluators) and
 * surface from `Expression.evaluate()` or `parseOrThrow()`.
 *
 *   throw unexpectedTokenError('*');
 *   throw arityMismatchError(sym.function('sqrt', 1));
 *
 * License: Apache-2.0
 */

import {
  describeArity,
  describeSymbol,
  expectedArity,
  symbolsEqual,
  type ExpressionSymbol,
} from './symbols';

//////////////////////
// Error codes      //
//////////////////////

export type ExpressionErrorCode =
  /** Application-specific error raised by a symbol evaluator. */
  | 'E_MESSAGE'
  /** The parser met text it could not use (including an empty expression). */
  | 'E_UNEXPECTED_TOKEN'
  /** A closing delimiter such as `)` never appeared. */
  | 'E_MISSING_DELIMITER'
  /** No evaluator is bound for a variable, operator, function or array. */
  | 'E_UNDEFINED_SYMBOL'
  /** A function or operator was applied to the wrong number of arguments. */
  | 'E_ARITY_MISMATCH'
  /** An array was read at a non-integral or out-of-range index. */
  | 'E_ARRAY_BOUNDS'
  /** Source length or nesting depth exceeded a configured limit. */
  | 'E_LIMIT';

export type LimitName = 'maxExpressionLength' | 'maxDepth';

export type ExpressionErrorDetail =
  | { readonly kind: 'message'; readonly text: string }
  | { readonly kind: 'unexpectedToken'; readonly token: string }
  | { readonly kind: 'missingDelimiter'; readonly delimiter: string }
  | { readonly kind: 'undefinedSymbol'; readonly symbol: ExpressionSymbol }
  | { readonly kind: 'arityMismatch'; readonly symbol: ExpressionSymbol }
  | {
      readonly kind: 'arrayBounds';
      readonly symbol: ExpressionSymbol;
      readonly index: number;
    }
  | {
      readonly kind: 'limit';
      readonly limit: LimitName;
      readonly max: number;
      readonly actual: number;
    };

export type ExpressionErrorKind = ExpressionErrorDetail['kind'];

const CODES: Readonly<Record<ExpressionErrorKind, ExpressionErrorCode>> = {
  message: 'E_MESSAGE',
  unexpectedToken: 'E_UNEXPECTED_TOKEN',
  missingDelimiter: 'E_MISSING_DELIMITER',
  undefinedSymbol: 'E_UNDEFINED_SYMBOL',
  arityMismatch: 'E_ARITY_MISMATCH',
  arrayBounds: 'E_ARRAY_BOUNDS',
  limit: 'E_LIMIT',
};

/**
 * Error raised by parsing, binding or evaluating an expression.
 */
export class ExpressionError extends Error {
  public override readonly name = 'ExpressionError';
  public readonly code: ExpressionErrorCode;
  public readonly detail: ExpressionErrorDetail;

  constructor(detail: ExpressionErrorDetail, options?: { cause?: unknown }) {
    super(renderMessage(detail), options);

    // Fix prototype chain for `instanceof` when compiled to ES5-style classes
    Object.setPrototypeOf(this, new.target.prototype);

    this.code = CODES[detail.kind];
    this.detail = detail;
  }

  /** True for the error raised by an expression with no tokens. */
  get isEmptyExpression(): boolean {
    return this.detail.kind === 'unexpectedToken' && this.detail.token === '';
  }
}

/**
 * Type guard for ExpressionError.
 */
export function isExpressionError(err: unknown): err is ExpressionError {
  return err instanceof ExpressionError;
}

/**
 * Structural equality of two errors (same kind and payload).
 */
export function errorsEqual(a: ExpressionError, b: ExpressionError): boolean {
  const x = a.detail;
  const y = b.detail;
  switch (x.kind) {
    case 'message':
      return y.kind === 'message' && x.text === y.text;
    case 'unexpectedToken':
      return y.kind === 'unexpectedToken' && x.token === y.token;
    case 'missingDelimiter':
      return y.kind === 'missingDelimiter' && x.delimiter === y.delimiter;
    case 'undefinedSymbol':
      return y.kind === 'undefinedSymbol' && symbolsEqual(x.symbol, y.symbol);
    case 'arityMismatch':
      return y.kind === 'arityMismatch' && symbolsEqual(x.symbol, y.symbol);
    case 'arrayBounds':
      return (
        y.kind === 'arrayBounds' &&
        symbolsEqual(x.symbol, y.symbol) &&
        Object.is(x.index, y.index)
      );
    case 'limit':
      return (
        y.kind === 'limit' &&
        x.limit === y.limit &&
        x.max === y.max &&
        x.actual === y.actual
      );
  }
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

/** Application-specific error, for use inside symbol evaluators. */
export function messageError(text: string): ExpressionError {
  return new ExpressionError({ kind: 'message', text });
}

export function unexpectedTokenError(token: string): ExpressionError {
  return new ExpressionError({ kind: 'unexpectedToken', token });
}

/** An unexpected token of `""`. */
export function emptyExpressionError(): ExpressionError {
  return unexpectedTokenError('');
}

export function missingDelimiterError(delimiter: string): ExpressionError {
  return new ExpressionError({ kind: 'missingDelimiter', delimiter });
}

export function undefinedSymbolError(symbol: ExpressionSymbol): ExpressionError {
  return new ExpressionError({ kind: 'undefinedSymbol', symbol });
}

/**
 * `symbol` carries the expected arity (for functions) so the message can
 * name it: `Function sqrt() expects 1 argument`.
 */
export function arityMismatchError(symbol: ExpressionSymbol): ExpressionError {
  return new ExpressionError({ kind: 'arityMismatch', symbol });
}

export function arrayBoundsError(
  symbol: ExpressionSymbol,
  index: number,
): ExpressionError {
  return new ExpressionError({ kind: 'arrayBounds', symbol, index });
}

export function limitError(
  limit: LimitName,
  max: number,
  actual: number,
): ExpressionError {
  return new ExpressionError({ kind: 'limit', limit, max, actual });
}

/////////////////////////////
// Message rendering       //
/////////////////////////////

/**
 * Render a number the way the pretty-printer does: integers without a
 * fractional part.
 */
export function stringifyNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

function renderMessage(detail: ExpressionErrorDetail): string {
  switch (detail.kind) {
    case 'message':
      return detail.text;
    case 'unexpectedToken':
      return detail.token === ''
        ? 'Empty expression'
        : `Unexpected token \`${detail.token}\``;
    case 'missingDelimiter':
      return `Missing \`${detail.delimiter}\``;
    case 'undefinedSymbol':
      return `Undefined ${describeSymbol(detail.symbol)}`;
    case 'arityMismatch': {
      const description = describeSymbol(detail.symbol);
      const arity = describeArity(expectedArity(detail.symbol));
      return `${description.charAt(0).toUpperCase()}${description.slice(1)} expects ${arity}`;
    }
    case 'arrayBounds':
      return `Index ${stringifyNumber(detail.index)} out of bounds for ${describeSymbol(detail.symbol)}`;
    case 'limit':
      return detail.limit === 'maxExpressionLength'
        ? `Expression length ${detail.actual} exceeds the maximum of ${detail.max}`
        : `Expression nesting depth exceeds the maximum of ${detail.max}`;
  }
}
