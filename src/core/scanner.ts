/**
 * numeval – Scanner
 *
 * Token scanners used by the parser. Each one either consumes a token from
 * the cursor and returns it as an AST node, or returns `undefined` and leaves
 * the cursor unmoved. Malformed tokens come back as `Error` leaves so the
 * parser can keep going.
 *
 *  - numeric literals: `42`, `3.14`, `.5`, `1e-3`, `0xFF`
 *  - identifiers:      `x`, `$total`, `user.age`, `f'`
 *  - operators:        `+`, `<=`, `-=`, `..<`, and the structural `(`, `[`, `,`
 *  - quoted names:     `` `my var` ``, `'x\ty'`, `"\u{1F600}"`
 *
 * Every operator token is returned as an infix symbol; the parser decides
 * whether it is really prefix or postfix.
 *
 * License: Apache-2.0
 */

import {
  Char,
  isDigit,
  isHexDigit,
  isIdentifierCharacter,
  isIdentifierHead,
  isOperatorCharacter,
  isQuote,
} from './characters';
import type { Cursor } from './cursor';
import {
  errorNode,
  literalNode,
  symbolNode,
  type ExpressionNode,
} from './ast';
import {
  missingDelimiterError,
  unexpectedTokenError,
  type ExpressionError,
} from './errors';
import { sym } from './symbols';

const LOWER_X = 0x78;
const LOWER_E = 0x65;
const UPPER_E = 0x45;
const PLUS = 0x2b;
const MAX_CODE_POINT = 0x10ffff;

/////////////////////
// Numbers         //
/////////////////////

export function scanNumericLiteral(cursor: Cursor): ExpressionNode | undefined {
  const text = scanNumber(cursor);
  if (text === undefined) {
    return undefined;
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    return errorNode(unexpectedTokenError(text), text);
  }
  return literalNode(value);
}

function scanNumber(cursor: Cursor): string | undefined {
  let endOfInteger = cursor.mark();
  let number: string;

  const integer = cursor.scanCharacters(isDigit);
  if (integer !== undefined) {
    if (integer === '0' && cursor.scanCharacter(LOWER_X) !== undefined) {
      return `0x${cursor.scanCharacters(isHexDigit) ?? ''}`;
    }
    endOfInteger = cursor.mark();
    if (cursor.scanCharacter(Char.Dot) !== undefined) {
      const fraction = cursor.scanCharacters(isDigit);
      if (fraction === undefined) {
        // `1.` is the integer 1 followed by a `.`
        cursor.reset(endOfInteger);
        return integer;
      }
      number = `${integer}.${fraction}`;
    } else {
      number = integer;
    }
  } else if (cursor.scanCharacter(Char.Dot) !== undefined) {
    const fraction = cursor.scanCharacters(isDigit);
    if (fraction === undefined) {
      cursor.reset(endOfInteger);
      return undefined;
    }
    number = `.${fraction}`;
  } else {
    return undefined;
  }

  return number + (scanExponent(cursor) ?? '');
}

function scanExponent(cursor: Cursor): string | undefined {
  const start = cursor.mark();
  const e = cursor.scanCharacter((c) => c === LOWER_E || c === UPPER_E);
  if (e !== undefined) {
    const sign = cursor.scanCharacter((c) => c === Char.Minus || c === PLUS) ?? '';
    const digits = cursor.scanCharacters(isDigit);
    if (digits !== undefined) {
      return e + sign + digits;
    }
  }
  cursor.reset(start);
  return undefined;
}

/////////////////////
// Identifiers     //
/////////////////////

/**
 * Scan a plain identifier. Internal dots are part of the name (`a.b.c`),
 * a trailing dot is not, and a single `'` may follow (`x'`).
 */
export function scanIdentifier(cursor: Cursor): ExpressionNode | undefined {
  let start = cursor.mark();
  let identifier: string;

  if (cursor.scanCharacter(Char.Dot) !== undefined) {
    identifier = '.';
  } else {
    const head = cursor.scanCharacter(isIdentifierHead);
    if (head === undefined) {
      return undefined;
    }
    identifier = head;
    start = cursor.mark();
    if (cursor.scanCharacter(Char.Dot) !== undefined) {
      identifier += '.';
    }
  }

  for (
    let tail = cursor.scanCharacters(isIdentifierCharacter);
    tail !== undefined;
    tail = cursor.scanCharacters(isIdentifierCharacter)
  ) {
    identifier += tail;
    start = cursor.mark();
    if (cursor.scanCharacter(Char.Dot) !== undefined) {
      identifier += '.';
    }
  }

  if (identifier.endsWith('.')) {
    cursor.reset(start);
    if (identifier === '.') {
      return undefined;
    }
    identifier = identifier.slice(0, -1);
  } else if (cursor.scanCharacter(Char.SingleQuote) !== undefined) {
    identifier += "'";
  }

  return symbolNode(sym.variable(identifier));
}

/////////////////////
// Operators       //
/////////////////////

function isStructural(c: number): boolean {
  return c === Char.OpenParen || c === Char.OpenBracket || c === Char.Comma;
}

export function scanOperator(cursor: Cursor): ExpressionNode | undefined {
  const lead =
    cursor.scanCharacters((c) => c === Char.Dot) ??
    cursor.scanCharacters((c) => c === Char.Minus);
  if (lead !== undefined) {
    const tail = cursor.scanCharacters(isOperatorCharacter) ?? '';
    return symbolNode(sym.infix(lead + tail));
  }
  const op =
    cursor.scanCharacters(isOperatorCharacter) ?? cursor.scanCharacter(isStructural);
  return op === undefined ? undefined : symbolNode(sym.infix(op));
}

//////////////////////////
// Quoted identifiers   //
//////////////////////////

/**
 * Scan a name delimited by `` ` ``, `'` or `"`. The resulting symbol name
 * keeps both delimiters; escapes are resolved. `escapeIdentifier` in
 * `characters.ts` is the inverse and must be kept in sync.
 */
export function scanEscapedIdentifier(cursor: Cursor): ExpressionNode | undefined {
  const delimiter = cursor.first();
  if (delimiter === undefined || !isQuote(delimiter)) {
    return undefined;
  }
  const start = cursor.mark();
  cursor.popFirst();
  const quote = String.fromCodePoint(delimiter);
  let name = quote;

  const fail = (error: ExpressionError): ExpressionNode =>
    errorNode(error, cursor.slice(start));

  for (;;) {
    name += cursor.scanCharacters((c) => c !== delimiter && c !== Char.Backslash) ?? '';
    if (cursor.scanCharacter(Char.Backslash) === undefined) {
      break;
    }
    const c = cursor.popFirst();
    if (c === undefined) {
      break;
    }
    switch (c) {
      case Char.Zero:
        name += '\0';
        break;
      case 0x74: // t
        name += '\t';
        break;
      case 0x6e: // n
        name += '\n';
        break;
      case 0x72: // r
        name += '\r';
        break;
      default:
        if (c === 0x75 /* u */ && cursor.scanCharacter(Char.OpenBrace) !== undefined) {
          const hex = cursor.scanCharacters(isHexDigit) ?? '';
          if (cursor.scanCharacter(Char.CloseBrace) === undefined) {
            const junk = cursor.scanToEndOfToken();
            return fail(
              junk === undefined
                ? missingDelimiterError('}')
                : unexpectedTokenError(junk),
            );
          }
          if (hex === '') {
            return fail(unexpectedTokenError('}'));
          }
          const codePoint = parseInt(hex, 16);
          if (codePoint > MAX_CODE_POINT || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
            return fail(unexpectedTokenError(hex));
          }
          name += String.fromCodePoint(codePoint);
        } else {
          name += String.fromCodePoint(c);
        }
    }
  }

  if (cursor.scanCharacter(delimiter) === undefined) {
    return fail(
      name === quote ? unexpectedTokenError(name) : missingDelimiterError(quote),
    );
  }
  return symbolNode(sym.variable(name + quote));
}
