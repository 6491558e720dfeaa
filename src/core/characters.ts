/**
 * numeval – Character classes
 *
 * Code-point predicates shared by the scanner, the validators and the
 * pretty-printer, plus `escapeIdentifier`, the inverse of the quoted
 * identifier scanner in `scanner.ts`. The two must be updated together.
 *
 * The Unicode range tables live in `unicode-ranges.json`.
 *
 * License: Apache-2.0
 */

import ranges from './unicode-ranges.json';

/////////////////////
// Range tables    //
/////////////////////

type CodePointRange = readonly [number, number];

function toRanges(table: readonly (readonly string[])[]): CodePointRange[] {
  return table.map(([from, to]) => {
    const start = parseInt(from, 16);
    const end = parseInt(to ?? from, 16);
    return [start, end] as const;
  });
}

function inRanges(table: readonly CodePointRange[], c: number): boolean {
  for (const [start, end] of table) {
    if (c < start) return false;
    if (c <= end) return true;
  }
  return false;
}

const OPERATOR_CHARACTERS = new Set<number>(
  Array.from(ranges.operatorCharacters, (ch) => ch.codePointAt(0) ?? 0),
);
const OPERATOR_RANGES = toRanges(ranges.operatorRanges);
const IDENTIFIER_HEAD_RANGES = toRanges(ranges.identifierHeadRanges);
const IDENTIFIER_CONTINUATION_RANGES = toRanges(
  ranges.identifierContinuationRanges,
);

/////////////////////////
// Named code points   //
/////////////////////////

export const Char = {
  Null: 0x00,
  Tab: 0x09,
  LineFeed: 0x0a,
  CarriageReturn: 0x0d,
  Space: 0x20,
  DoubleQuote: 0x22,
  SingleQuote: 0x27,
  OpenParen: 0x28,
  CloseParen: 0x29,
  Comma: 0x2c,
  Minus: 0x2d,
  Dot: 0x2e,
  Zero: 0x30,
  Nine: 0x39,
  OpenBracket: 0x5b,
  Backslash: 0x5c,
  CloseBracket: 0x5d,
  Backtick: 0x60,
  OpenBrace: 0x7b,
  CloseBrace: 0x7d,
  Tilde: 0x7e,
} as const;

/////////////////////
// Predicates      //
/////////////////////

export function isWhitespace(c: number): boolean {
  return (
    c === Char.Space ||
    c === Char.Tab ||
    c === Char.LineFeed ||
    c === Char.CarriageReturn
  );
}

export function isDigit(c: number): boolean {
  return c >= Char.Zero && c <= Char.Nine;
}

export function isHexDigit(c: number): boolean {
  return (
    isDigit(c) ||
    (c >= 0x41 && c <= 0x46) || // A-F
    (c >= 0x61 && c <= 0x66) // a-f
  );
}

export function isQuote(c: number): boolean {
  return c === Char.Backtick || c === Char.SingleQuote || c === Char.DoubleQuote;
}

export function isOperatorCharacter(c: number): boolean {
  return OPERATOR_CHARACTERS.has(c) || inRanges(OPERATOR_RANGES, c);
}

export function isIdentifierHead(c: number): boolean {
  return inRanges(IDENTIFIER_HEAD_RANGES, c);
}

export function isIdentifierCharacter(c: number): boolean {
  return inRanges(IDENTIFIER_CONTINUATION_RANGES, c) || isIdentifierHead(c);
}

/////////////////////////
// Identifier escaping //
/////////////////////////

/**
 * Render a symbol name so that scanning it yields the same name again.
 *
 * Plain names are returned unchanged. Names produced by the quoted
 * identifier scanner keep their delimiters; control characters and code
 * points that are neither printable ASCII nor identifier/operator characters
 * are written as escapes.
 */
export function escapeIdentifier(name: string): string {
  const chars = Array.from(name, (ch) => ch.codePointAt(0) ?? 0);
  const delimiter = chars[0];
  if (delimiter === undefined || !isQuote(delimiter)) {
    return name;
  }

  let result = String.fromCodePoint(delimiter);
  const last = chars.length - 1;

  for (let i = 1; i < chars.length; i++) {
    const c = chars[i];
    switch (c) {
      case Char.Null:
        result += '\\0';
        continue;
      case Char.Tab:
        result += '\\t';
        continue;
      case Char.LineFeed:
        result += '\\n';
        continue;
      case Char.CarriageReturn:
        result += '\\r';
        continue;
      case Char.Backslash:
        result += '\\\\';
        continue;
    }
    if (c === delimiter && i !== last) {
      result += '\\' + String.fromCodePoint(c);
    } else if (
      (c >= Char.Space && c <= Char.Tilde) ||
      isOperatorCharacter(c) ||
      isIdentifierCharacter(c)
    ) {
      result += String.fromCodePoint(c);
    } else {
      result += `\\u{${c.toString(16).toUpperCase()}}`;
    }
  }

  return result;
}
