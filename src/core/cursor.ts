/**
 * numeval – Cursor
 *
 * A scanning view over an immutable buffer of Unicode code points.
 *
 * A cursor is just a `[start, end)` window into a shared buffer, so taking a
 * prefix or suffix view never copies the underlying text. Scanning methods
 * advance `start`; a failed scan leaves the cursor where it was.
 *
 * Saving and restoring a position is done with `mark()` / `reset(mark)`:
 *
 *   const mark = cursor.mark();
 *   if (!tryScanSomething(cursor)) cursor.reset(mark);
 *
 * License: Apache-2.0
 */

import { isWhitespace } from './characters';

export type CharacterPredicate = (c: number) => boolean;

export class Cursor {
  private readonly buffer: readonly number[];
  private startIndex: number;
  private readonly endIndex: number;

  private constructor(buffer: readonly number[], start: number, end: number) {
    this.buffer = buffer;
    this.startIndex = start;
    this.endIndex = end;
  }

  /**
   * Create a cursor over the code points of `source`.
   */
  static from(source: string): Cursor {
    const buffer = Array.from(source, (ch) => ch.codePointAt(0) ?? 0);
    return new Cursor(buffer, 0, buffer.length);
  }

  /** Offset of the first unconsumed code point. */
  get start(): number {
    return this.startIndex;
  }

  /** Offset one past the last code point of this view. */
  get end(): number {
    return this.endIndex;
  }

  /** Number of code points left in the view. */
  get length(): number {
    return Math.max(0, this.endIndex - this.startIndex);
  }

  first(): number | undefined {
    return this.isEmpty() ? undefined : this.buffer[this.startIndex];
  }

  isEmpty(): boolean {
    return this.startIndex >= this.endIndex;
  }

  popFirst(): number | undefined {
    if (this.isEmpty()) {
      return undefined;
    }
    const c = this.buffer[this.startIndex];
    this.startIndex++;
    return c;
  }

  /**
   * View from the current position up to (not including) `index`.
   */
  prefixUpTo(index: number): Cursor {
    return new Cursor(this.buffer, this.startIndex, clampIndex(index, this.startIndex, this.endIndex));
  }

  /**
   * View from `index` to the end of this view.
   */
  suffixFrom(index: number): Cursor {
    return new Cursor(this.buffer, clampIndex(index, this.startIndex, this.endIndex), this.endIndex);
  }

  mark(): number {
    return this.startIndex;
  }

  reset(mark: number): void {
    this.startIndex = clampIndex(mark, 0, this.endIndex);
  }

  /**
   * Text between two offsets of the underlying buffer.
   */
  slice(from: number, to: number = this.startIndex): string {
    return codePointsToString(this.buffer, from, to);
  }

  ///////////////////////
  // Scanning          //
  ///////////////////////

  /**
   * Consume the longest prefix whose code points all satisfy `matching`.
   * Returns `undefined` (and consumes nothing) when the first code point
   * does not match.
   */
  scanCharacters(matching: CharacterPredicate): string | undefined {
    let index = this.startIndex;
    while (index < this.endIndex && matching(this.buffer[index])) {
      index++;
    }
    if (index > this.startIndex) {
      const text = codePointsToString(this.buffer, this.startIndex, index);
      this.startIndex = index;
      return text;
    }
    return undefined;
  }

  /**
   * Consume a single code point if it satisfies `matching` (or equals it,
   * when a code point is given).
   */
  scanCharacter(matching: CharacterPredicate | number = () => true): string | undefined {
    const c = this.first();
    if (c === undefined) {
      return undefined;
    }
    const matches = typeof matching === 'number' ? c === matching : matching(c);
    if (!matches) {
      return undefined;
    }
    this.startIndex++;
    return String.fromCodePoint(c);
  }

  /**
   * Consume everything up to the next whitespace character.
   */
  scanToEndOfToken(): string | undefined {
    return this.scanCharacters((c) => !isWhitespace(c));
  }

  /**
   * Skip whitespace; returns whether any was skipped.
   */
  skipWhitespace(): boolean {
    return this.scanCharacters(isWhitespace) !== undefined;
  }

  /**
   * Whether the remaining text starts with one of `delimiters`.
   * Never consumes anything.
   */
  matchesDelimiter(delimiters: readonly string[]): boolean {
    outer: for (const delimiter of delimiters) {
      let index = this.startIndex;
      for (const ch of delimiter) {
        if (index >= this.endIndex || this.buffer[index] !== ch.codePointAt(0)) {
          continue outer;
        }
        index++;
      }
      return true;
    }
    return false;
  }

  /** The remaining (unconsumed) text. */
  toString(): string {
    return codePointsToString(this.buffer, this.startIndex, this.endIndex);
  }
}

/////////////////////
// Helpers         //
/////////////////////

// String.fromCodePoint takes its input as arguments; chunk long slices so
// the argument list stays small.
const CHUNK_SIZE = 4096;

function codePointsToString(buffer: readonly number[], from: number, to: number): string {
  let text = '';
  for (let i = from; i < to; i += CHUNK_SIZE) {
    text += String.fromCodePoint(...buffer.slice(i, Math.min(to, i + CHUNK_SIZE)));
  }
  return text;
}

function clampIndex(index: number, min: number, max: number): number {
  if (Number.isNaN(index)) return min;
  if (index < min) return min;
  if (index > max) return max;
  return index;
}
