import type { Conversion } from '../model/Conversion.js';
import { ParseError } from '../model/TsvError.js';

const WHITESPACE = /\s/;
const INTEGER_PREFIX = /^[-+]?\d+/;
const NUMBER_PREFIX = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/;
const WORD_PREFIX = /^\S+/;

/**
 * Cursor over the text of one field, read with extraction-style primitives.
 *
 * Every read skips leading whitespace first. A read that finds nothing it can
 * use throws `ParseError('UNKNOWN')`.
 */
export class TextScanner {
  private position = 0;

  constructor(private readonly text: string) {}

  /** Unconsumed part of the text. */
  get rest(): string {
    return this.text.slice(this.position);
  }

  /** `true` once every character has been consumed. */
  get atEnd(): boolean {
    return this.position >= this.text.length;
  }

  /** Read a decimal integer with an optional sign. */
  integer(): number {
    const value = Number(this.take(INTEGER_PREFIX));
    if (!Number.isSafeInteger(value)) {
      throw new ParseError('OUT_OF_RANGE');
    }
    return value;
  }

  /** Read a decimal number with optional fraction and exponent. */
  number(): number {
    const value = Number(this.take(NUMBER_PREFIX));
    if (!Number.isFinite(value)) {
      throw new ParseError('OUT_OF_RANGE');
    }
    return value;
  }

  /** Read one non-whitespace character. */
  char(): string {
    this.skipWhitespace();
    const codePoint = this.text.codePointAt(this.position);
    if (codePoint === undefined) {
      throw new ParseError('UNKNOWN');
    }
    const char = String.fromCodePoint(codePoint);
    this.position += char.length;
    return char;
  }

  /** Read a run of non-whitespace characters. */
  word(): string {
    return this.take(WORD_PREFIX);
  }

  /** Consume `expected` verbatim (after whitespace) or fail. */
  literal(expected: string): void {
    this.skipWhitespace();
    if (!this.text.startsWith(expected, this.position)) {
      throw new ParseError('UNKNOWN');
    }
    this.position += expected.length;
  }

  skipWhitespace(): void {
    while (this.position < this.text.length && WHITESPACE.test(this.text.charAt(this.position))) {
      this.position++;
    }
  }

  private take(pattern: RegExp): string {
    this.skipWhitespace();
    const match = pattern.exec(this.rest);
    if (match === null) {
      throw new ParseError('UNKNOWN');
    }
    this.position += match[0].length;
    return match[0];
  }
}

/**
 * Build a conversion from a scanning function. This is the general fallback
 * for composite field types: the scan reads what it needs, and any characters
 * it leaves unread make the field invalid.
 *
 * ```ts
 * const rational = scanned((s) => {
 *   const numerator = s.integer();
 *   s.literal('/');
 *   return { numerator, denominator: s.integer() };
 * });
 * ```
 */
export function scanned<T>(scan: (scanner: TextScanner) => T): Conversion<T> {
  return {
    parse(text) {
      const scanner = new TextScanner(text);
      const value = scan(scanner);
      if (!scanner.atEnd) {
        throw new ParseError('LEFTOVER');
      }
      return value;
    },
  };
}
