import type { Conversion } from '../model/Conversion.js';
import { ParseError } from '../model/TsvError.js';

const BOOLEAN_VALUES: ReadonlyMap<string, boolean> = new Map([
  ['0', false],
  ['1', true],
  ['false', false],
  ['true', true],
]);

/** Field text taken verbatim, including the empty string. */
export const string: Conversion<string> = {
  parse: (text) => text,
};

/** Exactly one Unicode code point. */
export const char: Conversion<string> = {
  parse(text) {
    const codePoint = text.codePointAt(0);
    if (codePoint === undefined || String.fromCodePoint(codePoint).length !== text.length) {
      throw new ParseError('UNKNOWN');
    }
    return text;
  },
};

/** `0`, `1`, `false` or `true`. */
export const boolean: Conversion<boolean> = {
  parse(text) {
    const value = BOOLEAN_VALUES.get(text);
    if (value === undefined) {
      throw new ParseError('UNKNOWN');
    }
    return value;
  },
};
