import type { Conversion } from '../model/Conversion.js';
import { ParseError } from '../model/TsvError.js';

const INTEGER_PREFIX = /^-?\d+/;
const FLOAT_PREFIX = /^-?(?:infinity|inf|nan(?:\([0-9a-z_]*\))?|(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?)/i;

/**
 * Parse the longest integer prefix of `text`. The whole text must be consumed.
 * Range is checked before leftover characters, so `99999999999x` into a
 * 32-bit field reports `OUT_OF_RANGE`. With a non-negative `min`, any leading
 * `-` is out of range, `-0` included.
 */
export function parseInteger(text: string, min: bigint, max: bigint): bigint {
  const match = INTEGER_PREFIX.exec(text);
  if (match === null) {
    throw new ParseError('UNKNOWN');
  }

  const digits = match[0];
  const value = BigInt(digits);

  if (value < min || value > max || (min >= 0n && digits.startsWith('-'))) {
    throw new ParseError('OUT_OF_RANGE');
  }
  if (digits.length !== text.length) {
    throw new ParseError('LEFTOVER');
  }

  return value;
}

/** Parse the longest floating-point prefix of `text` as a double. The whole text must be consumed. */
export function parseFloat64(text: string): number {
  const { token, value } = matchFloat(text);

  if (isFiniteLiteral(token) && (!Number.isFinite(value) || (value === 0 && hasNonZeroMantissa(token)))) {
    throw new ParseError('OUT_OF_RANGE');
  }
  checkConsumed(token, text);

  return value;
}

/**
 * Parse like `parseFloat64` and round to single precision. A finite literal is
 * out of range when it rounds to infinity or a non-zero one rounds to zero.
 */
export function parseFloat32(text: string): number {
  const { token, value } = matchFloat(text);
  const narrow = Math.fround(value);

  if (isFiniteLiteral(token) && (!Number.isFinite(narrow) || (narrow === 0 && hasNonZeroMantissa(token)))) {
    throw new ParseError('OUT_OF_RANGE');
  }
  checkConsumed(token, text);

  return narrow;
}

function matchFloat(text: string): { token: string; value: number } {
  const match = FLOAT_PREFIX.exec(text);
  if (match === null) {
    throw new ParseError('UNKNOWN');
  }
  return { token: match[0], value: toNumber(match[0]) };
}

function checkConsumed(token: string, text: string): void {
  if (token.length !== text.length) {
    throw new ParseError('LEFTOVER');
  }
}

function toNumber(token: string): number {
  const negative = token.startsWith('-');
  const body = (negative ? token.slice(1) : token).toLowerCase();

  if (body.startsWith('inf')) {
    return negative ? -Infinity : Infinity;
  }
  if (body.startsWith('nan')) {
    return NaN;
  }
  return Number(token);
}

function isFiniteLiteral(token: string): boolean {
  return /^-?[\d.]/.test(token);
}

function hasNonZeroMantissa(token: string): boolean {
  const mantissa = token.split(/e/i)[0] ?? '';
  return /[1-9]/.test(mantissa);
}

function integerConversion(min: bigint, max: bigint): Conversion<number> {
  return {
    parse: (text) => Number(parseInteger(text, min, max)),
  };
}

function bigIntegerConversion(min: bigint, max: bigint): Conversion<bigint> {
  return {
    parse: (text) => parseInteger(text, min, max),
  };
}

export const int8 = integerConversion(-128n, 127n);
export const int16 = integerConversion(-32768n, 32767n);
export const int32 = integerConversion(-2147483648n, 2147483647n);
export const int64 = bigIntegerConversion(-9223372036854775808n, 9223372036854775807n);

export const uint8 = integerConversion(0n, 255n);
export const uint16 = integerConversion(0n, 65535n);
export const uint32 = integerConversion(0n, 4294967295n);
export const uint64 = bigIntegerConversion(0n, 18446744073709551615n);

export const float32: Conversion<number> = { parse: parseFloat32 };
export const float64: Conversion<number> = { parse: parseFloat64 };
