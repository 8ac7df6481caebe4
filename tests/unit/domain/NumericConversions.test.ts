import { describe, it, expect } from 'vitest';
import { conversions } from '../../../src/domain/services/conversions.js';
import { parseInteger } from '../../../src/domain/services/NumericConversions.js';
import { ParseError } from '../../../src/domain/model/TsvError.js';
import type { ParseErrorCode } from '../../../src/domain/model/TsvError.js';

function codeOf(parse: () => unknown): ParseErrorCode | undefined {
  try {
    parse();
  } catch (error) {
    if (error instanceof ParseError) return error.code;
    throw error;
  }
  return undefined;
}

describe('integer conversions', () => {
  it('should parse signed values', () => {
    expect(conversions.int32.parse('1')).toBe(1);
    expect(conversions.int32.parse('-1')).toBe(-1);
    expect(conversions.int32.parse('12345')).toBe(12345);
  });

  it('should report malformed text as UNKNOWN', () => {
    expect(codeOf(() => conversions.int32.parse(''))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.int32.parse('xxx'))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.int32.parse('+5'))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.int32.parse(' 5'))).toBe('UNKNOWN');
  });

  it('should report trailing characters as LEFTOVER', () => {
    expect(codeOf(() => conversions.int32.parse('123xxx'))).toBe('LEFTOVER');
    expect(codeOf(() => conversions.uint32.parse('4.56'))).toBe('LEFTOVER');
  });

  it('should enforce the range of each width', () => {
    expect(conversions.int8.parse('-128')).toBe(-128);
    expect(codeOf(() => conversions.int8.parse('128'))).toBe('OUT_OF_RANGE');
    expect(conversions.uint8.parse('255')).toBe(255);
    expect(codeOf(() => conversions.uint8.parse('256'))).toBe('OUT_OF_RANGE');
    expect(conversions.int16.parse('-32768')).toBe(-32768);
    expect(codeOf(() => conversions.uint16.parse('65536'))).toBe('OUT_OF_RANGE');
    expect(conversions.uint32.parse('4294967295')).toBe(4294967295);
    expect(codeOf(() => conversions.uint32.parse('4294967296'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.int32.parse('2147483648'))).toBe('OUT_OF_RANGE');
  });

  it('should reject negative values for unsigned types as OUT_OF_RANGE', () => {
    expect(codeOf(() => conversions.uint32.parse('-456'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.uint8.parse('-1x'))).toBe('OUT_OF_RANGE');
  });

  it('should reject a minus sign on zero for unsigned types only', () => {
    expect(codeOf(() => conversions.uint32.parse('-0'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.uint64.parse('-0'))).toBe('OUT_OF_RANGE');
    expect(conversions.int32.parse('-0')).toBe(0);
  });

  it('should check range before leftover characters', () => {
    expect(codeOf(() => conversions.uint32.parse('99999999999x'))).toBe('OUT_OF_RANGE');
  });

  it('should parse 64-bit values as bigint', () => {
    expect(conversions.int64.parse('-9223372036854775808')).toBe(-9223372036854775808n);
    expect(conversions.uint64.parse('18446744073709551615')).toBe(18446744073709551615n);
    expect(codeOf(() => conversions.uint64.parse('18446744073709551616'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.int64.parse('9999999999999999999999999999999999999999'))).toBe('OUT_OF_RANGE');
  });

  it('should expose the range-checked parser', () => {
    expect(parseInteger('7', 0n, 10n)).toBe(7n);
    expect(() => parseInteger('11', 0n, 10n)).toThrow('value out of range');
  });
});

describe('floating-point conversions', () => {
  it('should parse decimal notation', () => {
    expect(conversions.float64.parse('0.1')).toBeCloseTo(0.1);
    expect(conversions.float64.parse('-0.1')).toBeCloseTo(-0.1);
    expect(conversions.float64.parse('123.45')).toBeCloseTo(123.45);
    expect(conversions.float64.parse('1.')).toBe(1);
    expect(conversions.float64.parse('.5')).toBe(0.5);
    expect(conversions.float64.parse('6.02e23')).toBe(6.02e23);
    expect(conversions.float64.parse('1E-3')).toBe(0.001);
  });

  it('should parse infinity and NaN literals', () => {
    expect(conversions.float64.parse('inf')).toBe(Infinity);
    expect(conversions.float64.parse('-Infinity')).toBe(-Infinity);
    expect(conversions.float64.parse('NaN')).toBeNaN();
  });

  it('should report malformed text as UNKNOWN', () => {
    expect(codeOf(() => conversions.float64.parse(''))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.float64.parse('xxx'))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.float64.parse('.'))).toBe('UNKNOWN');
    expect(codeOf(() => conversions.float64.parse('-'))).toBe('UNKNOWN');
  });

  it('should report trailing characters as LEFTOVER', () => {
    expect(codeOf(() => conversions.float64.parse('123.45xxx'))).toBe('LEFTOVER');
    expect(codeOf(() => conversions.float64.parse('1e'))).toBe('LEFTOVER');
    expect(codeOf(() => conversions.float64.parse('1,5'))).toBe('LEFTOVER');
  });

  it('should report overflow and underflow as OUT_OF_RANGE', () => {
    expect(codeOf(() => conversions.float64.parse('1e400'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.float64.parse('-1e400'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.float64.parse('1e-400'))).toBe('OUT_OF_RANGE');
    expect(conversions.float64.parse('0e-400')).toBe(0);
  });

  it('should round single-precision values and check their range', () => {
    expect(conversions.float32.parse('0.1')).toBe(Math.fround(0.1));
    expect(codeOf(() => conversions.float32.parse('1e39'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.float32.parse('1e-50'))).toBe('OUT_OF_RANGE');
    expect(conversions.float32.parse('inf')).toBe(Infinity);
  });

  it('should accept values that round to the largest single-precision value', () => {
    expect(conversions.float32.parse('3.40282347e38')).toBe(Math.fround(3.40282347e38));
    expect(conversions.float32.parse('3.4028235e38')).toBe(Math.fround(3.40282347e38));
    expect(conversions.float32.parse('-3.40282347e38')).toBe(-Math.fround(3.40282347e38));
  });

  it('should reject values that round past the largest single-precision value', () => {
    expect(codeOf(() => conversions.float32.parse('3.4028236e38'))).toBe('OUT_OF_RANGE');
  });

  it('should check single-precision range before leftover characters', () => {
    expect(codeOf(() => conversions.float32.parse('1e39x'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.float64.parse('1e400x'))).toBe('OUT_OF_RANGE');
    expect(codeOf(() => conversions.float32.parse('1.5x'))).toBe('LEFTOVER');
  });
});
