import * as numeric from './NumericConversions.js';
import * as text from './TextConversions.js';

/** Built-in field conversions, keyed by the field type they produce. */
export const conversions = {
  int8: numeric.int8,
  int16: numeric.int16,
  int32: numeric.int32,
  int64: numeric.int64,
  uint8: numeric.uint8,
  uint16: numeric.uint16,
  uint32: numeric.uint32,
  uint64: numeric.uint64,
  float32: numeric.float32,
  float64: numeric.float64,
  char: text.char,
  string: text.string,
  boolean: text.boolean,
} as const;
