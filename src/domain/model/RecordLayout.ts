import type { Conversion } from './Conversion.js';
import { ParseError, TsvError } from './TsvError.js';

/** Largest number of fields a record layout may declare. */
export const MAX_ARITY = 32;

/** One named field of a record, in column order. */
export interface Field<N extends string = string, T = unknown> {
  readonly name: N;
  readonly conversion: Conversion<T>;
}

/** Any field, regardless of its name and value type. */
export type AnyField = Field<string, unknown>;

/**
 * Field tuples accepted by `defineRecord`: up to `MAX_ARITY` entries. A longer
 * tuple does not satisfy this constraint and fails to compile.
 */
export type FieldList = readonly [
  AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?,
  AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?,
  AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?,
  AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?, AnyField?,
];

/** Value type produced by a field. */
export type FieldValue<E> = E extends Field<string, infer T> ? T : never;

/** Number of fields in a field tuple. */
export type Arity<F extends FieldList> = F['length'];

/** Ordered tuple of the value types of a field tuple. */
export type FieldTypes<F extends FieldList> = { -readonly [I in keyof F]: FieldValue<F[I]> };

/** Record object type described by a field tuple. */
export type RecordOf<F extends FieldList> = {
  [E in Extract<F[number], AnyField> as E['name']]: FieldValue<E>;
};

/** Record object type described by a layout value. */
export type InferRecord<L> = L extends RecordLayout<infer F extends FieldList> ? RecordOf<F> : never;

/** Self-validation hook. Throws a `ValidationError` to reject a record. */
export type RecordValidator<R> = (record: R) => void;

/** Declare a named field with the conversion used to parse its column. */
export function field<N extends string, T>(name: N, conversion: Conversion<T>): Field<N, T> {
  return { name, conversion };
}

/**
 * Ordered description of a record type: how many fields it has, what they are
 * called, and how each one is parsed.
 *
 * The record type, its arity and its field-type tuple are all derived from the
 * field tuple `F`, so a layout is declared once and never restated.
 */
export class RecordLayout<F extends FieldList> {
  /** Number of fields; `Arity<F>` at the type level. */
  readonly arity: number;
  readonly names: readonly string[];

  constructor(
    readonly fields: F,
    private readonly validator?: RecordValidator<RecordOf<F>>,
  ) {
    this.arity = fields.length;
    this.names = this.checkedNames();
  }

  /** Return a copy of this layout whose records are checked by `validator` after parsing. */
  withValidator(validator: RecordValidator<RecordOf<F>>): RecordLayout<F> {
    return new RecordLayout(this.fields, validator);
  }

  /** Run the validator, if any, against a parsed record. */
  validate(record: RecordOf<F>): void {
    this.validator?.(record);
  }

  /**
   * Build a record by pulling exactly `arity` tokens from `next`, converting
   * each one as soon as it is pulled. Conversion errors are stamped with the
   * name of the failing field.
   */
  read(next: () => string): RecordOf<F> {
    const values: unknown[] = [];

    for (const current of this.fields) {
      if (current === undefined) continue;
      const token = next();
      values.push(convert(current, token));
    }

    return this.assemble(values);
  }

  private assemble(values: readonly unknown[]): RecordOf<F> {
    const record: Record<string, unknown> = {};
    this.names.forEach((name, index) => {
      record[name] = values[index];
    });
    return record as RecordOf<F>;
  }

  private checkedNames(): string[] {
    if (this.fields.length > MAX_ARITY) {
      throw new Error(`Record layout declares ${this.fields.length} fields; at most ${MAX_ARITY} are supported`);
    }

    const names: string[] = [];
    for (const current of this.fields) {
      if (current === undefined) continue;
      if (current.name === '__proto__') {
        throw new Error(`Field name '__proto__' is not allowed`);
      }
      if (names.includes(current.name)) {
        throw new Error(`Duplicate field name '${current.name}' in record layout`);
      }
      names.push(current.name);
    }
    return names;
  }
}

function convert(current: AnyField, token: string): unknown {
  try {
    return current.conversion.parse(token);
  } catch (error) {
    const tsvError = error instanceof TsvError ? error : new ParseError('UNKNOWN', { cause: error });
    tsvError.field = current.name;
    throw tsvError;
  }
}

/**
 * Declare a record layout from its fields, in column order.
 *
 * ```ts
 * const edges = defineRecord(
 *   field('row', conversions.uint32),
 *   field('column', conversions.uint32),
 *   field('value', conversions.float64),
 * );
 * type Edge = InferRecord<typeof edges>; // { row: number; column: number; value: number }
 * ```
 */
export function defineRecord<F extends FieldList>(...fields: F): RecordLayout<F> {
  return new RecordLayout(fields);
}
