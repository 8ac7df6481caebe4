/** Broad category of a loading failure. */
export type TsvErrorKind = 'format' | 'parse' | 'io' | 'validation';

/** Codes for lines whose shape does not match the record layout. */
export type FormatErrorCode = 'MISSING_HEADER' | 'MISSING_FIELD' | 'EXCESS_FIELD';

/** Codes for field text that cannot be converted to the field's type. */
export type ParseErrorCode = 'UNKNOWN' | 'OUT_OF_RANGE' | 'LEFTOVER';

const FORMAT_MESSAGES: Readonly<Record<FormatErrorCode, string>> = {
  MISSING_HEADER: 'header is expected but not seen',
  MISSING_FIELD: 'insufficient number of fields',
  EXCESS_FIELD: 'excess fields',
};

const PARSE_MESSAGES: Readonly<Record<ParseErrorCode, string>> = {
  UNKNOWN: 'parse error',
  OUT_OF_RANGE: 'value out of range',
  LEFTOVER: 'excess character(s) at the end of a field',
};

/**
 * Base class of every error raised while loading records.
 *
 * Errors are usually raised with just a message and enriched on their way up:
 * the record layout stamps the failing field, the record parser stamps the
 * line text and line number.
 */
export abstract class TsvError extends Error {
  abstract readonly kind: TsvErrorKind;
  abstract readonly code: string;

  /** Content of the line where the error occurred, if available. */
  line?: string;

  /** 1-based line number where the error occurred. Zero when unknown. */
  lineNumber = 0;

  /** Name of the record field whose conversion failed, if any. */
  field?: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Attach the offending line and its number. Returns `this` for rethrowing. */
  annotate(line: string, lineNumber: number): this {
    this.line = line;
    this.lineNumber = lineNumber;
    return this;
  }

  /** Render the message followed by the field, line number and line content when known. */
  describe(): string {
    let message = this.message;

    if (this.field !== undefined) {
      message += ` in field '${this.field}'`;
    }
    if (this.lineNumber) {
      message += ` (at line ${this.lineNumber})`;
    }
    if (this.line) {
      message += `: "${this.line}"`;
    }

    return message;
  }
}

/** A line has too few or too many fields, or the header line is missing. */
export class FormatError extends TsvError {
  readonly kind = 'format';

  constructor(
    readonly code: FormatErrorCode,
    options?: ErrorOptions,
  ) {
    super(FORMAT_MESSAGES[code], options);
  }
}

/** Field text is not a valid value of the field's type. */
export class ParseError extends TsvError {
  readonly kind = 'parse';

  constructor(
    readonly code: ParseErrorCode,
    options?: ErrorOptions,
  ) {
    super(PARSE_MESSAGES[code], options);
  }
}

/** The underlying source failed for a reason other than reaching its end. */
export class IoError extends TsvError {
  readonly kind = 'io';
  readonly code = 'UNKNOWN';

  constructor(options?: ErrorOptions) {
    super('input error', options);
  }
}

/** A parsed record was rejected by its layout's validator. */
export class ValidationError extends TsvError {
  readonly kind = 'validation';
  readonly code = 'FAILED';
}

/** Return `true` if the value is any of the loader's own errors. */
export function isTsvError(error: unknown): error is TsvError {
  return error instanceof TsvError;
}

/**
 * Throw a `ValidationError` with the given message when `predicate` is false.
 *
 * Meant for record validators:
 *
 * ```ts
 * const edges = defineRecord(
 *   field('row', conversions.uint32),
 *   field('column', conversions.uint32),
 * ).withValidator((edge) => {
 *   check(edge.row < edge.column, 'row index must be smaller than column index');
 * });
 * ```
 */
export function check(predicate: boolean, message: string): void {
  if (!predicate) {
    throw new ValidationError(message);
  }
}
