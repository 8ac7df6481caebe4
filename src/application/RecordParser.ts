import type { TextSource } from '../domain/ports/TextSource.js';
import type { FieldList, RecordLayout, RecordOf } from '../domain/model/RecordLayout.js';
import { FormatError, TsvError } from '../domain/model/TsvError.js';
import { FieldSplitter } from '../domain/services/FieldSplitter.js';
import { LineReader } from './LineReader.js';

/** Incrementally reads delimited rows, either as raw text fields or as typed records. */
export class RecordParser {
  private readonly reader: LineReader;
  private lastLine: string | null = null;

  constructor(
    source: TextSource,
    private readonly delimiter: string,
  ) {
    this.reader = new LineReader(source);
  }

  /** 1-based number of the last consumed line. Zero before any line. */
  get lineNumber(): number {
    return this.reader.lineNumber;
  }

  /** Text of the last consumed line, or `null` before any line. */
  get currentLine(): string | null {
    return this.lastLine;
  }

  /**
   * Consume empty lines and lines starting with `prefix`. A `null` or empty
   * prefix disables comments; empty lines are skipped either way.
   * Returns the number of lines skipped.
   */
  skipComment(prefix: string | null): number {
    let skipped = 0;

    for (let line = this.reader.peek(); line !== null; line = this.reader.peek()) {
      if (line !== '' && !(prefix && line.startsWith(prefix))) {
        break;
      }
      this.consume();
      skipped++;
    }

    return skipped;
  }

  /**
   * Consume the next line and append its text fields to `into`, keeping empty
   * fields. Returns `false` at the end of the input.
   */
  parseFields(into: string[]): boolean {
    const line = this.consume();
    if (line === null) {
      return false;
    }

    into.push(...new FieldSplitter(line, this.delimiter).rest());
    return true;
  }

  /**
   * Consume the next line and parse it as a record of the given layout.
   * Returns `null` at the end of the input. Errors raised while parsing carry
   * the line and its number.
   */
  parseRecord<F extends FieldList>(layout: RecordLayout<F>): RecordOf<F> | null {
    const line = this.consume();
    if (line === null) {
      return null;
    }

    try {
      const splitter = new FieldSplitter(line, this.delimiter);
      const record = layout.read(() => splitter.next());
      if (splitter.hasNext()) {
        throw new FormatError('EXCESS_FIELD');
      }
      return record;
    } catch (error) {
      if (error instanceof TsvError) {
        error.annotate(line, this.lineNumber);
      }
      throw error;
    }
  }

  private consume(): string | null {
    const line = this.reader.consume();
    if (line !== null) {
      this.lastLine = line;
    }
    return line;
  }
}
