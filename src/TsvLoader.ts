import type { FieldList, RecordLayout, RecordOf } from './domain/model/RecordLayout.js';
import type { LoadOptions, ResolvedLoadOptions } from './domain/model/LoadOptions.js';
import type { TextSource } from './domain/ports/TextSource.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import { resolveOptions } from './domain/model/LoadOptions.js';
import { FormatError, TsvError } from './domain/model/TsvError.js';
import { EventBus } from './application/EventBus.js';
import { RecordParser } from './application/RecordParser.js';
import { BufferSource } from './infrastructure/sources/BufferSource.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';

/** Anything `load()` accepts as input. Strings and Buffers are wrapped in a `BufferSource`. */
export type LoadInput = TextSource | string | Buffer;

/**
 * Loads every record of a delimited document into an array.
 *
 * Reading is synchronous and the source is owned by one `load()` call at a
 * time. The first malformed or invalid line aborts the call with a
 * `TsvError` carrying the line and its number.
 */
export class TsvLoader<F extends FieldList> {
  private readonly options: ResolvedLoadOptions;
  private readonly eventBus = new EventBus<RecordOf<F>>();

  constructor(
    private readonly layout: RecordLayout<F>,
    options?: LoadOptions,
  ) {
    this.options = resolveOptions(options);
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T, RecordOf<F>>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T, RecordOf<F>>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  load(input: LoadInput): RecordOf<F>[] {
    const source = toSource(input);
    const parser = new RecordParser(source, this.options.delimiter);
    const startedAt = Date.now();

    this.eventBus.emit({
      type: 'load:started',
      source: source.metadata(),
      options: this.options,
      timestamp: startedAt,
    });

    try {
      const { records, skippedLineCount } = this.parseAll(parser);

      this.eventBus.emit({
        type: 'load:completed',
        recordCount: records.length,
        skippedLineCount,
        lineCount: parser.lineNumber,
        durationMs: Date.now() - startedAt,
        timestamp: Date.now(),
      });

      return records;
    } catch (error) {
      if (error instanceof Error) {
        this.eventBus.emit({
          type: 'load:failed',
          error,
          message: error instanceof TsvError ? error.describe() : error.message,
          lineNumber: error instanceof TsvError ? error.lineNumber : parser.lineNumber,
          timestamp: Date.now(),
        });
      }
      throw error;
    } finally {
      source.close?.();
    }
  }

  private parseAll(parser: RecordParser): { records: RecordOf<F>[]; skippedLineCount: number } {
    const records: RecordOf<F>[] = [];
    let skippedLineCount = parser.skipComment(this.options.comment);

    if (this.options.header) {
      const header: string[] = [];
      if (!parser.parseFields(header)) {
        throw new FormatError('MISSING_HEADER');
      }
      this.eventBus.emit({
        type: 'header:skipped',
        fields: header,
        lineNumber: parser.lineNumber,
        timestamp: Date.now(),
      });
    }

    for (;;) {
      skippedLineCount += parser.skipComment(this.options.comment);

      const record = parser.parseRecord(this.layout);
      if (record === null) {
        break;
      }
      this.validate(record, parser);

      records.push(record);
      this.eventBus.emit({
        type: 'record:loaded',
        record,
        index: records.length - 1,
        lineNumber: parser.lineNumber,
        timestamp: Date.now(),
      });
    }

    return { records, skippedLineCount };
  }

  private validate(record: RecordOf<F>, parser: RecordParser): void {
    try {
      this.layout.validate(record);
    } catch (error) {
      if (error instanceof TsvError && parser.currentLine !== null) {
        error.annotate(parser.currentLine, parser.lineNumber);
      }
      throw error;
    }
  }
}

/** Load every record of `input` described by `layout`. */
export function load<F extends FieldList>(
  layout: RecordLayout<F>,
  input: LoadInput,
  options?: LoadOptions,
): RecordOf<F>[] {
  return new TsvLoader(layout, options).load(input);
}

/** Load every record of the file at `filePath` described by `layout`. */
export function loadFile<F extends FieldList>(
  layout: RecordLayout<F>,
  filePath: string,
  options?: LoadOptions,
): RecordOf<F>[] {
  return load(layout, new FilePathSource(filePath), options);
}

function toSource(input: LoadInput): TextSource {
  return typeof input === 'string' || Buffer.isBuffer(input) ? new BufferSource(input) : input;
}
