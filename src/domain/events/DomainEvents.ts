import type { ResolvedLoadOptions } from '../model/LoadOptions.js';
import type { SourceMetadata } from '../ports/TextSource.js';
import type { TsvError } from '../model/TsvError.js';

/** Emitted when `load()` begins reading a source. */
export interface LoadStartedEvent {
  readonly type: 'load:started';
  readonly source: SourceMetadata;
  readonly options: ResolvedLoadOptions;
  readonly timestamp: number;
}

/** Emitted after the header line has been consumed and discarded. */
export interface HeaderSkippedEvent {
  readonly type: 'header:skipped';
  readonly fields: readonly string[];
  readonly lineNumber: number;
  readonly timestamp: number;
}

/** Emitted for each record that was parsed, validated and appended to the result. */
export interface RecordLoadedEvent<R = unknown> {
  readonly type: 'record:loaded';
  readonly record: R;
  /** Zero-based position of the record in the result. */
  readonly index: number;
  readonly lineNumber: number;
  readonly timestamp: number;
}

/** Emitted once the source is exhausted and every record has been loaded. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly recordCount: number;
  /** Empty and comment lines skipped. */
  readonly skippedLineCount: number;
  /** Total lines consumed, header included. */
  readonly lineCount: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when loading stops on an error. The error is rethrown to the caller afterwards. */
export interface LoadFailedEvent {
  readonly type: 'load:failed';
  readonly error: TsvError | Error;
  readonly message: string;
  readonly lineNumber: number;
  readonly timestamp: number;
}

export type DomainEvent<R = unknown> =
  | LoadStartedEvent
  | HeaderSkippedEvent
  | RecordLoadedEvent<R>
  | LoadCompletedEvent
  | LoadFailedEvent;

export type EventType = DomainEvent['type'];

/** Narrow a `DomainEvent` union to the payload for a given event type. */
export type EventPayload<T extends EventType, R = unknown> = Extract<DomainEvent<R>, { type: T }>;
