// Main entry point
export { TsvLoader, load, loadFile } from './TsvLoader.js';
export type { LoadInput } from './TsvLoader.js';

// Domain model
export { RecordLayout, defineRecord, field, MAX_ARITY } from './domain/model/RecordLayout.js';
export type {
  Field,
  AnyField,
  FieldList,
  FieldValue,
  FieldTypes,
  Arity,
  RecordOf,
  InferRecord,
  RecordValidator,
} from './domain/model/RecordLayout.js';
export { defineConversion } from './domain/model/Conversion.js';
export type { Conversion, ConvertedType } from './domain/model/Conversion.js';
export { DEFAULT_LOAD_OPTIONS, resolveOptions } from './domain/model/LoadOptions.js';
export type { LoadOptions, ResolvedLoadOptions } from './domain/model/LoadOptions.js';
export { TsvError, FormatError, ParseError, IoError, ValidationError, isTsvError, check } from './domain/model/TsvError.js';
export type { TsvErrorKind, FormatErrorCode, ParseErrorCode } from './domain/model/TsvError.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadStartedEvent,
  HeaderSkippedEvent,
  RecordLoadedEvent,
  LoadCompletedEvent,
  LoadFailedEvent,
} from './domain/events/DomainEvents.js';

// Domain ports
export type { TextSource, SourceMetadata } from './domain/ports/TextSource.js';

// Domain services
export { conversions } from './domain/services/conversions.js';
export { parseInteger, parseFloat32, parseFloat64 } from './domain/services/NumericConversions.js';
export { TextScanner, scanned } from './domain/services/TextScanner.js';
export { FieldSplitter, splitFields } from './domain/services/FieldSplitter.js';

// Application (for building custom loading loops)
export { RecordParser } from './application/RecordParser.js';
export { LineReader } from './application/LineReader.js';
export { EventBus } from './application/EventBus.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { IterableSource } from './infrastructure/sources/IterableSource.js';
export type { IterableSourceOptions } from './infrastructure/sources/IterableSource.js';
export { detectOptions, CANDIDATE_DELIMITERS } from './infrastructure/detectOptions.js';
