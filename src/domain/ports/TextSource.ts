/** Metadata about the text source (optional, for events and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading delimited text from any origin (string, Buffer, file, iterable).
 *
 * Reads are synchronous: `read()` returns the next decoded chunk, or `null`
 * once the source is cleanly exhausted. Any other failure is thrown and
 * reported by the loader as an I/O error. Chunk boundaries carry no meaning;
 * the line reader reassembles lines across them.
 */
export interface TextSource {
  /** Return the next chunk of text, or `null` at the end of the input. */
  read(): string | null;
  /** Return up to `maxBytes` of leading text for format detection, without consuming the source. */
  sample(maxBytes?: number): string;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
  /** Release any underlying resource. Called by the loader once it stops reading. */
  close?(): void;
}
