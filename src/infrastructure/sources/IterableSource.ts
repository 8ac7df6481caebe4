import { StringDecoder } from 'node:string_decoder';
import type { TextSource, SourceMetadata } from '../../domain/ports/TextSource.js';
import { truncateBytes } from './truncateBytes.js';

export interface IterableSourceOptions {
  /** File name for metadata. Default: 'iterable-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
  /** Encoding for decoding Buffer chunks. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Text source that wraps any synchronous iterable of strings or Buffers
 * (an array of chunks, a generator). It can be read only once; chunks pulled
 * by `sample()` are replayed by `read()`.
 */
export class IterableSource implements TextSource {
  private readonly iterable: Iterable<string | Buffer>;
  private readonly meta: SourceMetadata;
  private readonly decoder: StringDecoder;
  private readonly sampled: string[] = [];
  private iterator: Iterator<string | Buffer> | null = null;
  private done = false;

  constructor(iterable: Iterable<string | Buffer>, options?: IterableSourceOptions) {
    this.iterable = iterable;
    this.decoder = new StringDecoder(options?.encoding ?? 'utf-8');
    this.meta = {
      fileName: options?.fileName ?? 'iterable-input',
      fileSize: options?.fileSize,
    };
  }

  read(): string | null {
    const replayed = this.sampled.shift();
    if (replayed !== undefined) {
      return replayed;
    }
    return this.pull();
  }

  sample(maxBytes?: number): string {
    let joined = this.sampled.join('');

    while (!this.done && (maxBytes === undefined || Buffer.byteLength(joined) < maxBytes)) {
      const chunk = this.pull();
      if (chunk === null) break;
      this.sampled.push(chunk);
      joined += chunk;
    }

    return maxBytes === undefined ? joined : truncateBytes(joined, maxBytes);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private pull(): string | null {
    if (this.done) {
      return null;
    }
    if (this.iterator === null) {
      this.iterator = this.iterable[Symbol.iterator]();
    }

    for (;;) {
      const next = this.iterator.next();
      if (next.done) {
        this.done = true;
        const tail = this.decoder.end();
        return tail.length > 0 ? tail : null;
      }

      const text = typeof next.value === 'string' ? next.value : this.decoder.write(next.value);
      if (text.length > 0) {
        return text;
      }
    }
  }
}
