import { closeSync, openSync, readSync, statSync } from 'node:fs';
import { basename } from 'node:path';
import { StringDecoder } from 'node:string_decoder';
import type { TextSource, SourceMetadata } from '../../domain/ports/TextSource.js';

export interface FilePathSourceOptions {
  /** Encoding for decoding the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for each synchronous read. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Text source that reads a local file synchronously, one chunk at a time.
 * The file is opened on the first read and closed at its end, on a read
 * failure, or on `close()`. After a failed read every later read throws the
 * same error. Node.js only.
 */
export class FilePathSource implements TextSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;
  private readonly decoder: StringDecoder;
  private fd: number | null = null;
  private done = false;
  private failure: { readonly error: unknown } | null = null;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
    this.decoder = new StringDecoder(this.encoding);
  }

  read(): string | null {
    if (this.failure !== null) {
      throw this.failure.error;
    }
    if (this.done) {
      return null;
    }

    try {
      const fd = this.fd ?? this.open();
      const buffer = Buffer.alloc(this.highWaterMark);

      for (;;) {
        const bytesRead = readSync(fd, buffer, 0, buffer.length, null);
        if (bytesRead === 0) {
          const tail = this.decoder.end();
          this.close();
          return tail.length > 0 ? tail : null;
        }

        // A chunk holding only part of a multi-byte character decodes to ''.
        const text = this.decoder.write(buffer.subarray(0, bytesRead));
        if (text.length > 0) {
          return text;
        }
      }
    } catch (error) {
      this.failure = { error };
      this.release();
      throw error;
    }
  }

  sample(maxBytes?: number): string {
    const fd = openSync(this.filePath, 'r');
    try {
      const size = maxBytes ?? statSync(this.filePath).size;
      const buffer = Buffer.alloc(size);
      let offset = 0;

      while (offset < size) {
        const bytesRead = readSync(fd, buffer, offset, size - offset, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }

      return new StringDecoder(this.encoding).write(buffer.subarray(0, offset));
    } finally {
      closeSync(fd);
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath, { throwIfNoEntry: false });
    return {
      fileName: basename(this.filePath),
      fileSize: stats?.size,
    };
  }

  close(): void {
    this.done = true;
    this.release();
  }

  private release(): void {
    if (this.fd !== null) {
      const fd = this.fd;
      this.fd = null;
      closeSync(fd);
    }
  }

  private open(): number {
    this.fd = openSync(this.filePath, 'r');
    return this.fd;
  }
}
