import type { TextSource, SourceMetadata } from '../../domain/ports/TextSource.js';
import { truncateBytes } from './truncateBytes.js';

/** Text source over an in-memory string or Buffer. The whole content is a single chunk. */
export class BufferSource implements TextSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;
  private done = false;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data) : data.length,
    };
  }

  read(): string | null {
    if (this.done) {
      return null;
    }
    this.done = true;
    return this.content;
  }

  sample(maxBytes?: number): string {
    return maxBytes === undefined ? this.content : truncateBytes(this.content, maxBytes);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
