import type { TextSource } from '../domain/ports/TextSource.js';
import { IoError } from '../domain/model/TsvError.js';

/**
 * Reads lines from a `TextSource` with one line of lookahead.
 *
 * The held line is explicit state: `peek()` fills it, `consume()` hands it
 * out and clears it, so peek/consume behave the same whatever the chunking of
 * the source. Lines end at `\n`; a trailing `\n` does not start another line.
 */
export class LineReader {
  private buffer = '';
  private offset = 0;
  private exhausted = false;
  private held: string | null = null;
  private consumed = 0;

  constructor(private readonly source: TextSource) {}

  /** Number of lines handed out by `consume()`. Zero before the first one. */
  get lineNumber(): number {
    return this.consumed;
  }

  /** Return the next line and advance past it, or `null` at the end of the input. */
  consume(): string | null {
    const line = this.peek();
    if (line !== null) {
      this.held = null;
      this.consumed++;
    }
    return line;
  }

  /** Return the next line without advancing. Repeated calls return the same line. */
  peek(): string | null {
    if (this.held === null) {
      this.held = this.nextLine();
    }
    return this.held;
  }

  private nextLine(): string | null {
    for (;;) {
      const newline = this.buffer.indexOf('\n', this.offset);
      if (newline !== -1) {
        const line = this.buffer.slice(this.offset, newline);
        this.offset = newline + 1;
        return line;
      }

      if (this.exhausted) {
        if (this.offset >= this.buffer.length) {
          return null;
        }
        const line = this.buffer.slice(this.offset);
        this.buffer = '';
        this.offset = 0;
        return line;
      }

      const chunk = this.readChunk();
      if (chunk === null) {
        this.exhausted = true;
      } else {
        this.buffer = this.buffer.slice(this.offset) + chunk;
        this.offset = 0;
      }
    }
  }

  private readChunk(): string | null {
    try {
      return this.source.read();
    } catch (error) {
      throw new IoError({ cause: error });
    }
  }
}
