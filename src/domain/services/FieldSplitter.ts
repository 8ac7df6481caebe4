import { FormatError } from '../model/TsvError.js';

/**
 * Splits one line into field tokens at a single literal delimiter, one token
 * at a time.
 *
 * An empty line holds no tokens. Otherwise every delimiter separates two
 * tokens, so `"a\t"` holds `"a"` and `""`, and `"\t\t"` holds three empty
 * tokens. There is no quoting or escaping.
 */
export class FieldSplitter {
  private position: number | null;

  constructor(
    private readonly text: string,
    private readonly delimiter: string,
  ) {
    this.position = text.length > 0 ? 0 : null;
  }

  /** `true` while at least one more token is available. */
  hasNext(): boolean {
    return this.position !== null;
  }

  /** Return the next token. Throws `FormatError('MISSING_FIELD')` once the line is exhausted. */
  next(): string {
    if (this.position === null) {
      throw new FormatError('MISSING_FIELD');
    }

    const start = this.position;
    const end = this.text.indexOf(this.delimiter, start);

    if (end === -1) {
      this.position = null;
      return this.text.slice(start);
    }

    this.position = end + this.delimiter.length;
    return this.text.slice(start, end);
  }

  /** Return every remaining token. */
  rest(): string[] {
    const tokens: string[] = [];
    while (this.hasNext()) {
      tokens.push(this.next());
    }
    return tokens;
  }
}

/** Split a whole line into its tokens. */
export function splitFields(text: string, delimiter: string): string[] {
  return new FieldSplitter(text, delimiter).rest();
}
