/** Options controlling how delimited text is split and which lines are skipped. */
export interface LoadOptions {
  /** Character separating fields. Default: `'\t'`. */
  readonly delimiter?: string;
  /** When `true`, the first non-comment line is a header and is not parsed as a record. Default: `true`. */
  readonly header?: boolean;
  /** Lines starting with this character are skipped. `null` or `''` disables comments. Default: `null`. */
  readonly comment?: string | null;
}

/** `LoadOptions` with every default applied. */
export interface ResolvedLoadOptions {
  readonly delimiter: string;
  readonly header: boolean;
  readonly comment: string | null;
}

export const DEFAULT_LOAD_OPTIONS: ResolvedLoadOptions = {
  delimiter: '\t',
  header: true,
  comment: null,
};

/** Apply defaults and reject delimiters or comment prefixes the parser cannot honour. */
export function resolveOptions(options?: LoadOptions): ResolvedLoadOptions {
  const delimiter = options?.delimiter ?? DEFAULT_LOAD_OPTIONS.delimiter;
  const header = options?.header ?? DEFAULT_LOAD_OPTIONS.header;
  const comment = options?.comment || null;

  if (delimiter.length !== 1 || delimiter === '\n' || delimiter === '\r') {
    throw new Error(`Invalid delimiter ${JSON.stringify(delimiter)}: expected a single character other than a line break`);
  }
  if (comment !== null && comment.length !== 1) {
    throw new Error(`Invalid comment prefix ${JSON.stringify(comment)}: expected a single character`);
  }

  return { delimiter, header, comment };
}
