import Papa from 'papaparse';
import type { TextSource } from '../domain/ports/TextSource.js';
import type { LoadOptions } from '../domain/model/LoadOptions.js';
import { DEFAULT_LOAD_OPTIONS } from '../domain/model/LoadOptions.js';

/** Delimiters tried by `detectOptions`, in order of preference. */
export const CANDIDATE_DELIMITERS: readonly string[] = ['\t', ',', ';', '|'];

const SAMPLE_BYTES = 64 * 1024;
const SAMPLE_ROWS = 10;

/**
 * Guess the delimiter of a delimited document from its first lines.
 *
 * Comment lines (when `comment` is given) and empty lines are ignored. Falls
 * back to the default tab delimiter when no candidate splits the sample
 * consistently.
 */
export function detectOptions(input: TextSource | string | Buffer, comment?: string | null): LoadOptions {
  const sample =
    typeof input === 'string' ? input : Buffer.isBuffer(input) ? input.toString('utf-8') : input.sample(SAMPLE_BYTES);

  const result = Papa.parse<string[]>(sample, {
    delimitersToGuess: [...CANDIDATE_DELIMITERS],
    comments: comment || false,
    skipEmptyLines: true,
    preview: SAMPLE_ROWS,
  });

  const undetectable = result.errors.some((e) => e.code === 'UndetectableDelimiter');
  const delimiter = undetectable || !CANDIDATE_DELIMITERS.includes(result.meta.delimiter)
    ? DEFAULT_LOAD_OPTIONS.delimiter
    : result.meta.delimiter;

  return comment ? { delimiter, comment } : { delimiter };
}
