import { StringDecoder } from 'node:string_decoder';

/** Cut `text` to at most `maxBytes` of UTF-8, dropping a character split by the cut. */
export function truncateBytes(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, 'utf-8');
  if (bytes.length <= maxBytes) {
    return text;
  }
  return new StringDecoder('utf-8').write(bytes.subarray(0, maxBytes));
}
