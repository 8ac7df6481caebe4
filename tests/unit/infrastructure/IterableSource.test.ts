import { describe, it, expect } from 'vitest';
import { IterableSource } from '../../../src/infrastructure/sources/IterableSource.js';

function readAll(source: IterableSource): string[] {
  const chunks: string[] = [];
  for (let chunk = source.read(); chunk !== null; chunk = source.read()) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('IterableSource', () => {
  it('should read string chunks in order, skipping empty ones', () => {
    const source = new IterableSource(['1\t', '', '2\n', '3\t4\n']);
    expect(readAll(source)).toEqual(['1\t', '2\n', '3\t4\n']);
  });

  it('should read chunks from a generator', () => {
    function* rows(): Generator<string> {
      for (let i = 1; i <= 3; i++) {
        yield `${i}\t${i * 10}\n`;
      }
    }

    expect(readAll(new IterableSource(rows())).join('')).toBe('1\t10\n2\t20\n3\t30\n');
  });

  it('should decode multi-byte characters split across Buffer chunks', () => {
    const bytes = Buffer.from('aé\n', 'utf-8');
    const source = new IterableSource([bytes.subarray(0, 2), bytes.subarray(2)]);

    expect(readAll(source).join('')).toBe('aé\n');
  });

  it('should replay sampled chunks on read', () => {
    let pulled = 0;
    function* counted(): Generator<string> {
      for (const chunk of ['row\tcolumn\n', '1\t2\n', '3\t4\n']) {
        pulled++;
        yield chunk;
      }
    }
    const source = new IterableSource(counted());

    expect(source.sample(5)).toBe('row\tc');
    expect(pulled).toBe(1);
    expect(readAll(source)).toEqual(['row\tcolumn\n', '1\t2\n', '3\t4\n']);
  });

  it('should limit samples by UTF-8 bytes without splitting characters', () => {
    const source = new IterableSource(['éé\n', 'x\n']);

    expect(source.sample(3)).toBe('é');
    expect(source.sample(4)).toBe('éé');
    expect(readAll(source).join('')).toBe('éé\nx\n');
  });

  it('should sample everything without maxBytes', () => {
    const source = new IterableSource(['a\n', 'b\n']);
    expect(source.sample()).toBe('a\nb\n');
    expect(readAll(source).join('')).toBe('a\nb\n');
  });

  it('should report metadata', () => {
    expect(new IterableSource([]).metadata()).toEqual({ fileName: 'iterable-input', fileSize: undefined });
    expect(new IterableSource([], { fileName: 'rows.tsv', fileSize: 12 }).metadata()).toEqual({
      fileName: 'rows.tsv',
      fileSize: 12,
    });
  });
});
