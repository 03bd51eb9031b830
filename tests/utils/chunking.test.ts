import { describe, it, expect } from 'vitest';
import { chunkText } from '../../src/utils/chunking.js';

describe('chunkText', () => {
  it('should split on token boundaries', () => {
    expect(chunkText('a b c d e', 2)).toEqual(['a b', 'c d', 'e']);
  });

  it('should collapse runs of whitespace', () => {
    expect(chunkText('  one\n\ntwo\tthree  ', 10)).toEqual(['one two three']);
  });

  it('should return no chunks for blank text', () => {
    expect(chunkText('   \n ')).toEqual([]);
  });

  it('should default to 500 tokens per chunk', () => {
    const text = Array.from({ length: 1200 }, (_, i) => `w${i}`).join(' ');
    const chunks = chunkText(text);

    expect(chunks).toHaveLength(3);
    expect(chunks[0].split(' ')).toHaveLength(500);
    expect(chunks[2].split(' ')).toHaveLength(200);
    expect(chunks[2].startsWith('w1000 ')).toBe(true);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => chunkText('a b', 0)).toThrow(RangeError);
  });
});
