import { describe, it, expect } from 'vitest';
import { TextChunker } from './chunker';
import { ConfigError } from './errors';
import type { PageRecord } from '../types';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

describe('TextChunker.chunkText', () => {
  it('slides a fixed window with the configured overlap', () => {
    const chunker = new TextChunker(10, 3);
    expect(chunker.chunkText(ALPHABET)).toEqual([
      'abcdefghij',
      'hijklmnopq',
      'opqrstuvwx',
      'vwxyz'
    ]);
  });

  it('returns a single chunk when the text fits', () => {
    const chunker = new TextChunker(26, 5);
    expect(chunker.chunkText(ALPHABET)).toEqual([ALPHABET]);
  });

  it('returns nothing for empty text', () => {
    expect(new TextChunker(10, 2).chunkText('')).toEqual([]);
  });

  it('supports zero overlap', () => {
    const chunker = new TextChunker(10, 0);
    expect(chunker.chunkText(ALPHABET)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxyz']);
  });

  it('keeps every chunk within the size and overlaps neighbours exactly', () => {
    const text = 'The quick brown fox jumps over the lazy dog. '.repeat(40);
    for (const [size, overlap] of [[100, 20], [64, 63], [250, 0], [37, 11]]) {
      const chunks = new TextChunker(size, overlap).chunkText(text);
      for (let i = 0; i < chunks.length; i++) {
        expect(chunks[i].length).toBeLessThanOrEqual(size);
        if (i > 0 && overlap > 0) {
          expect(chunks[i].slice(0, overlap)).toBe(chunks[i - 1].slice(-overlap));
        }
      }
    }
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new TextChunker(10, 10)).toThrow(ConfigError);
    expect(() => new TextChunker(0, 0)).toThrow(ConfigError);
    expect(() => new TextChunker(10, -1)).toThrow(ConfigError);
  });
});

describe('TextChunker.chunkPages', () => {
  it('attributes every chunk to exactly one page', () => {
    const pages: PageRecord[] = [
      { text: 'abcdefghijklmno', pageNumber: 1 },
      { text: '', pageNumber: 2 },
      { text: 'pqrstu', pageNumber: 3 }
    ];

    const chunks = new TextChunker(10, 4).chunkPages(pages, 'guide.pdf', 'doc1');

    expect(chunks).toEqual([
      { id: 'doc1_chunk_0', text: 'abcdefghij', sourcePage: 1, sequenceIndex: 0, source: 'guide.pdf' },
      { id: 'doc1_chunk_1', text: 'ghijklmno', sourcePage: 1, sequenceIndex: 1, source: 'guide.pdf' },
      { id: 'doc1_chunk_2', text: 'pqrstu', sourcePage: 3, sequenceIndex: 2, source: 'guide.pdf' }
    ]);
  });

  it('is deterministic', () => {
    const pages: PageRecord[] = [{ text: ALPHABET.repeat(5), pageNumber: 1 }];
    const chunker = new TextChunker(30, 7);
    expect(chunker.chunkPages(pages, 'a.pdf', 'd')).toEqual(chunker.chunkPages(pages, 'a.pdf', 'd'));
  });

  it('covers the source text once overlaps are removed', () => {
    // 10 pages, 5000 characters in total
    const pages: PageRecord[] = Array.from({ length: 10 }, (_, i) => ({
      text: `page ${i + 1} `.padEnd(500, 'x'),
      pageNumber: i + 1
    }));

    const chunks = new TextChunker(1000, 200).chunkPages(pages, 'report.pdf', 'r');

    let covered = 0;
    chunks.forEach((chunk, i) => {
      const previous = chunks[i - 1];
      const sharesPage = previous !== undefined && previous.sourcePage === chunk.sourcePage;
      covered += chunk.text.length - (sharesPage ? 200 : 0);
    });

    expect(chunks).toHaveLength(10);
    expect(covered).toBe(5000);
  });

  it('removes overlap correctly for pages that need several windows', () => {
    const pages: PageRecord[] = [
      { text: 'a'.repeat(2300), pageNumber: 1 },
      { text: 'b'.repeat(700), pageNumber: 2 }
    ];

    const chunks = new TextChunker(1000, 200).chunkPages(pages, 'long.pdf', 'l');

    expect(chunks.map(c => [c.sourcePage, c.text.length])).toEqual([
      [1, 1000],
      [1, 1000],
      [1, 700],
      [2, 700]
    ]);
  });
});
