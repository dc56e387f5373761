import { config } from '../config';
import { ConfigError } from './errors';
import type { Chunk, PageRecord } from '../types';

export class TextChunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(chunkSize: number = config.rag.chunkSize, chunkOverlap: number = config.rag.chunkOverlap) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigError(`Chunk size must be a positive integer (got ${chunkSize})`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigError(`Chunk overlap must be between 0 and ${chunkSize - 1} (got ${chunkOverlap})`);
    }
    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
  }

  /**
   * Split text into windows of `chunkSize` characters. Each window starts
   * `chunkSize - chunkOverlap` characters after the previous one, so
   * neighbours share exactly `chunkOverlap` characters; the window that
   * reaches the end of the text is the last and may be shorter.
   */
  chunkText(text: string): string[] {
    if (!text) {
      return [];
    }

    const step = this.chunkSize - this.chunkOverlap;
    const chunks: string[] = [];

    for (let start = 0; ; start += step) {
      chunks.push(text.slice(start, start + this.chunkSize));
      if (start + this.chunkSize >= text.length) {
        break;
      }
    }

    return chunks;
  }

  /**
   * Chunk every page on its own; a chunk never carries text from two pages.
   */
  chunkPages(pages: PageRecord[], source: string, documentId: string): Chunk[] {
    const chunks: Chunk[] = [];

    for (const page of pages) {
      for (const text of this.chunkText(page.text)) {
        const sequenceIndex = chunks.length;
        chunks.push({
          id: `${documentId}_chunk_${sequenceIndex}`,
          text,
          sourcePage: page.pageNumber,
          sequenceIndex,
          source
        });
      }
    }

    return chunks;
  }

  getSettings(): { chunkSize: number; chunkOverlap: number } {
    return { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap };
  }
}
