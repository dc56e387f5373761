import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { formatSources, parseInput, resolveDocumentPath } from './commands';
import { makeTempDir } from '../test-utils/pdf';
import type { Chunk } from '../types';

function chunk(text: string, sourcePage: number): Chunk {
  return { id: `d_chunk_${sourcePage}`, text, sourcePage, sequenceIndex: sourcePage, source: 'doc.pdf' };
}

describe('parseInput', () => {
  it('recognises quit words in any case', () => {
    for (const line of ['quit', 'EXIT', ' q ', 'Quit\n']) {
      expect(parseInput(line)).toEqual({ kind: 'quit' });
    }
  });

  it('treats blank lines as empty', () => {
    expect(parseInput('')).toEqual({ kind: 'empty' });
    expect(parseInput('   \t')).toEqual({ kind: 'empty' });
  });

  it('treats everything else as a question', () => {
    expect(parseInput('  what is q?  ')).toEqual({ kind: 'question', text: 'what is q?' });
    expect(parseInput('quit smoking?')).toEqual({ kind: 'question', text: 'quit smoking?' });
  });
});

describe('formatSources', () => {
  it('previews the first two sources with page numbers', () => {
    const long = 'x'.repeat(160);
    const output = formatSources([chunk('Short text.', 3), chunk(long, 5), chunk('Third.', 9)]);

    expect(output.split('\n')).toEqual([
      'Sources: Found 3 relevant chunks',
      '  Source 1 (Page 3): Short text.',
      `  Source 2 (Page 5): ${'x'.repeat(150)}...`
    ]);
  });

  it('reports when nothing was retrieved', () => {
    expect(formatSources([])).toBe('Sources: Found 0 relevant chunks');
  });
});

describe('resolveDocumentPath', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the default for blank input', () => {
    expect(resolveDocumentPath('  ', 'document.pdf')).toBe('document.pdf');
  });

  it('strips surrounding quotes', () => {
    expect(resolveDocumentPath(`'${dir}/a file.pdf'`, 'document.pdf')).toBe(`${dir}/a file.pdf`);
  });

  it('adds a missing .pdf extension when that file exists', () => {
    fs.writeFileSync(path.join(dir, 'manual.pdf'), '%PDF-1.4');

    expect(resolveDocumentPath(path.join(dir, 'manual'), 'document.pdf')).toBe(path.join(dir, 'manual.pdf'));
  });
});
