import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_RAG_PERSONALITY, getRAGPersonality } from './personality';
import { makeTempDir } from '../test-utils/pdf';

describe('getRAGPersonality', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the prompt from the personality file', () => {
    const file = path.join(dir, 'rag-personality.txt');
    fs.writeFileSync(file, '  Answer like a ship captain.\n');

    expect(getRAGPersonality(file)).toBe('Answer like a ship captain.');
  });

  it('falls back to the default when the file is missing or blank', () => {
    const blank = path.join(dir, 'blank.txt');
    fs.writeFileSync(blank, '\n  \n');

    expect(getRAGPersonality(path.join(dir, 'missing.txt'))).toBe(DEFAULT_RAG_PERSONALITY);
    expect(getRAGPersonality(blank)).toBe(DEFAULT_RAG_PERSONALITY);
  });
});
