import * as fs from 'fs';
import type { Chunk } from '../types';

export type ParsedInput = { kind: 'quit' } | { kind: 'empty' } | { kind: 'question'; text: string };

const QUIT_WORDS = new Set(['quit', 'exit', 'q']);
const PREVIEW_LENGTH = 150;
const PREVIEW_SOURCES = 2;

/**
 * Classify one line typed at the prompt.
 */
export function parseInput(line: string): ParsedInput {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'empty' };
  }
  if (QUIT_WORDS.has(trimmed.toLowerCase())) {
    return { kind: 'quit' };
  }
  return { kind: 'question', text: trimmed };
}

export function formatSources(chunks: Chunk[]): string {
  const lines = [`Sources: Found ${chunks.length} relevant chunks`];

  chunks.slice(0, PREVIEW_SOURCES).forEach((chunk, i) => {
    const preview = chunk.text.length > PREVIEW_LENGTH ? `${chunk.text.slice(0, PREVIEW_LENGTH)}...` : chunk.text;
    lines.push(`  Source ${i + 1} (Page ${chunk.sourcePage}): ${preview}`);
  });

  return lines.join('\n');
}

/**
 * Document path typed at the startup prompt; blank means the default.
 * Quotes left over from drag-and-drop are stripped.
 */
export function resolveDocumentPath(input: string, fallback: string): string {
  const cleaned = input.trim().replace(/^["']|["']$/g, '').trim();
  if (!cleaned) {
    return fallback;
  }

  // Try with .pdf extension if missing
  if (!fs.existsSync(cleaned) && fs.existsSync(`${cleaned}.pdf`)) {
    return `${cleaned}.pdf`;
  }
  return cleaned;
}
