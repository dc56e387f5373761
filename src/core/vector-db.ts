import * as fs from 'fs';
import * as path from 'path';
import { config } from '../config';
import { ChromaVectorStore } from './chroma-store';
import { errorMessage, ParseError, VectorStoreError } from './errors';
import type {
  Chunk,
  EmbeddingVector,
  IndexManifest,
  SearchResult,
  VectorIndexEntry,
  VectorStore,
  VectorStoreKind
} from '../types';

const INDEX_FILE = 'index.json';
const INDEX_VERSION = 1;

interface PersistedIndex {
  version: typeof INDEX_VERSION;
  manifest: IndexManifest;
  entries: VectorIndexEntry[];
}

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Rank entries by cosine similarity to the query, nearest first.
 * Equal scores keep insertion order.
 */
export function rankBySimilarity(
  entries: VectorIndexEntry[],
  queryEmbedding: EmbeddingVector,
  limit: number
): SearchResult[] {
  return entries
    .map((entry, position) => ({
      chunk: entry.chunk,
      score: cosineSimilarity(entry.embedding, queryEmbedding),
      position
    }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, limit)
    .map(({ chunk, score }) => ({ chunk, score }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isChunk(value: unknown): value is Chunk {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.text === 'string' &&
    typeof value.sourcePage === 'number' &&
    typeof value.sequenceIndex === 'number' &&
    typeof value.source === 'string'
  );
}

export function isIndexManifest(value: unknown): value is IndexManifest {
  return (
    isRecord(value) &&
    typeof value.documentId === 'string' &&
    typeof value.source === 'string' &&
    typeof value.fingerprint === 'string' &&
    typeof value.pageCount === 'number' &&
    typeof value.chunkCount === 'number' &&
    typeof value.chunkSize === 'number' &&
    typeof value.chunkOverlap === 'number' &&
    typeof value.embeddingModel === 'string' &&
    typeof value.createdAt === 'string'
  );
}

function isPersistedIndex(value: unknown): value is PersistedIndex {
  return (
    isRecord(value) &&
    value.version === INDEX_VERSION &&
    isIndexManifest(value.manifest) &&
    Array.isArray(value.entries) &&
    value.entries.every(
      (entry: unknown) =>
        isRecord(entry) &&
        isChunk(entry.chunk) &&
        Array.isArray(entry.embedding) &&
        entry.embedding.every((n: unknown) => typeof n === 'number')
    )
  );
}

/**
 * Vector store kept in memory and persisted as a single JSON file.
 */
export class LocalVectorStore implements VectorStore {
  private entries: VectorIndexEntry[] = [];
  private readonly filePath: string;

  constructor(indexPath: string = config.rag.indexPath) {
    this.filePath = path.join(indexPath, INDEX_FILE);
  }

  async replace(entries: VectorIndexEntry[], manifest: IndexManifest): Promise<void> {
    const payload: PersistedIndex = { version: INDEX_VERSION, manifest, entries };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(payload));
      // Atomic replace
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      console.error(`Failed to persist vector index: ${this.filePath}`, errorMessage(error));
      throw new VectorStoreError(`Failed to persist vector index: ${errorMessage(error)}`, { cause: error });
    }

    this.entries = [...entries];
    console.log(`Persisted ${entries.length} entries to ${this.filePath}`);
  }

  async load(): Promise<IndexManifest | null> {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ParseError(`Persisted index is not valid JSON: ${this.filePath}`, { cause: error });
    }

    if (!isPersistedIndex(parsed)) {
      throw new ParseError(`Persisted index has an unexpected shape: ${this.filePath}`);
    }

    this.entries = parsed.entries;
    console.log(`Loaded ${this.entries.length} entries from ${this.filePath}`);
    return parsed.manifest;
  }

  async search(queryEmbedding: EmbeddingVector, limit: number): Promise<SearchResult[]> {
    return rankBySimilarity(this.entries, queryEmbedding, limit);
  }

  count(): number {
    return this.entries.length;
  }

  describe(): string {
    return this.filePath;
  }
}

export function createVectorStore(kind: VectorStoreKind = config.rag.vectorStore): VectorStore {
  switch (kind) {
    case 'chroma':
      return new ChromaVectorStore();
    case 'local':
      return new LocalVectorStore();
  }
}
