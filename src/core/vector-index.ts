import { EmbeddingServiceError, NotBuiltError } from './errors';
import type { EmbeddingService } from './embeddings';
import type { Chunk, IndexManifest, SearchResult, VectorIndexEntry, VectorStore } from '../types';

/**
 * Embedded chunks of one document, ranked by cosine similarity.
 * Queries are rejected until the index has been built or loaded.
 */
export class VectorIndex {
  private currentManifest: IndexManifest | null = null;

  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly store: VectorStore
  ) {}

  get isBuilt(): boolean {
    return this.currentManifest !== null;
  }

  get size(): number {
    return this.isBuilt ? this.store.count() : 0;
  }

  get manifest(): IndexManifest | null {
    return this.currentManifest;
  }

  /**
   * Embed every chunk and replace whatever the store held before.
   * Nothing is persisted when embedding fails.
   */
  async build(chunks: Chunk[], manifest: IndexManifest): Promise<void> {
    const startTime = Date.now();
    this.currentManifest = null;

    const vectors = await this.embeddings.generateEmbeddings(chunks.map(chunk => chunk.text));
    if (vectors.length !== chunks.length) {
      throw new EmbeddingServiceError(`Expected ${chunks.length} embeddings, got ${vectors.length}`);
    }

    const entries: VectorIndexEntry[] = chunks.map((chunk, i) => ({ chunk, embedding: vectors[i] }));
    await this.store.replace(entries, manifest);

    this.currentManifest = manifest;
    console.log(`Vector index built in ${Date.now() - startTime}ms (${entries.length} chunks, ${this.store.describe()})`);
  }

  /**
   * Restore a previously persisted index; `null` when there is none or
   * when `accept` turns the persisted manifest down.
   */
  async load(accept: (manifest: IndexManifest) => boolean = () => true): Promise<IndexManifest | null> {
    this.currentManifest = null;

    const manifest = await this.store.load();
    if (manifest && accept(manifest)) {
      this.currentManifest = manifest;
    }
    return this.currentManifest;
  }

  /**
   * The `k` chunks nearest to `text`, nearest first.
   */
  async query(text: string, k: number): Promise<Chunk[]> {
    const results = await this.search(text, k);
    return results.map(result => result.chunk);
  }

  async search(text: string, k: number): Promise<SearchResult[]> {
    if (!this.isBuilt) {
      throw new NotBuiltError();
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer (got ${k})`);
    }

    const limit = Math.min(k, this.store.count());
    if (limit === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.generateQueryEmbedding(text);
    return this.store.search(queryEmbedding, limit);
  }
}
