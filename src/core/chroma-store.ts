import { ChromaClient } from 'chromadb';
import { config } from '../config';
import { errorMessage, VectorStoreError } from './errors';
import type { Chunk, EmbeddingVector, IndexManifest, SearchResult, VectorIndexEntry, VectorStore } from '../types';

type ChromaCollection = Awaited<ReturnType<ChromaClient['getOrCreateCollection']>>;

function readString(record: Record<string, unknown> | null | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(record: Record<string, unknown> | null | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Vector store backed by a Chroma server collection. The index manifest
 * lives in the collection metadata; the collection uses cosine distance.
 */
export class ChromaVectorStore implements VectorStore {
  private client: ChromaClient;
  private collection: ChromaCollection | null = null;
  private entryCount = 0;
  private readonly collectionName: string;
  private readonly chromaUrl: string;

  constructor(collectionName: string = config.rag.chromaCollection, chromaUrl: string = config.rag.chromaUrl) {
    this.collectionName = collectionName;
    this.chromaUrl = chromaUrl;
    this.client = new ChromaClient({ path: chromaUrl });
  }

  /**
   * Writes into a staging collection and swaps it in only after every entry
   * was added, so a failed rebuild leaves the previous index loadable.
   */
  async replace(entries: VectorIndexEntry[], manifest: IndexManifest): Promise<void> {
    const stagingName = `${this.collectionName}_staging`;
    await this.deleteIfPresent(stagingName);

    let staging: ChromaCollection;
    try {
      staging = await this.client.getOrCreateCollection({
        name: stagingName,
        metadata: { ...manifest, 'hnsw:space': 'cosine' }
      });

      await staging.add({
        ids: entries.map(entry => entry.chunk.id),
        embeddings: entries.map(entry => entry.embedding),
        documents: entries.map(entry => entry.chunk.text),
        metadatas: entries.map(entry => ({
          source: entry.chunk.source,
          page: entry.chunk.sourcePage,
          sequenceIndex: entry.chunk.sequenceIndex
        }))
      });
    } catch (error) {
      console.error(`Failed to add documents to collection: ${stagingName}`, errorMessage(error));
      await this.deleteIfPresent(stagingName);
      throw new VectorStoreError(`Add documents failed: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await this.deleteIfPresent(this.collectionName);
      await staging.modify({ name: this.collectionName });
    } catch (error) {
      this.collection = null;
      this.entryCount = 0;
      console.error(`Failed to swap in collection: ${this.collectionName}`, errorMessage(error));
      throw new VectorStoreError(`Swap collection failed: ${errorMessage(error)}`, { cause: error });
    }

    this.collection = staging;
    this.entryCount = entries.length;
    console.log(`Added ${entries.length} documents to collection: ${this.collectionName}`);
  }

  async load(): Promise<IndexManifest | null> {
    try {
      const collection = await this.client.getOrCreateCollection({ name: this.collectionName });
      const count = await collection.count();
      const manifest = this.readManifest(collection.metadata);

      if (count === 0 || !manifest) {
        return null;
      }

      this.collection = collection;
      this.entryCount = count;
      return manifest;
    } catch (error) {
      console.error(`Failed to load collection: ${this.collectionName}`, errorMessage(error));
      throw new VectorStoreError(`Vector DB load failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async search(queryEmbedding: EmbeddingVector, limit: number): Promise<SearchResult[]> {
    if (!this.collection || this.entryCount === 0) {
      return [];
    }

    try {
      const results = await this.collection.query({
        queryEmbeddings: [queryEmbedding],
        nResults: Math.min(limit, this.entryCount)
      });

      const ids = results.ids[0] ?? [];
      const documents = results.documents?.[0] ?? [];
      const metadatas = results.metadatas?.[0] ?? [];
      const distances = results.distances?.[0] ?? [];

      const searchResults: SearchResult[] = ids.map((id, i) => {
        const metadata = metadatas[i];
        const chunk: Chunk = {
          id,
          text: documents[i] ?? '',
          sourcePage: readNumber(metadata, 'page') ?? 0,
          sequenceIndex: readNumber(metadata, 'sequenceIndex') ?? 0,
          source: readString(metadata, 'source') ?? ''
        };
        // Cosine distance, so similarity = 1 - distance
        return { chunk, score: 1 - (distances[i] ?? 1) };
      });

      // Chroma does not define an order for ties; earlier chunks win
      return searchResults.sort((a, b) => b.score - a.score || a.chunk.sequenceIndex - b.chunk.sequenceIndex);
    } catch (error) {
      console.error(`Search failed in collection: ${this.collectionName}`, errorMessage(error));
      throw new VectorStoreError(`Search failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  count(): number {
    return this.entryCount;
  }

  describe(): string {
    return `${this.chromaUrl} (collection ${this.collectionName})`;
  }

  private async deleteIfPresent(name: string): Promise<void> {
    try {
      await this.client.deleteCollection({ name });
    } catch (error) {
      console.log(`No collection "${name}" to delete (${errorMessage(error)})`);
    }
  }

  private readManifest(metadata: Record<string, unknown> | null | undefined): IndexManifest | null {
    const documentId = readString(metadata, 'documentId');
    const source = readString(metadata, 'source');
    const fingerprint = readString(metadata, 'fingerprint');
    const pageCount = readNumber(metadata, 'pageCount');
    const chunkCount = readNumber(metadata, 'chunkCount');
    const chunkSize = readNumber(metadata, 'chunkSize');
    const chunkOverlap = readNumber(metadata, 'chunkOverlap');
    const embeddingModel = readString(metadata, 'embeddingModel');
    const createdAt = readString(metadata, 'createdAt');

    if (
      documentId === undefined ||
      source === undefined ||
      fingerprint === undefined ||
      pageCount === undefined ||
      chunkCount === undefined ||
      chunkSize === undefined ||
      chunkOverlap === undefined ||
      embeddingModel === undefined ||
      createdAt === undefined
    ) {
      return null;
    }

    return { documentId, source, fingerprint, pageCount, chunkCount, chunkSize, chunkOverlap, embeddingModel, createdAt };
  }
}
