// Core types for the document chat pipeline
export interface PageRecord {
  text: string;
  pageNumber: number;
}

export interface Chunk {
  id: string;
  text: string;
  sourcePage: number;
  sequenceIndex: number;
  source: string;
}

export type EmbeddingVector = number[];

export interface VectorIndexEntry {
  chunk: Chunk;
  embedding: EmbeddingVector;
}

export interface IndexManifest {
  documentId: string;
  source: string;
  fingerprint: string;
  pageCount: number;
  chunkCount: number;
  chunkSize: number;
  chunkOverlap: number;
  embeddingModel: string;
  createdAt: string;
}

export interface SearchResult {
  chunk: Chunk;
  score: number;
}

export interface ConversationTurn {
  question: string;
  answer: string;
}

export interface RetrievalResult {
  answer: string;
  chunks: Chunk[];
  processingTime: number;
}

export interface IngestResponse {
  documentId: string;
  source: string;
  title: string;
  pageCount: number;
  chunkCount: number;
  reused: boolean;
  processingTime: number;
}

export interface DocumentMetadata {
  pages: number;
  title: string;
  author?: string;
  fileSize: number;
  fileName: string;
}

/**
 * Persistence behind the vector index. Implementations own the stored
 * entries; ranking is cosine similarity, nearest first.
 */
export interface VectorStore {
  /** Replace everything previously persisted with `entries`. */
  replace(entries: VectorIndexEntry[], manifest: IndexManifest): Promise<void>;
  /** Restore persisted state, or `null` when nothing has been persisted. */
  load(): Promise<IndexManifest | null>;
  search(queryEmbedding: EmbeddingVector, limit: number): Promise<SearchResult[]>;
  count(): number;
  describe(): string;
}

// Configuration types
export type VectorStoreKind = 'local' | 'chroma';

export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  embeddingModel: string;
  embeddingBatchSize: number;
  vectorStore: VectorStoreKind;
  indexPath: string;
  chromaUrl: string;
  chromaCollection: string;
  reuseIndex: boolean;
  defaultDocument: string;
  personalityFile: string;
  maxFileSizeMb: number;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
}
