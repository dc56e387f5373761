import type OpenAI from 'openai';
import { config } from '../config';
import { createOpenAIClient } from '../llm/client';
import { EmbeddingServiceError, errorMessage } from './errors';
import type { EmbeddingVector } from '../types';

export interface EmbeddingService {
  readonly model: string;
  generateEmbeddings(texts: string[]): Promise<EmbeddingVector[]>;
  generateQueryEmbedding(query: string): Promise<EmbeddingVector>;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private client: OpenAI | null = null;
  // Chunk embeddings of the documents indexed in this process
  private readonly cache = new Map<string, EmbeddingVector>();
  public readonly model: string;
  private readonly batchSize: number;

  constructor(model: string = config.rag.embeddingModel, batchSize: number = config.rag.embeddingBatchSize) {
    this.model = model;
    this.batchSize = batchSize;
  }

  /**
   * Generate embeddings for multiple texts, one request per batch.
   * Either every text gets an embedding or the call fails.
   */
  async generateEmbeddings(texts: string[]): Promise<EmbeddingVector[]> {
    const startTime = Date.now();
    const embeddings: EmbeddingVector[] = [];

    console.log(`Generating embeddings for ${texts.length} texts (batches of ${this.batchSize})`);

    for (let batchStart = 0; batchStart < texts.length; batchStart += this.batchSize) {
      const batch = texts.slice(batchStart, batchStart + this.batchSize);
      const missing = [...new Set(batch.filter(text => !this.cache.has(text)))];

      if (missing.length > 0) {
        const vectors = await this.requestEmbeddings(missing);
        missing.forEach((text, i) => this.cache.set(text, vectors[i]));
      }

      for (const text of batch) {
        const embedding = this.cache.get(text);
        if (!embedding) {
          throw new EmbeddingServiceError('Embedding missing from service response');
        }
        embeddings.push(embedding);
      }

      console.log(`Processed ${Math.min(batchStart + this.batchSize, texts.length)}/${texts.length} embeddings`);
    }

    console.log(`Embedding generation completed in ${Date.now() - startTime}ms (${texts.length} texts)`);
    return embeddings;
  }

  /**
   * Generate embedding for a single query. Queries read the chunk cache but
   * are never added to it.
   */
  async generateQueryEmbedding(query: string): Promise<EmbeddingVector> {
    const cached = this.cache.get(query);
    if (cached) {
      return cached;
    }

    const [embedding] = await this.requestEmbeddings([query]);
    return embedding;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async requestEmbeddings(input: string[]): Promise<EmbeddingVector[]> {
    const response = await this.getClient()
      .embeddings.create({ model: this.model, input })
      .catch((error: unknown) => {
        console.error('Embedding generation failed', errorMessage(error));
        throw new EmbeddingServiceError(`Failed to generate embeddings: ${errorMessage(error)}`, { cause: error });
      });

    if (response.data.length !== input.length) {
      throw new EmbeddingServiceError(
        `Embedding service returned ${response.data.length} vectors for ${input.length} inputs`
      );
    }

    return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = createOpenAIClient();
    }
    return this.client;
  }
}

// Singleton instance
export const embeddingService = new OpenAIEmbeddingService();
