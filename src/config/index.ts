import { ConfigError } from '../core/errors';
import type { OpenAIConfig, RagConfig, VectorStoreKind } from '../types';

const VECTOR_STORES: readonly VectorStoreKind[] = ['local', 'chroma'];

function isVectorStoreKind(value: string): value is VectorStoreKind {
  return VECTOR_STORES.some(kind => kind === value);
}

export class Config {
  private static instance: Config;
  public readonly rag: RagConfig;
  public readonly openai: OpenAIConfig;
  private readonly requestedVectorStore: string;

  private constructor(env: NodeJS.ProcessEnv) {
    this.requestedVectorStore = env.VECTOR_STORE || 'local';

    this.rag = {
      chunkSize: parseInt(env.RAG_CHUNK_SIZE || '1000'),
      chunkOverlap: parseInt(env.RAG_CHUNK_OVERLAP || '200'),
      topK: parseInt(env.RAG_TOP_K || '4'),
      embeddingModel: env.EMBEDDING_MODEL || 'text-embedding-3-small',
      embeddingBatchSize: parseInt(env.EMBEDDING_BATCH_SIZE || '100'),
      vectorStore: isVectorStoreKind(this.requestedVectorStore) ? this.requestedVectorStore : 'local',
      indexPath: env.INDEX_PATH || './data/index',
      chromaUrl: env.CHROMA_URL || 'http://localhost:8000',
      chromaCollection: env.CHROMA_COLLECTION || 'docchat',
      reuseIndex: env.REUSE_INDEX !== 'false',
      defaultDocument: env.DEFAULT_DOCUMENT || 'document.pdf',
      personalityFile: env.RAG_PERSONALITY_FILE || './rag-personality.txt',
      maxFileSizeMb: parseInt(env.MAX_FILE_SIZE_MB || '50')
    };

    this.openai = {
      apiKey: env.OPENAI_API_KEY || '',
      baseUrl: env.OPENAI_BASE_URL || undefined,
      model: env.OPENAI_MODEL || 'gpt-4o-mini',
      temperature: parseFloat(env.OPENAI_TEMPERATURE || '0.7')
    };
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
    }
    return Config.instance;
  }

  /**
   * Build a standalone configuration from an explicit environment.
   */
  public static fromEnv(env: NodeJS.ProcessEnv): Config {
    return new Config(env);
  }

  public validate(): void {
    if (!this.openai.apiKey.trim()) {
      throw new ConfigError('OPENAI_API_KEY not found in environment. Create a .env file with: OPENAI_API_KEY=your_key_here');
    }

    // Chunk settings
    if (!Number.isInteger(this.rag.chunkSize) || this.rag.chunkSize <= 0) {
      throw new ConfigError('RAG_CHUNK_SIZE must be a positive integer');
    }
    if (!Number.isInteger(this.rag.chunkOverlap) || this.rag.chunkOverlap < 0) {
      throw new ConfigError('RAG_CHUNK_OVERLAP must be a non-negative integer');
    }
    if (this.rag.chunkOverlap >= this.rag.chunkSize) {
      throw new ConfigError('RAG_CHUNK_OVERLAP must be less than RAG_CHUNK_SIZE');
    }

    if (!Number.isInteger(this.rag.topK) || this.rag.topK < 1) {
      throw new ConfigError('RAG_TOP_K must be at least 1');
    }
    if (!Number.isInteger(this.rag.embeddingBatchSize) || this.rag.embeddingBatchSize < 1) {
      throw new ConfigError('EMBEDDING_BATCH_SIZE must be at least 1');
    }
    if (!isVectorStoreKind(this.requestedVectorStore)) {
      throw new ConfigError(`VECTOR_STORE must be one of ${VECTOR_STORES.join(', ')} (got "${this.requestedVectorStore}")`);
    }
    if (!(this.rag.maxFileSizeMb > 0)) {
      throw new ConfigError('MAX_FILE_SIZE_MB must be positive');
    }

    if (!(this.openai.temperature >= 0 && this.openai.temperature <= 2)) {
      throw new ConfigError('OPENAI_TEMPERATURE must be between 0 and 2');
    }
  }
}

export const config = Config.getInstance();
