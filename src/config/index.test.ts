import { describe, it, expect } from 'vitest';
import { Config } from './index';
import { ConfigError } from '../core/errors';

const baseEnv = { OPENAI_API_KEY: 'test-key' };

describe('Config', () => {
  it('applies defaults when the environment is empty', () => {
    const config = Config.fromEnv(baseEnv);

    expect(config.rag.chunkSize).toBe(1000);
    expect(config.rag.chunkOverlap).toBe(200);
    expect(config.rag.topK).toBe(4);
    expect(config.rag.embeddingModel).toBe('text-embedding-3-small');
    expect(config.rag.vectorStore).toBe('local');
    expect(config.rag.indexPath).toBe('./data/index');
    expect(config.rag.reuseIndex).toBe(true);
    expect(config.rag.defaultDocument).toBe('document.pdf');
    expect(config.openai.model).toBe('gpt-4o-mini');
    expect(config.openai.temperature).toBe(0.7);
    expect(config.openai.baseUrl).toBeUndefined();
    expect(() => config.validate()).not.toThrow();
  });

  it('reads overrides from the environment', () => {
    const config = Config.fromEnv({
      ...baseEnv,
      RAG_CHUNK_SIZE: '500',
      RAG_CHUNK_OVERLAP: '50',
      RAG_TOP_K: '6',
      VECTOR_STORE: 'chroma',
      CHROMA_COLLECTION: 'manuals',
      REUSE_INDEX: 'false',
      OPENAI_BASE_URL: 'http://localhost:4010/v1'
    });

    expect(config.rag.chunkSize).toBe(500);
    expect(config.rag.chunkOverlap).toBe(50);
    expect(config.rag.topK).toBe(6);
    expect(config.rag.vectorStore).toBe('chroma');
    expect(config.rag.chromaCollection).toBe('manuals');
    expect(config.rag.reuseIndex).toBe(false);
    expect(config.openai.baseUrl).toBe('http://localhost:4010/v1');
  });

  it('rejects a missing API key', () => {
    const config = Config.fromEnv({});
    expect(() => config.validate()).toThrow(ConfigError);
    expect(() => config.validate()).toThrow(/OPENAI_API_KEY/);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    const config = Config.fromEnv({ ...baseEnv, RAG_CHUNK_SIZE: '200', RAG_CHUNK_OVERLAP: '200' });
    expect(() => config.validate()).toThrow('RAG_CHUNK_OVERLAP must be less than RAG_CHUNK_SIZE');
  });

  it('rejects a non-numeric chunk size', () => {
    const config = Config.fromEnv({ ...baseEnv, RAG_CHUNK_SIZE: 'large' });
    expect(() => config.validate()).toThrow('RAG_CHUNK_SIZE must be a positive integer');
  });

  it('rejects top-k below one', () => {
    const config = Config.fromEnv({ ...baseEnv, RAG_TOP_K: '0' });
    expect(() => config.validate()).toThrow('RAG_TOP_K must be at least 1');
  });

  it('rejects an unknown vector store', () => {
    const config = Config.fromEnv({ ...baseEnv, VECTOR_STORE: 'faiss' });
    expect(config.rag.vectorStore).toBe('local');
    expect(() => config.validate()).toThrow('VECTOR_STORE must be one of local, chroma (got "faiss")');
  });
});
