import { CompletionServiceError, EmbeddingServiceError } from '../core/errors';
import type { EmbeddingService } from '../core/embeddings';
import type { ChatClient, ChatMessage, ChatOptions } from '../llm/client';
import type { EmbeddingVector } from '../types';

const DIMENSIONS = 512;

function fnv1a(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Bag-of-words embedding: each word bumps one hashed dimension.
 * Texts sharing words score higher; identical texts score 1.
 */
export function hashEmbedding(text: string): EmbeddingVector {
  const vector: number[] = new Array(DIMENSIONS).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[fnv1a(word) % DIMENSIONS] += 1;
  }
  return vector;
}

export class FakeEmbeddingService implements EmbeddingService {
  readonly model = 'fake-embedding';
  readonly requests: string[][] = [];
  failWith: Error | null = null;

  async generateEmbeddings(texts: string[]): Promise<EmbeddingVector[]> {
    this.requests.push([...texts]);
    if (this.failWith) {
      throw new EmbeddingServiceError(`Failed to generate embeddings: ${this.failWith.message}`, { cause: this.failWith });
    }
    return texts.map(hashEmbedding);
  }

  async generateQueryEmbedding(query: string): Promise<EmbeddingVector> {
    const [embedding] = await this.generateEmbeddings([query]);
    return embedding;
  }
}

export class FakeChatClient implements ChatClient {
  readonly model = 'fake-chat';
  readonly calls: ChatMessage[][] = [];
  private readonly answers: string[];
  failWith: Error | null = null;

  constructor(...answers: string[]) {
    this.answers = answers;
  }

  async chat(messages: ChatMessage[], _options?: ChatOptions): Promise<string> {
    this.calls.push(messages.map(message => ({ ...message })));
    if (this.failWith) {
      throw new CompletionServiceError(`Failed to chat with OpenAI: ${this.failWith.message}`, { cause: this.failWith });
    }
    return this.answers.shift() ?? `answer ${this.calls.length}`;
  }
}
