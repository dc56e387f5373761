import { chatClient, type ChatClient, type ChatMessage } from './client';
import { config } from '../config';
import { getRAGPersonality } from '../core/personality';
import { NotBuiltError, NotReadyError } from '../core/errors';
import type { VectorIndex } from '../core/vector-index';
import type { Chunk, ConversationTurn, RetrievalResult } from '../types';

export type ChatState = 'UNINITIALIZED' | 'READY';

export interface RAGChatOptions {
  topK?: number;
  systemPrompt?: string;
  temperature?: number;
}

/**
 * Format retrieved chunks as context for the LLM
 */
export function formatContext(chunks: Chunk[]): string {
  return chunks
    .map((chunk, index) => `[Source ${index + 1}: ${chunk.source}, Page ${chunk.sourcePage}]\n${chunk.text}`)
    .join('\n\n---\n\n');
}

export function buildUserPrompt(question: string, chunks: Chunk[]): string {
  return `Context from documents:
${formatContext(chunks)}

Question: ${question}

Answer the question using only the information from the context above.`;
}

/**
 * Answers questions about one indexed document and keeps the running
 * transcript. A failed question leaves the transcript untouched.
 */
export class RAGChat {
  private index: VectorIndex | null = null;
  private turns: ConversationTurn[] = [];
  private readonly topK: number;
  private readonly temperature: number | undefined;
  private systemPrompt: string | undefined;

  constructor(private readonly client: ChatClient = chatClient, options: RAGChatOptions = {}) {
    this.topK = options.topK ?? config.rag.topK;
    this.systemPrompt = options.systemPrompt;
    this.temperature = options.temperature;
  }

  get model(): string {
    return this.client.model;
  }

  get state(): ChatState {
    return this.index ? 'READY' : 'UNINITIALIZED';
  }

  get transcript(): readonly ConversationTurn[] {
    return this.turns;
  }

  attach(index: VectorIndex): void {
    if (!index.isBuilt) {
      throw new NotBuiltError();
    }
    this.index = index;
  }

  async ask(question: string): Promise<RetrievalResult> {
    if (!this.index) {
      throw new NotReadyError();
    }

    const startTime = Date.now();
    console.log(`Processing RAG query: "${question}"`);

    const chunks = await this.index.query(question, this.topK);
    const messages = this.buildMessages(question, chunks);
    const answer = await this.client.chat(messages, { temperature: this.temperature });

    this.turns = [...this.turns, { question, answer }];

    const processingTime = Date.now() - startTime;
    console.log(`RAG query completed in ${processingTime}ms (${chunks.length} sources)`);

    return { answer, chunks, processingTime };
  }

  /**
   * System prompt, then every earlier turn, then the question with its context.
   */
  buildMessages(question: string, chunks: Chunk[]): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: this.getSystemPrompt() }];

    for (const turn of this.turns) {
      messages.push({ role: 'user', content: turn.question });
      messages.push({ role: 'assistant', content: turn.answer });
    }

    messages.push({ role: 'user', content: buildUserPrompt(question, chunks) });
    return messages;
  }

  reset(): void {
    this.turns = [];
  }

  private getSystemPrompt(): string {
    if (this.systemPrompt === undefined) {
      this.systemPrompt = getRAGPersonality();
    }
    return this.systemPrompt;
  }
}

// Singleton instance
export const ragChat = new RAGChat();
