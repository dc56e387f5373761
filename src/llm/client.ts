import OpenAI from 'openai';
import { config } from '../config';
import { CompletionServiceError, errorMessage } from '../core/errors';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface ChatOptions {
  temperature?: number;
}

export interface ChatClient {
  readonly model: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

/**
 * OpenAI client shared by the chat and embedding services.
 * Retries are disabled: every call is a single round trip.
 */
export function createOpenAIClient(): OpenAI {
  return new OpenAI({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseUrl,
    maxRetries: 0
  });
}

export class OpenAIChatClient implements ChatClient {
  private client: OpenAI | null = null;
  public model: string;
  private temperature: number;

  constructor(model: string = config.openai.model, temperature: number = config.openai.temperature) {
    this.model = model;
    this.temperature = temperature;
  }

  /**
   * Check the API is reachable with the configured key and model
   */
  async checkHealth(): Promise<boolean> {
    try {
      await this.getClient().models.retrieve(this.model);
      return true;
    } catch (error) {
      console.warn(`OpenAI health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Chat completion (non-streaming)
   */
  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    const completion = await this.getClient()
      .chat.completions.create({
        model: this.model,
        messages,
        temperature: options?.temperature ?? this.temperature
      })
      .catch((error: unknown) => {
        console.error('OpenAI chat failed', errorMessage(error));
        throw new CompletionServiceError(`Failed to chat with OpenAI: ${errorMessage(error)}`, { cause: error });
      });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new CompletionServiceError('OpenAI returned an empty answer');
    }
    return content;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = createOpenAIClient();
    }
    return this.client;
  }
}

// Singleton instance
export const chatClient = new OpenAIChatClient();
