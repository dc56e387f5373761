import { readFileSync, existsSync } from 'fs';
import { config } from '../config';
import { errorMessage } from './errors';

export const DEFAULT_RAG_PERSONALITY = `You are an AI assistant that answers questions based on the provided document.
Use only the information from the context to answer. If you cannot find the answer in the context, say that you don't have enough information.
Cite sources when possible (e.g., [Source, Page X]).`;

/**
 * Load the system prompt for document answers.
 * Falls back to the default if the file is missing or empty.
 */
export function getRAGPersonality(personalityPath: string = config.rag.personalityFile): string {
  try {
    if (existsSync(personalityPath)) {
      const content = readFileSync(personalityPath, 'utf-8').trim();
      if (content) {
        return content;
      }
    }
  } catch (error) {
    console.warn(`Warning: Could not load personality from ${personalityPath}, using default.`, errorMessage(error));
  }

  return DEFAULT_RAG_PERSONALITY;
}
