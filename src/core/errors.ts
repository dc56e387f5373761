export class DocChatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends DocChatError {}

export class NotFoundError extends DocChatError {
  constructor(readonly filePath: string) {
    super(`File not found: ${filePath}`);
  }
}

export class ParseError extends DocChatError {}

export class FileTooLargeError extends DocChatError {
  constructor(readonly filePath: string, readonly size: number, readonly maxSize: number) {
    super(`File too large: ${size} bytes (max: ${maxSize})`);
  }
}

export class EmbeddingServiceError extends DocChatError {}

export class CompletionServiceError extends DocChatError {}

export class VectorStoreError extends DocChatError {}

export class NotBuiltError extends DocChatError {
  constructor() {
    super('Vector index has not been built yet');
  }
}

export class NotReadyError extends DocChatError {
  constructor() {
    super('Chat is not ready: load a document first');
  }
}

/**
 * Human-readable message for anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
