import { isAxiosError } from 'axios';

export class InvalidInputError extends Error {
  name = 'InvalidInputError';
}

export class EmbeddingServiceError extends Error {
  name = 'EmbeddingServiceError';

  constructor(reason: string, cause?: unknown) {
    super(`Failed to generate embedding: ${reason}`, { cause });
  }
}

export class ChatCompletionError extends Error {
  name = 'ChatCompletionError';

  constructor(reason: string, cause?: unknown) {
    super(`Chat completion failed: ${reason}`, { cause });
  }
}

export class SearchServiceError extends Error {
  name = 'SearchServiceError';

  constructor(reason: string, cause?: unknown) {
    super(`Search failed: ${reason}`, { cause });
  }
}

/** Message of an unknown thrown value, with the HTTP status for axios errors. */
export function describeError(error: unknown): string {
  if (isAxiosError(error) && error.response) {
    return `${error.message} (status ${error.response.status})`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
