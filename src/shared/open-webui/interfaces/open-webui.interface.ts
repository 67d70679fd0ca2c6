import type { Response } from 'express';

export interface ChatCompletionRequest {
  model?: string;
  // Unvalidated request body: entries are checked when read
  messages?: unknown;
  stream?: boolean;
  temperature?: number;
  max_tokens?: number;
}

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: 'stop';
  }>;
  usage: Usage;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: { content?: string };
    finish_reason: 'stop' | null;
  }>;
  usage?: Usage;
}

export interface OpenAiErrorBody {
  error: {
    message: string;
    type: 'invalid_request_error' | 'server_error';
    code: string;
  };
}

/** The parts of the HTTP response the completion handlers write to. */
export type CompletionSink = Pick<
  Response,
  | 'status'
  | 'json'
  | 'setHeader'
  | 'write'
  | 'end'
  | 'headersSent'
  | 'writableEnded'
  | 'destroyed'
>;
