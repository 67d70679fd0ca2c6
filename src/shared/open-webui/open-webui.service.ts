import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { HandbookService } from '../../modules/handbook/handbook.service';
import { describeError } from '../errors/service.errors';
import {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  CompletionSink,
  OpenAiErrorBody,
  Usage,
} from './interfaces/open-webui.interface';

export const HANDBOOK_MODEL = 'handbook';
const STREAM_CHUNK_WORDS = 2;
const STREAM_DELAY_MS = 30;

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function errorBody(
  message: string,
  type: OpenAiErrorBody['error']['type'],
  code: string,
): OpenAiErrorBody {
  return { error: { message, type, code } };
}

@Injectable()
export class OpenWebuiService {
  private readonly logger = new Logger(OpenWebuiService.name);
  private readonly models = [HANDBOOK_MODEL];

  constructor(private readonly handbookService: HandbookService) {}

  getModels() {
    return {
      object: 'list',
      data: this.models.map((model) => ({
        id: model,
        name: model.charAt(0).toUpperCase() + model.slice(1),
        description: `Answers ${model} questions from the employee handbook`,
        object: 'model',
        created: Date.now(),
        owned_by: 'handbook-assistant',
      })),
    };
  }

  getModelInfo(model: string) {
    if (!this.models.includes(model)) {
      throw new NotFoundException(
        errorBody(
          `Model '${model}' not found. Available models: ${this.models.join(', ')}`,
          'invalid_request_error',
          'model_not_found',
        ),
      );
    }
    return {
      id: model,
      object: 'model',
      created: Date.now(),
      owned_by: 'handbook-assistant',
      permission: [],
      root: model,
      parent: null,
    };
  }

  async chatCompletions(body: ChatCompletionRequest, res: CompletionSink) {
    const { model = HANDBOOK_MODEL, stream = false } = body;

    if (!this.models.includes(model)) {
      res
        .status(400)
        .json(
          errorBody(
            `Model '${model}' not found. Available models: ${this.models.join(', ')}`,
            'invalid_request_error',
            'model_not_found',
          ),
        );
      return;
    }

    const question = this.extractMessageContent(body.messages);
    if (!question.trim()) {
      res
        .status(400)
        .json(
          errorBody(
            'No user message with text content was provided',
            'invalid_request_error',
            'empty_message',
          ),
        );
      return;
    }

    try {
      if (stream) {
        await this.handleStreamingResponse(question, model, res);
      } else {
        await this.handleNonStreamingResponse(question, model, res);
      }
    } catch (error) {
      this.logger.error(`Chat completion failed: ${describeError(error)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      res
        .status(500)
        .json(errorBody('Internal server error', 'server_error', 'internal_error'));
    }
  }

  /** Text of the last user message; the first text part for multimodal content. */
  extractMessageContent(messages: unknown): string {
    if (!Array.isArray(messages)) return '';

    const entries: unknown[] = messages;
    const lastUserMessage = [...entries]
      .reverse()
      .find((m): m is Record<string, unknown> => isRecord(m) && m.role === 'user');
    if (!lastUserMessage) return '';

    const { content } = lastUserMessage;
    if (typeof content === 'string') return content;
    if (Array.isArray(content)) {
      const parts: unknown[] = content;
      const textPart = parts.find(
        (part): part is Record<string, unknown> =>
          isRecord(part) && part.type === 'text',
      );
      return typeof textPart?.text === 'string' ? textPart.text : '';
    }
    return '';
  }

  // Rough estimate: one token per four characters
  estimateTokens(text: string): number {
    return text ? Math.ceil(text.length / 4) : 0;
  }

  private usage(question: string, answer: string): Usage {
    const prompt = this.estimateTokens(question);
    const completion = this.estimateTokens(answer);
    return {
      prompt_tokens: prompt,
      completion_tokens: completion,
      total_tokens: prompt + completion,
    };
  }

  private async handleNonStreamingResponse(
    question: string,
    model: string,
    res: CompletionSink,
  ) {
    const answer = await this.handbookService.handleQuery(question);
    const content = answer.message.content;

    const response: ChatCompletionResponse = {
      id: `chatcmpl-${Date.now()}`,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finish_reason: 'stop',
        },
      ],
      usage: this.usage(question, content),
    };
    res.json(response);
  }

  private async handleStreamingResponse(
    question: string,
    model: string,
    res: CompletionSink,
  ) {
    const answer = await this.handbookService.handleQuery(question);
    const content = answer.message.content;

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');

    const chunk = (
      delta: ChatCompletionChunk['choices'][number]['delta'],
      finishReason: 'stop' | null,
      usage?: Usage,
    ): ChatCompletionChunk => ({
      id: `chatcmpl-${Date.now()}`,
      object: 'chat.completion.chunk',
      created: Math.floor(Date.now() / 1000),
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
      ...(usage && { usage }),
    });

    const words = content.split(' ');
    for (let i = 0; i < words.length; i += STREAM_CHUNK_WORDS) {
      // Client went away
      if (res.writableEnded || res.destroyed) return;
      const text = words.slice(i, i + STREAM_CHUNK_WORDS).join(' ');
      const delta = { content: i === 0 ? text : ` ${text}` };
      res.write(`data: ${JSON.stringify(chunk(delta, null))}\n\n`);
      await sleep(STREAM_DELAY_MS);
    }

    if (res.writableEnded || res.destroyed) return;
    const final = chunk({}, 'stop', this.usage(question, content));
    res.write(`data: ${JSON.stringify(final)}\n\n`);
    res.write('data: [DONE]\n\n');
    res.end();
  }
}
