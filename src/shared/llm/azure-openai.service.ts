import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { AppConfig, OpenAiConfig } from '../../config/configuration';
import {
  ChatCompletionError,
  EmbeddingServiceError,
  describeError,
} from '../errors/service.errors';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readEmbedding(body: unknown): number[] | undefined {
  if (!isRecord(body) || !Array.isArray(body.data)) return undefined;
  const first: unknown = body.data[0];
  if (!isRecord(first) || !Array.isArray(first.embedding)) return undefined;
  const embedding: unknown[] = first.embedding;
  return embedding.every((n): n is number => typeof n === 'number')
    ? embedding
    : undefined;
}

function readChatContent(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.choices)) return undefined;
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
  const { content } = choice.message;
  return typeof content === 'string' ? content : undefined;
}

@Injectable()
export class AzureOpenAiService {
  private readonly logger = new Logger(AzureOpenAiService.name);
  private readonly config: OpenAiConfig;

  constructor(
    private readonly httpService: HttpService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.config = configService.get('openai', { infer: true });
  }

  private get headers() {
    return {
      'Content-Type': 'application/json',
      'api-key': this.config.apiKey,
    };
  }

  async createEmbedding(text: string): Promise<number[]> {
    const { embeddingEndpoint, embeddingDeployment, embeddingApiVersion } =
      this.config;
    const url = `${embeddingEndpoint}/openai/deployments/${embeddingDeployment}/embeddings?api-version=${embeddingApiVersion}`;

    let body: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(url, { input: text }, {
          headers: this.headers,
        }),
      );
      body = response.data;
    } catch (error) {
      throw new EmbeddingServiceError(describeError(error), error);
    }

    const embedding = readEmbedding(body);
    if (!embedding) {
      throw new EmbeddingServiceError('response has no data[0].embedding');
    }
    this.logger.debug(`Embedding of ${embedding.length} dimensions received`);
    return embedding;
  }

  async createChatCompletion(
    messages: ChatMessage[],
    options: ChatCompletionOptions = {},
  ): Promise<string> {
    const { endpoint, chatDeployment, chatApiVersion } = this.config;
    const url = `${endpoint}/openai/deployments/${chatDeployment}/chat/completions?api-version=${chatApiVersion}`;

    let body: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(
          url,
          {
            messages,
            max_tokens: options.maxTokens,
            temperature: options.temperature,
            top_p: options.topP,
          },
          { headers: this.headers },
        ),
      );
      body = response.data;
    } catch (error) {
      throw new ChatCompletionError(describeError(error), error);
    }

    const content = readChatContent(body);
    if (content === undefined) {
      throw new ChatCompletionError(
        'response has no choices[0].message.content',
      );
    }
    return content;
  }
}
