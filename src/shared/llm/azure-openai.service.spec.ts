import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { of, throwError } from 'rxjs';
import { AppConfig } from '../../config/configuration';
import {
  ChatCompletionError,
  EmbeddingServiceError,
} from '../errors/service.errors';
import { AzureOpenAiService } from './azure-openai.service';

const testConfig: AppConfig = {
  port: 3000,
  openai: {
    endpoint: 'https://openai.test',
    apiKey: 'test-key',
    embeddingEndpoint: 'https://embed.test',
    embeddingDeployment: 'embed-small',
    embeddingApiVersion: '2023-05-15',
    chatDeployment: 'chat-model',
    chatApiVersion: '2023-12-01-preview',
  },
  search: {
    endpoint: 'https://search.test',
    key: 'test-key',
    indexName: 'employeehandbook',
  },
};

describe('AzureOpenAiService', () => {
  let service: AzureOpenAiService;
  const post = jest.fn();

  beforeEach(async () => {
    post.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AzureOpenAiService,
        { provide: HttpService, useValue: { post } },
        {
          provide: ConfigService,
          useValue: { get: (key: keyof AppConfig) => testConfig[key] },
        },
      ],
    }).compile();

    service = module.get<AzureOpenAiService>(AzureOpenAiService);
  });

  describe('createEmbedding', () => {
    it('posts the input to the embedding deployment', async () => {
      post.mockReturnValue(of({ data: { data: [{ embedding: [0.1, -0.2] }] } }));

      await expect(service.createEmbedding('vacation days')).resolves.toEqual([
        0.1, -0.2,
      ]);
      expect(post).toHaveBeenCalledTimes(1);
      expect(post).toHaveBeenCalledWith(
        'https://embed.test/openai/deployments/embed-small/embeddings?api-version=2023-05-15',
        { input: 'vacation days' },
        {
          headers: {
            'Content-Type': 'application/json',
            'api-key': 'test-key',
          },
        },
      );
    });

    it('wraps transport failures', async () => {
      post.mockReturnValue(throwError(() => new Error('connect ECONNREFUSED')));

      await expect(service.createEmbedding('x')).rejects.toThrow(
        'Failed to generate embedding: connect ECONNREFUSED',
      );
    });

    it('rejects a body without an embedding', async () => {
      post.mockReturnValue(of({ data: { data: [] } }));

      await expect(service.createEmbedding('x')).rejects.toThrow(
        'Failed to generate embedding: response has no data[0].embedding',
      );
    });

    it('rejects non-numeric vectors', async () => {
      post.mockReturnValue(of({ data: { data: [{ embedding: ['a'] }] } }));

      await expect(service.createEmbedding('x')).rejects.toBeInstanceOf(
        EmbeddingServiceError,
      );
    });
  });

  describe('createChatCompletion', () => {
    const messages = [
      { role: 'system' as const, content: 'Be brief.' },
      { role: 'user' as const, content: 'Hello' },
    ];

    it('sends the messages with sampling parameters', async () => {
      post.mockReturnValue(
        of({ data: { choices: [{ message: { content: ' Hi there ' } }] } }),
      );

      await expect(
        service.createChatCompletion(messages, {
          maxTokens: 1000,
          temperature: 0.2,
          topP: 0.9,
        }),
      ).resolves.toBe(' Hi there ');
      expect(post).toHaveBeenCalledWith(
        'https://openai.test/openai/deployments/chat-model/chat/completions?api-version=2023-12-01-preview',
        { messages, max_tokens: 1000, temperature: 0.2, top_p: 0.9 },
        {
          headers: {
            'Content-Type': 'application/json',
            'api-key': 'test-key',
          },
        },
      );
    });

    it('rejects a body without message content', async () => {
      post.mockReturnValue(of({ data: { choices: [] } }));

      const promise = service.createChatCompletion(messages);
      await expect(promise).rejects.toBeInstanceOf(ChatCompletionError);
      await expect(promise).rejects.toThrow(
        'Chat completion failed: response has no choices[0].message.content',
      );
    });

    it('wraps transport failures', async () => {
      post.mockReturnValue(throwError(() => new Error('read ETIMEDOUT')));

      await expect(service.createChatCompletion(messages)).rejects.toThrow(
        'Chat completion failed: read ETIMEDOUT',
      );
    });
  });
});
