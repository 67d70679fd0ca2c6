import { Injectable, Logger } from '@nestjs/common';
import {
  AzureOpenAiService,
  ChatMessage,
} from '../../shared/llm/azure-openai.service';
import {
  InvalidInputError,
  SearchServiceError,
  describeError,
} from '../../shared/errors/service.errors';
import { HandbookAnswer } from '../../shared/interfaces/response.interface';
import { HandbookSearchResult } from './interfaces/search.interface';
import { extractRelevantSentences } from './utils/extract-sentences';
import {
  focusKeywordsFor,
  headerFor,
  searchFilterFor,
  topicOf,
} from './utils/keyword-rules';
import { SearchService } from './utils/search.service';

export const NO_RESULTS_MESSAGE =
  'No relevant information found in the Contoso Handbook.';
export const ERROR_PREFIX = 'Error querying the Contoso Handbook:';

const DEFAULT_TOP = 3;

const REPHRASE_SYSTEM_PROMPT = `You are a helpful assistant that rephrases and improves content from an employee handbook.
Your task is to:
1. Make the content clear and easy to understand
2. Keep all important information intact
3. Structure the response in a professional manner
4. Focus on answering the specific question asked
5. Remove any redundant or unclear text
6. Provide a direct, specific answer to the question`;

@Injectable()
export class HandbookService {
  private readonly logger = new Logger(HandbookService.name);

  constructor(
    private readonly openai: AzureOpenAiService,
    private readonly searchService: SearchService,
  ) {}

  async generateEmbedding(text: string): Promise<number[]> {
    if (!text) {
      throw new InvalidInputError('Input text cannot be empty');
    }
    return this.openai.createEmbedding(text);
  }

  async searchDocuments(
    query: string,
    top = DEFAULT_TOP,
  ): Promise<HandbookSearchResult[]> {
    const vector = await this.generateEmbedding(query);
    const filter = searchFilterFor(query);

    try {
      return await this.searchService.hybridSearch({
        text: query,
        vector,
        top,
        filter,
      });
    } catch (error) {
      this.logger.warn(
        `Filtered search failed (${describeError(error)}), retrying without filter`,
      );
    }

    try {
      return await this.searchService.hybridSearch({ text: query, vector, top });
    } catch (error) {
      throw new SearchServiceError(describeError(error), error);
    }
  }

  extractRelevantSentences(
    content: string,
    keywords: readonly string[],
  ): string {
    return extractRelevantSentences(content, keywords);
  }

  async rephraseWithChatModel(content: string, query: string): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: REPHRASE_SYSTEM_PROMPT },
      { role: 'user', content: this.buildPrompt(query, content) },
    ];

    try {
      const rephrased = await this.openai.createChatCompletion(messages, {
        maxTokens: 1000,
        temperature: 0.2,
        topP: 0.9,
      });
      return rephrased.trim();
    } catch (error) {
      this.logger.warn(
        `Rephrasing failed, using retrieved content: ${describeError(error)}`,
      );
      return content;
    }
  }

  async queryHandbook(query: string, top = DEFAULT_TOP): Promise<string> {
    const answer = await this.handleQuery(query, top);
    return answer.message.content;
  }

  async handleQuery(query: string, top = DEFAULT_TOP): Promise<HandbookAnswer> {
    const startTime = Date.now();

    try {
      const results = await this.searchDocuments(query, top);
      if (results.length === 0) {
        return this.reply(NO_RESULTS_MESSAGE, { totalFound: 0 });
      }

      const focusKeywords = focusKeywordsFor(query);
      const combined = results
        .map((result) => {
          const content = result.content ?? 'No content available';
          return focusKeywords
            ? this.extractRelevantSentences(content, focusKeywords)
            : content;
        })
        .join('\n\n');

      const rephrased = await this.rephraseWithChatModel(combined, query);
      const content =
        headerFor(query) + rephrased + this.formatSources(results);

      const queryTime = ((Date.now() - startTime) / 1000).toFixed(2);
      this.logger.log(
        `Answered "${query}" from ${results.length} passages in ${queryTime}s`,
      );

      return this.reply(content, {
        topic: topicOf(query),
        searchResults: results,
        totalFound: results.length,
        queryTime,
      });
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Query "${query}" failed: ${reason}`);
      return {
        ...this.reply(`${ERROR_PREFIX} ${reason}`),
        error: reason,
      };
    }
  }

  private buildPrompt(query: string, content: string): string {
    return `Please rephrase and improve the following content from Contoso's employee handbook to directly answer this specific question: "${query}"

Content from handbook:
${content}

Please provide a clear, professional, and direct response that specifically answers the question. Do not include generic information that doesn't address the question.`;
  }

  private formatSources(results: HandbookSearchResult[]): string {
    const lines = results.map(
      (result, i) =>
        `- ${result.title || result.url || `Employee Handbook Section ${i + 1}`}\n`,
    );
    return `\n\n**Sources:**\n${lines.join('')}`;
  }

  private reply(
    content: string,
    metadata?: HandbookAnswer['metadata'],
  ): HandbookAnswer {
    return {
      message: { role: 'assistant', content },
      done: true,
      ...(metadata && { metadata }),
    };
  }
}
