import { Inject, Injectable } from '@nestjs/common';
import { SearchClient, SearchOptions } from '@azure/search-documents';
import {
  HandbookDocument,
  HandbookSearchResult,
  HybridSearchQuery,
  RESULT_FIELDS,
} from '../interfaces/search.interface';

export const SEARCH_CLIENT = Symbol('SEARCH_CLIENT');

@Injectable()
export class SearchService {
  constructor(
    @Inject(SEARCH_CLIENT)
    private readonly client: SearchClient<HandbookDocument>,
  ) {}

  async hybridSearch(query: HybridSearchQuery): Promise<HandbookSearchResult[]> {
    // Without `select` the index returns every retrievable field
    const options: SearchOptions<HandbookDocument> = {
      top: query.top,
      vectorSearchOptions: {
        queries: [
          {
            kind: 'vector',
            vector: query.vector,
            kNearestNeighborsCount: query.top,
            fields: ['contentVector'],
          },
        ],
      },
    };
    if (query.filter) options.filter = query.filter;

    const response = await this.client.search(query.text, options);

    const results: HandbookSearchResult[] = [];
    for await (const hit of response.results) {
      const result: HandbookSearchResult = { score: hit.score };
      for (const field of RESULT_FIELDS) {
        const value = hit.document[field];
        if (typeof value === 'string') result[field] = value;
      }
      results.push(result);
    }
    return results;
  }
}
