import { HandbookSearchResult } from '../../modules/handbook/interfaces/search.interface';
import { HandbookTopic } from '../../modules/handbook/utils/keyword-rules';

export interface HandbookAnswer {
  message: {
    role: 'assistant';
    content: string;
  };
  done: boolean;
  metadata?: {
    topic?: HandbookTopic;
    searchResults?: HandbookSearchResult[];
    totalFound?: number;
    queryTime?: string;
  };
  error?: string;
}
