import { AxiosError, AxiosHeaders } from 'axios';
import {
  EmbeddingServiceError,
  InvalidInputError,
  SearchServiceError,
  describeError,
} from './service.errors';

describe('service errors', () => {
  it('prefixes messages by failure kind', () => {
    expect(new EmbeddingServiceError('timeout').message).toBe(
      'Failed to generate embedding: timeout',
    );
    expect(new SearchServiceError('index missing').message).toBe(
      'Search failed: index missing',
    );
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('socket hang up');
    const error = new SearchServiceError('socket hang up', cause);

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('SearchServiceError');
    expect(error).toBeInstanceOf(Error);
  });

  it('names input errors', () => {
    expect(new InvalidInputError('empty').name).toBe('InvalidInputError');
  });

  describe('describeError', () => {
    it('adds the status of failed HTTP responses', () => {
      const error = new AxiosError(
        'Request failed with status code 401',
        'ERR_BAD_REQUEST',
        undefined,
        undefined,
        {
          status: 401,
          statusText: 'Unauthorized',
          headers: {},
          config: { headers: new AxiosHeaders() },
          data: {},
        },
      );

      expect(describeError(error)).toBe(
        'Request failed with status code 401 (status 401)',
      );
    });

    it('uses the message of plain errors', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('stringifies anything else', () => {
      expect(describeError('boom')).toBe('boom');
    });
  });
});
