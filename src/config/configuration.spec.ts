import configuration from './configuration';

describe('configuration', () => {
  it('applies defaults when variables are missing', () => {
    const config = configuration({});

    expect(config.port).toBe(3000);
    expect(config.openai.embeddingApiVersion).toBe('2023-05-15');
    expect(config.openai.chatApiVersion).toBe('2023-12-01-preview');
    expect(config.search.indexName).toBe('employeehandbook');
  });

  it('falls back to the main endpoint for embeddings', () => {
    const config = configuration({
      AZURE_OPENAI_ENDPOINT: 'https://openai.test',
      AZURE_OPENAI_EMBED_ENDPOINT: '',
    });

    expect(config.openai.embeddingEndpoint).toBe('https://openai.test');
  });

  it('reads overrides from the environment', () => {
    const config = configuration({
      PORT: '8080',
      AZURE_OPENAI_ENDPOINT: 'https://openai.test',
      AZURE_OPENAI_EMBED_ENDPOINT: 'https://embed.test',
      AZURE_OPENAI_API_VERSION: '2024-02-01',
      AZURE_SEARCH_INDEX: 'handbook-v2',
    });

    expect(config.port).toBe(8080);
    expect(config.openai.embeddingEndpoint).toBe('https://embed.test');
    expect(config.openai.embeddingApiVersion).toBe('2024-02-01');
    expect(config.openai.chatApiVersion).toBe('2024-02-01');
    expect(config.search.indexName).toBe('handbook-v2');
  });
});
