export interface OpenAiConfig {
  endpoint: string;
  apiKey: string;
  embeddingEndpoint: string;
  embeddingDeployment: string;
  embeddingApiVersion: string;
  chatDeployment: string;
  chatApiVersion: string;
}

export interface SearchConfig {
  endpoint: string;
  key: string;
  indexName: string;
}

export type AppConfig = {
  port: number;
  openai: OpenAiConfig;
  search: SearchConfig;
};

export default function configuration(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const openaiEndpoint = env.AZURE_OPENAI_ENDPOINT ?? '';

  return {
    port: parseInt(env.PORT || '3000', 10),
    openai: {
      endpoint: openaiEndpoint,
      apiKey: env.AZURE_OPENAI_API_KEY ?? '',
      // Embeddings may live on a different resource than chat
      embeddingEndpoint: env.AZURE_OPENAI_EMBED_ENDPOINT || openaiEndpoint,
      embeddingDeployment: env.AZURE_OPENAI_EMBED_DEPLOYMENT_NAME ?? '',
      embeddingApiVersion: env.AZURE_OPENAI_API_VERSION || '2023-05-15',
      chatDeployment: env.AZURE_OPENAI_CHAT_DEPLOYMENT_NAME ?? '',
      chatApiVersion: env.AZURE_OPENAI_API_VERSION || '2023-12-01-preview',
    },
    search: {
      endpoint: env.AI_SEARCH_URL ?? '',
      key: env.AI_SEARCH_KEY ?? '',
      indexName: env.AZURE_SEARCH_INDEX || 'employeehandbook',
    },
  };
}
