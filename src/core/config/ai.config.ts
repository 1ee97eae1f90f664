import { registerAs } from '@nestjs/config';

/**
 * Configuração do provider de embeddings
 *
 * Qualquer endpoint compatível com a API de embeddings da OpenAI serve
 * (OPENAI_BASE_URL), inclusive servidores locais de modelos e5.
 */
export const aiConfig = registerAs('ai', () => ({
  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    embeddingModel: process.env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small',
  },

  embeddings: {
    batchSize: parseInt(process.env.EMBEDDING_BATCH_SIZE || '64', 10),
    concurrency: parseInt(process.env.EMBEDDING_CONCURRENCY || '2', 10),
  },
}));

export type AiConfig = ReturnType<typeof aiConfig>;
