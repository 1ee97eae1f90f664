import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { EmbeddingProviderError, describeError } from '@common/errors/classifier.errors';
import { EmbeddingProvider } from './embedding-provider.interface';

/**
 * Parte do client OpenAI usada aqui (permite injetar um client fake nos testes)
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingProviderOptions {
  model: string;
  apiKey?: string;
  /** Endpoint compatível com a API da OpenAI (ex.: servidor local de modelos e5) */
  baseUrl?: string;
  client?: EmbeddingsClient;
}

/**
 * Embeddings via API OpenAI (ou compatível)
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly logger = new Logger(OpenAIEmbeddingProvider.name);
  private readonly client: EmbeddingsClient | null;
  readonly model: string;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.model = options.model;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      this.logger.log(`✅ Embeddings OpenAI inicializados - Modelo: ${this.model}`);
    } else {
      this.logger.warn('⚠️  OpenAI API Key não configurada - embeddings indisponíveis');
      this.client = null;
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    if (!this.client) {
      throw new EmbeddingProviderError('Provider de embeddings não está disponível (API Key não configurada)');
    }

    let response: { data: Array<{ embedding: number[]; index: number }> };
    try {
      response = await this.client.embeddings.create({ model: this.model, input: [...texts] });
    } catch (error) {
      throw new EmbeddingProviderError(`Falha ao gerar embeddings (${this.model}): ${describeError(error)}`, {
        cause: error,
      });
    }

    if (response.data.length !== texts.length) {
      throw new EmbeddingProviderError(
        `Resposta de embeddings com ${response.data.length} vetores para ${texts.length} textos`,
      );
    }

    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
