import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EMBEDDING_PROVIDER,
  EMBEDDING_PROVIDER_FACTORY,
  EmbeddingProvider,
  EmbeddingProviderFactory,
} from './embeddings/embedding-provider.interface';
import { OpenAIEmbeddingProvider } from './embeddings/openai-embedding.provider';

/**
 * Providers de embeddings
 *
 * EMBEDDING_PROVIDER é criado uma única vez com o modelo configurado;
 * EMBEDDING_PROVIDER_FACTORY cria providers para outros modelos (comparação).
 */
@Module({
  providers: [
    {
      provide: EMBEDDING_PROVIDER_FACTORY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): EmbeddingProviderFactory => {
        const apiKey = configService.get<string>('ai.openai.apiKey');
        const baseUrl = configService.get<string>('ai.openai.baseUrl');
        return (model: string) => new OpenAIEmbeddingProvider({ model, apiKey, baseUrl });
      },
    },
    {
      provide: EMBEDDING_PROVIDER,
      inject: [EMBEDDING_PROVIDER_FACTORY, ConfigService],
      useFactory: (factory: EmbeddingProviderFactory, configService: ConfigService): EmbeddingProvider =>
        factory(configService.get<string>('ai.openai.embeddingModel', 'text-embedding-3-small')),
    },
  ],
  exports: [EMBEDDING_PROVIDER, EMBEDDING_PROVIDER_FACTORY],
})
export class AiModule {}
