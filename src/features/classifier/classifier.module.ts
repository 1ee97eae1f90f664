import { resolve } from 'path';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AiModule } from '@infrastructure/ai/ai.module';
import { InMemoryVectorIndexProvider } from '@infrastructure/vector-index/in-memory-vector-index.provider';
import { VECTOR_INDEX_PROVIDER } from '@infrastructure/vector-index/vector-index.interface';
import { ClassificationEngineService } from './classification-engine.service';
import { ClassifierBootstrapService } from './classifier-bootstrap.service';
import { ClassifierOptions, resolveClassifierOptions } from './classifier-options';
import { ClassifierController } from './classifier.controller';
import { CLASSIFIER_OPTIONS, PATTERN_RULE_SET } from './classifier.tokens';
import { DatasetLoaderService } from './dataset/dataset-loader.service';
import { ModelComparisonService } from './evaluation/model-comparison.service';
import { PatternRuleSet } from './patterns/pattern-rule-set';

@Module({
  imports: [AiModule],
  controllers: [ClassifierController],
  providers: [
    {
      provide: CLASSIFIER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ClassifierOptions =>
        resolveClassifierOptions({
          semanticThreshold: configService.get<number>('classifier.semanticThreshold'),
          neighbors: configService.get<number>('classifier.neighbors'),
          keywordThreshold: configService.get<number>('classifier.keywordThreshold'),
          patternConfidence: configService.get<number>('classifier.patternConfidence'),
          fallbackConfidence: configService.get<number>('classifier.fallbackConfidence'),
          semanticBoostWeight: configService.get<number>('classifier.semanticBoostWeight'),
          cueBoosts: configService.get<boolean>('classifier.cueBoosts'),
          maxFeatures: configService.get<number>('classifier.maxFeatures'),
          embeddingBatchSize: configService.get<number>('ai.embeddings.batchSize'),
          embeddingConcurrency: configService.get<number>('ai.embeddings.concurrency'),
        }),
    },
    {
      provide: PATTERN_RULE_SET,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): PatternRuleSet =>
        PatternRuleSet.fromFile(
          resolve(configService.get<string>('classifier.patternsFile', 'data/namjari-patterns.json')),
        ),
    },
    {
      provide: VECTOR_INDEX_PROVIDER,
      useClass: InMemoryVectorIndexProvider,
    },
    ClassificationEngineService,
    DatasetLoaderService,
    ModelComparisonService,
    ClassifierBootstrapService,
  ],
  exports: [ClassificationEngineService, DatasetLoaderService, ModelComparisonService],
})
export class ClassifierModule {}
