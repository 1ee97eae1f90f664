import { Inject, Injectable, Logger } from '@nestjs/common';
import { IntentCategory, isIntentCategory } from '@common/constants/intent-categories.constants';
import { ConfigurationError, describeError } from '@common/errors/classifier.errors';
import { normalizeQuery } from '@core/utils/text-normalizer.util';
import {
  EMBEDDING_PROVIDER,
  EmbeddingProvider,
} from '@infrastructure/ai/embeddings/embedding-provider.interface';
import {
  VECTOR_INDEX_PROVIDER,
  VectorIndexProvider,
} from '@infrastructure/vector-index/vector-index.interface';
import { ClassifierOptions } from './classifier-options';
import { CLASSIFIER_OPTIONS, PATTERN_RULE_SET } from './classifier.tokens';
import {
  ClassificationMethod,
  ClassificationResult,
  ClassifierStatus,
  EvaluationExample,
  EvaluationFailure,
  EvaluationReport,
  IndexedExample,
  MisclassifiedItem,
  TrainingExample,
  TrainingSummary,
} from './classifier.types';
import { AnswerLookup, ConfidenceFusionPolicy, SemanticSignal } from './fusion/confidence-fusion.policy';
import { KeywordFallbackMatcher } from './keyword/keyword-fallback.matcher';
import { PatternRuleSet } from './patterns/pattern-rule-set';
import { SemanticMatcher } from './semantic/semantic.matcher';

/**
 * Estado treinado: imutável e trocado de uma vez ao fim do treino
 */
interface TrainedSnapshot extends AnswerLookup {
  readonly examples: readonly IndexedExample[];
  readonly categories: number;
  readonly keyword: KeywordFallbackMatcher;
  readonly semantic: SemanticMatcher;
}

/**
 * Motor híbrido de classificação de intenções
 *
 * Ordem: padrões regex → vizinhos semânticos → TF-IDF → categoria default.
 * Antes do treino só os padrões e o default estão disponíveis.
 */
@Injectable()
export class ClassificationEngineService {
  private readonly logger = new Logger(ClassificationEngineService.name);
  private readonly fusion: ConfidenceFusionPolicy;
  private snapshot: TrainedSnapshot | null = null;

  constructor(
    @Inject(PATTERN_RULE_SET) private readonly patterns: PatternRuleSet,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddingProvider: EmbeddingProvider,
    @Inject(VECTOR_INDEX_PROVIDER) private readonly vectorIndexProvider: VectorIndexProvider,
    @Inject(CLASSIFIER_OPTIONS) private readonly options: ClassifierOptions,
  ) {
    this.fusion = new ConfidenceFusionPolicy(options);
  }

  get isTrained(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Treina do zero. Em caso de falha o snapshot anterior (se houver) continua valendo.
   */
  async train(examples: readonly TrainingExample[]): Promise<TrainingSummary> {
    const startTime = Date.now();
    const indexed = this.validateExamples(examples);

    this.logger.log(`🏋️ Treinando com ${indexed.length} exemplos...`);

    const keyword = KeywordFallbackMatcher.fit(indexed, {
      ngramRange: this.options.ngramRange,
      maxFeatures: this.options.maxFeatures,
    });

    const semantic = await SemanticMatcher.build(indexed, this.embeddingProvider, this.vectorIndexProvider, {
      batchSize: this.options.embeddingBatchSize,
      concurrency: this.options.embeddingConcurrency,
      cueBoosts: this.options.cueBoosts,
    });

    const canonicalAnswers = new Map<IntentCategory, string>();
    for (const example of indexed) {
      if (!canonicalAnswers.has(example.category)) {
        canonicalAnswers.set(example.category, example.answer);
      }
    }

    this.snapshot = {
      examples: indexed,
      categories: canonicalAnswers.size,
      keyword,
      semantic,
      exampleAt: (index) => indexed[index],
      canonicalAnswer: (category) => canonicalAnswers.get(category),
    };

    const summary: TrainingSummary = {
      examples: indexed.length,
      categories: canonicalAnswers.size,
      vocabularySize: keyword.vocabularySize,
      dimension: semantic.dimension,
      durationMs: Date.now() - startTime,
    };

    this.logger.log(
      `✅ Treino concluído: ${summary.examples} exemplos, ${summary.categories} categorias, ` +
        `vocabulário ${summary.vocabularySize}, dim ${summary.dimension} em ${summary.durationMs}ms`,
    );

    return summary;
  }

  /**
   * Classifica uma query. Nunca lança: falhas viram o resultado default.
   */
  async classify(query: string): Promise<ClassificationResult> {
    const snapshot = this.snapshot;
    let normalized = '';

    try {
      normalized = normalizeQuery(query);
      if (!normalized) {
        return this.fusion.fallback(query, snapshot ?? undefined);
      }

      const pattern = this.patterns.match(normalized);
      const semantic = pattern || !snapshot ? null : await this.semanticSignal(snapshot, normalized);

      const result = this.fusion.decide({
        query,
        pattern,
        semantic,
        keyword: () => (snapshot ? snapshot.keyword.score(normalized) : []),
        findVeto: (category) => this.patterns.findVeto(normalized, category),
        answers: snapshot ?? undefined,
      });

      this.logger.debug(
        `🎯 "${normalized}" → ${result.category} (${result.method}, ${(result.confidence * 100).toFixed(1)}%)`,
      );

      return result;
    } catch (error) {
      this.logger.error(`❌ Erro ao classificar "${normalized}": ${describeError(error)}`);
      return this.fusion.fallback(query, snapshot ?? undefined, 'Erro na classificação');
    }
  }

  /**
   * Classifica cada item e agrega acurácia, confiança média e distribuição de métodos.
   * Falhas por item são registradas e não interrompem a execução.
   */
  async evaluate(items: readonly EvaluationExample[]): Promise<EvaluationReport> {
    const methodDistribution: Record<ClassificationMethod, number> = {
      [ClassificationMethod.PATTERN]: 0,
      [ClassificationMethod.SEMANTIC]: 0,
      [ClassificationMethod.KEYWORD]: 0,
      [ClassificationMethod.FALLBACK_DEFAULT]: 0,
    };
    const misclassified: MisclassifiedItem[] = [];
    const failures: EvaluationFailure[] = [];
    let correct = 0;
    let confidenceSum = 0;
    let classified = 0;

    for (const [index, item] of items.entries()) {
      let result: ClassificationResult;
      try {
        result = await this.classify(item.query);
      } catch (error) {
        failures.push({ index, query: item.query, expected: item.expectedCategory, error: describeError(error) });
        continue;
      }

      classified++;
      confidenceSum += result.confidence;
      methodDistribution[result.method]++;

      if (result.category === item.expectedCategory) {
        correct++;
      } else {
        misclassified.push({
          index,
          query: item.query,
          expected: item.expectedCategory,
          predicted: result.category,
          confidence: result.confidence,
          method: result.method,
        });
      }
    }

    const report: EvaluationReport = {
      total: items.length,
      correct,
      accuracy: items.length > 0 ? correct / items.length : 0,
      averageConfidence: classified > 0 ? confidenceSum / classified : 0,
      methodDistribution,
      misclassified,
      failures,
    };

    this.logger.log(
      `📊 Avaliação: ${report.correct}/${report.total} corretas ` +
        `(${(report.accuracy * 100).toFixed(1)}%), ${failures.length} falhas`,
    );

    return report;
  }

  getStatus(): ClassifierStatus {
    const snapshot = this.snapshot;
    return {
      trained: snapshot !== null,
      examples: snapshot?.examples.length ?? 0,
      categories: snapshot?.categories ?? 0,
      vocabularySize: snapshot?.keyword.vocabularySize ?? 0,
      dimension: snapshot?.semantic.dimension ?? 0,
      patternRules: this.patterns.size,
      embeddingModel: this.embeddingProvider.model,
    };
  }

  private async semanticSignal(snapshot: TrainedSnapshot, normalized: string): Promise<SemanticSignal | null> {
    try {
      const neighbors = await snapshot.semantic.query(normalized, this.options.neighbors);
      return { neighbors, votes: snapshot.semantic.vote(neighbors, normalized) };
    } catch (error) {
      this.logger.warn(`⚠️  Etapa semântica ignorada: ${describeError(error)}`);
      return null;
    }
  }

  private validateExamples(examples: readonly TrainingExample[]): IndexedExample[] {
    if (examples.length === 0) {
      throw new ConfigurationError('Dataset de treino vazio');
    }

    const problems: string[] = [];
    const indexed: IndexedExample[] = [];

    examples.forEach((example, index) => {
      const text = typeof example.text === 'string' ? example.text.trim() : '';
      if (!text) {
        problems.push(`exemplo ${index}: texto vazio`);
      }
      if (!isIntentCategory(example.category)) {
        problems.push(`exemplo ${index}: categoria desconhecida "${String(example.category)}"`);
      }
      indexed.push({ text, category: example.category, answer: example.answer, index });
    });

    if (problems.length > 0) {
      throw new ConfigurationError('Exemplos de treino inválidos', problems);
    }

    return indexed;
  }
}
