import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '@common/errors/classifier.errors';
import {
  EMBEDDING_PROVIDER_FACTORY,
  EmbeddingProviderFactory,
} from '@infrastructure/ai/embeddings/embedding-provider.interface';
import {
  VECTOR_INDEX_PROVIDER,
  VectorIndexProvider,
} from '@infrastructure/vector-index/vector-index.interface';
import { ClassificationEngineService } from '../classification-engine.service';
import { ClassifierOptions } from '../classifier-options';
import { CLASSIFIER_OPTIONS, PATTERN_RULE_SET } from '../classifier.tokens';
import { EvaluationExample, EvaluationReport, TrainingExample } from '../classifier.types';
import { PatternRuleSet } from '../patterns/pattern-rule-set';

export type ModelComparisonResult =
  | {
      readonly model: string;
      readonly succeeded: true;
      readonly accuracy: number;
      readonly averageConfidence: number;
      readonly dimension: number;
      readonly trainingMs: number;
      readonly evaluationMs: number;
      readonly report: EvaluationReport;
    }
  | {
      readonly model: string;
      readonly succeeded: false;
      readonly error: string;
    };

/**
 * Treina e avalia um motor novo por modelo de embedding
 *
 * Um modelo que falha entra no resultado com o erro e não interrompe os demais.
 */
@Injectable()
export class ModelComparisonService {
  private readonly logger = new Logger(ModelComparisonService.name);

  constructor(
    @Inject(PATTERN_RULE_SET) private readonly patterns: PatternRuleSet,
    @Inject(EMBEDDING_PROVIDER_FACTORY) private readonly providerFactory: EmbeddingProviderFactory,
    @Inject(VECTOR_INDEX_PROVIDER) private readonly vectorIndexProvider: VectorIndexProvider,
    @Inject(CLASSIFIER_OPTIONS) private readonly options: ClassifierOptions,
  ) {}

  async compare(
    models: readonly string[],
    training: readonly TrainingExample[],
    evaluation: readonly EvaluationExample[],
  ): Promise<ModelComparisonResult[]> {
    const results: ModelComparisonResult[] = [];

    for (const model of models) {
      this.logger.log(`🔬 Testando modelo ${model}...`);

      try {
        const engine = new ClassificationEngineService(
          this.patterns,
          this.providerFactory(model),
          this.vectorIndexProvider,
          this.options,
        );

        const summary = await engine.train(training);
        const evaluationStart = Date.now();
        const report = await engine.evaluate(evaluation);

        results.push({
          model,
          succeeded: true,
          accuracy: report.accuracy,
          averageConfidence: report.averageConfidence,
          dimension: summary.dimension,
          trainingMs: summary.durationMs,
          evaluationMs: Date.now() - evaluationStart,
          report,
        });
      } catch (error) {
        this.logger.error(`❌ Modelo ${model} falhou: ${describeError(error)}`);
        results.push({ model, succeeded: false, error: describeError(error) });
      }
    }

    // Bem-sucedidos por acurácia (desc); falhas no fim. sort estável mantém a ordem de entrada.
    return results.sort((a, b) => rank(b) - rank(a));
  }
}

function rank(result: ModelComparisonResult): number {
  return result.succeeded ? result.accuracy : -1;
}
