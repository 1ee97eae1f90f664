import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../src/common/errors/classifier.errors';
import { DatasetLoaderService } from '../src/features/classifier/dataset/dataset-loader.service';
import { formatModelComparison } from '../src/features/classifier/evaluation/evaluation-report.formatter';
import { ModelComparisonService } from '../src/features/classifier/evaluation/model-comparison.service';
import { createScriptContext } from './script-context';

const DEFAULT_MODELS = ['text-embedding-3-small', 'text-embedding-3-large'];

/**
 * Compara modelos de embedding com o mesmo dataset
 *
 * Uso: npm run compare-models -- modelo-a,modelo-b
 */
async function compareModels() {
  const app = await createScriptContext();

  try {
    const configService = app.get(ConfigService);
    const loader = app.get(DatasetLoaderService);
    const comparison = app.get(ModelComparisonService);

    const models = process.argv[2]
      ? process.argv[2].split(',').map((model) => model.trim()).filter(Boolean)
      : DEFAULT_MODELS;

    const training = await loader.loadTrainingExamples(
      configService.get<string>('classifier.trainingDataPath', 'data/training.csv'),
    );
    const evaluation = await loader.loadEvaluationExamples(
      configService.get<string>('classifier.evaluationDataPath', 'data/evaluation.csv'),
    );

    console.log(`🔬 Comparando ${models.length} modelo(s): ${models.join(', ')}\n`);
    const results = await comparison.compare(models, training, evaluation);
    console.log(formatModelComparison(results));
  } finally {
    await app.close();
  }
}

compareModels().catch((error: unknown) => {
  console.error('❌ Erro:', describeError(error));
  process.exitCode = 1;
});
