import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { describeError } from '../src/common/errors/classifier.errors';
import { ClassificationEngineService } from '../src/features/classifier/classification-engine.service';
import { DatasetLoaderService } from '../src/features/classifier/dataset/dataset-loader.service';
import { formatEvaluationReport } from '../src/features/classifier/evaluation/evaluation-report.formatter';
import { createScriptContext } from './script-context';

/**
 * Treina com o CSV de treino e imprime o relatório de avaliação
 *
 * Uso: npm run evaluate -- [treino.csv] [avaliacao.csv]
 */
async function runEvaluation() {
  const app = await createScriptContext();

  try {
    const configService = app.get(ConfigService);
    const loader = app.get(DatasetLoaderService);
    const engine = app.get(ClassificationEngineService);

    const trainingPath =
      process.argv[2] ?? configService.get<string>('classifier.trainingDataPath', 'data/training.csv');
    const evaluationPath =
      process.argv[3] ?? configService.get<string>('classifier.evaluationDataPath', 'data/evaluation.csv');

    console.log('🏋️ Treinando classificador...\n');
    const summary = await engine.train(await loader.loadTrainingExamples(trainingPath));
    console.log(`   - Exemplos: ${summary.examples}`);
    console.log(`   - Categorias: ${summary.categories}`);
    console.log(`   - Vocabulário TF-IDF: ${summary.vocabularySize}`);
    console.log(`   - Dimensão dos embeddings: ${summary.dimension}\n`);

    const report = await engine.evaluate(await loader.loadEvaluationExamples(evaluationPath));
    console.log(formatEvaluationReport(report, { maxMisclassified: 20 }));
  } finally {
    await app.close();
  }
}

runEvaluation().catch((error: unknown) => {
  console.error('❌ Erro:', describeError(error));
  process.exitCode = 1;
});
