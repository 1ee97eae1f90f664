import { ClassificationMethod, EvaluationReport } from '../classifier.types';
import { ModelComparisonResult } from './model-comparison.service';

export interface ReportFormatOptions {
  /** Máximo de erros listados */
  readonly maxMisclassified?: number;
}

const METHOD_ORDER: readonly ClassificationMethod[] = [
  ClassificationMethod.PATTERN,
  ClassificationMethod.SEMANTIC,
  ClassificationMethod.KEYWORD,
  ClassificationMethod.FALLBACK_DEFAULT,
];

const percent = (value: number): string => `${(value * 100).toFixed(1)}%`;

/**
 * Relatório de avaliação em texto (para scripts e logs)
 */
export function formatEvaluationReport(
  report: EvaluationReport,
  options: ReportFormatOptions = {},
): string {
  const maxMisclassified = options.maxMisclassified ?? 10;
  const lines: string[] = [
    '📊 RELATÓRIO DE AVALIAÇÃO',
    `   Acurácia: ${percent(report.accuracy)} (${report.correct}/${report.total})`,
    `   Confiança média: ${report.averageConfidence.toFixed(3)}`,
    '',
    '🔀 Distribuição por método:',
  ];

  const classified = METHOD_ORDER.reduce((sum, method) => sum + report.methodDistribution[method], 0);
  for (const method of METHOD_ORDER) {
    const count = report.methodDistribution[method];
    const share = classified > 0 ? count / classified : 0;
    lines.push(`   - ${method}: ${count} (${percent(share)})`);
  }

  if (report.misclassified.length > 0) {
    lines.push('', `❌ Erros (${report.misclassified.length}):`);
    for (const item of report.misclassified.slice(0, maxMisclassified)) {
      lines.push(
        `   #${item.index} "${item.query}"`,
        `      esperado: ${item.expected} | previsto: ${item.predicted} ` +
          `(${item.method}, ${item.confidence.toFixed(3)})`,
      );
    }
    if (report.misclassified.length > maxMisclassified) {
      lines.push(`   ... e mais ${report.misclassified.length - maxMisclassified}`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('', `⚠️  Falhas (${report.failures.length}):`);
    for (const failure of report.failures) {
      lines.push(`   #${failure.index} "${failure.query}": ${failure.error}`);
    }
  }

  return lines.join('\n');
}

/**
 * Ranking da comparação de modelos de embedding
 */
export function formatModelComparison(results: readonly ModelComparisonResult[]): string {
  const lines: string[] = ['🏆 COMPARAÇÃO DE MODELOS'];

  results.forEach((result, position) => {
    if (result.succeeded) {
      lines.push(
        `   ${position + 1}. ${result.model}: ${percent(result.accuracy)} ` +
          `(confiança ${result.averageConfidence.toFixed(3)}, dim ${result.dimension}, ` +
          `treino ${result.trainingMs}ms, avaliação ${result.evaluationMs}ms)`,
      );
    } else {
      lines.push(`   ${position + 1}. ${result.model}: ❌ ${result.error}`);
    }
  });

  return lines.join('\n');
}
