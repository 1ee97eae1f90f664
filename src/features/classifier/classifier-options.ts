import { ConfigurationError } from '@common/errors/classifier.errors';

export interface ClassifierOptions {
  /** Similaridade normalizada mínima (inclusiva) do vizinho top-1 */
  readonly semanticThreshold: number;
  /** k vizinhos consultados no índice */
  readonly neighbors: number;
  /** Score TF-IDF mínimo (estrito) para o fallback por palavras-chave */
  readonly keywordThreshold: number;
  readonly patternConfidence: number;
  readonly fallbackConfidence: number;
  /** Peso da concordância entre vizinhos na confiança semântica */
  readonly semanticBoostWeight: number;
  readonly cueBoosts: boolean;
  readonly maxFeatures: number;
  readonly ngramRange: readonly [number, number];
  readonly embeddingBatchSize: number;
  readonly embeddingConcurrency: number;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  semanticThreshold: 0.85,
  neighbors: 10,
  keywordThreshold: 0.2,
  patternConfidence: 0.9,
  fallbackConfidence: 0.1,
  semanticBoostWeight: 0.5,
  cueBoosts: true,
  maxFeatures: 5000,
  ngramRange: [1, 2],
  embeddingBatchSize: 64,
  embeddingConcurrency: 2,
};

const UNIT_INTERVAL_KEYS = [
  'semanticThreshold',
  'keywordThreshold',
  'patternConfidence',
  'fallbackConfidence',
  'semanticBoostWeight',
] as const;

const POSITIVE_INTEGER_KEYS = [
  'neighbors',
  'maxFeatures',
  'embeddingBatchSize',
  'embeddingConcurrency',
] as const;

/**
 * Mescla overrides com os defaults e valida o resultado
 */
export function resolveClassifierOptions(overrides: Partial<ClassifierOptions> = {}): ClassifierOptions {
  // undefined (variável não definida) mantém o default
  const pick = <K extends keyof ClassifierOptions>(key: K): ClassifierOptions[K] =>
    overrides[key] ?? DEFAULT_CLASSIFIER_OPTIONS[key];

  const options: ClassifierOptions = {
    semanticThreshold: pick('semanticThreshold'),
    neighbors: pick('neighbors'),
    keywordThreshold: pick('keywordThreshold'),
    patternConfidence: pick('patternConfidence'),
    fallbackConfidence: pick('fallbackConfidence'),
    semanticBoostWeight: pick('semanticBoostWeight'),
    cueBoosts: pick('cueBoosts'),
    maxFeatures: pick('maxFeatures'),
    ngramRange: pick('ngramRange'),
    embeddingBatchSize: pick('embeddingBatchSize'),
    embeddingConcurrency: pick('embeddingConcurrency'),
  };
  const problems: string[] = [];

  for (const key of UNIT_INTERVAL_KEYS) {
    const value = options[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${key} deve estar em [0, 1] (recebido: ${value})`);
    }
  }

  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = options[key];
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${key} deve ser inteiro >= 1 (recebido: ${value})`);
    }
  }

  const [minN, maxN] = options.ngramRange;
  if (!Number.isInteger(minN) || !Number.isInteger(maxN) || minN < 1 || maxN < minN) {
    problems.push(`ngramRange inválido: [${minN}, ${maxN}]`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError('Opções do classificador inválidas', problems);
  }

  return options;
}
