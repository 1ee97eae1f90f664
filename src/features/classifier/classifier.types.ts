import { IntentCategory } from '@common/constants/intent-categories.constants';

export enum ClassificationMethod {
  PATTERN = 'pattern',
  SEMANTIC = 'semantic',
  KEYWORD = 'keyword',
  FALLBACK_DEFAULT = 'fallback_default',
}

export interface TrainingExample {
  readonly text: string;
  readonly category: IntentCategory;
  readonly answer: string;
}

/**
 * Exemplo com a posição (0-based) no dataset de treino.
 * A posição é o id do vetor no índice e o critério de desempate.
 */
export interface IndexedExample extends TrainingExample {
  readonly index: number;
}

export interface EvaluationExample {
  readonly query: string;
  readonly expectedCategory: IntentCategory;
}

export interface PatternMatch {
  readonly category: IntentCategory;
  readonly ruleId: string;
  readonly priority: number;
  readonly description?: string;
}

export interface SemanticNeighbor {
  readonly example: IndexedExample;
  /** Similaridade normalizada em [0, 1] */
  readonly similarity: number;
}

export interface SemanticVote {
  readonly category: IntentCategory;
  readonly weight: number;
  readonly agreeing: number;
  readonly bestSimilarity: number;
  readonly bestIndex: number;
}

export interface KeywordScore {
  readonly category: IntentCategory;
  readonly score: number;
  readonly exampleIndex: number;
}

export interface ClassificationResult {
  readonly query: string;
  readonly category: IntentCategory;
  readonly confidence: number;
  readonly method: ClassificationMethod;
  readonly matchedRuleId?: string;
  readonly neighbors: readonly SemanticNeighbor[];
  readonly keywordScores?: readonly KeywordScore[];
  readonly answer?: string;
  readonly reasoning: string;
}

export interface TrainingSummary {
  readonly examples: number;
  readonly categories: number;
  readonly vocabularySize: number;
  readonly dimension: number;
  readonly durationMs: number;
}

export interface MisclassifiedItem {
  readonly index: number;
  readonly query: string;
  readonly expected: IntentCategory;
  readonly predicted: IntentCategory;
  readonly confidence: number;
  readonly method: ClassificationMethod;
}

export interface EvaluationFailure {
  readonly index: number;
  readonly query: string;
  readonly expected: IntentCategory;
  readonly error: string;
}

export interface EvaluationReport {
  readonly total: number;
  readonly correct: number;
  readonly accuracy: number;
  readonly averageConfidence: number;
  readonly methodDistribution: Record<ClassificationMethod, number>;
  readonly misclassified: readonly MisclassifiedItem[];
  readonly failures: readonly EvaluationFailure[];
}

export interface ClassifierStatus {
  readonly trained: boolean;
  readonly examples: number;
  readonly categories: number;
  readonly vocabularySize: number;
  readonly dimension: number;
  readonly patternRules: number;
  readonly embeddingModel: string;
}
