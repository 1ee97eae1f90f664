import {
  DEFAULT_CATEGORY,
  IntentCategory,
} from '@common/constants/intent-categories.constants';
import { clamp } from '@core/utils/vector.util';
import {
  ClassificationMethod,
  ClassificationResult,
  IndexedExample,
  KeywordScore,
  PatternMatch,
  SemanticNeighbor,
  SemanticVote,
} from '../classifier.types';

export interface FusionPolicyOptions {
  readonly semanticThreshold: number;
  readonly keywordThreshold: number;
  readonly patternConfidence: number;
  readonly fallbackConfidence: number;
  readonly semanticBoostWeight: number;
}

export interface SemanticSignal {
  readonly neighbors: readonly SemanticNeighbor[];
  readonly votes: readonly SemanticVote[];
}

/**
 * Respostas conhecidas do snapshot de treino
 */
export interface AnswerLookup {
  exampleAt(index: number): IndexedExample | undefined;
  canonicalAnswer(category: IntentCategory): string | undefined;
}

export interface FusionInput {
  readonly query: string;
  readonly pattern: PatternMatch | null;
  readonly semantic: SemanticSignal | null;
  /** Avaliado só quando necessário (semântica insegura ou empate) */
  readonly keyword: () => readonly KeywordScore[];
  readonly findVeto: (category: IntentCategory) => { readonly id: string } | null;
  readonly answers?: AnswerLookup;
}

/**
 * Decide a categoria final em ordem de curto-circuito:
 * padrão → semântica (top-1 >= limiar) → palavras-chave (> limiar) → default
 */
export class ConfidenceFusionPolicy {
  constructor(private readonly options: FusionPolicyOptions) {}

  decide(input: FusionInput): ClassificationResult {
    let keywordScores: readonly KeywordScore[] | undefined;
    const keyword = (): readonly KeywordScore[] => {
      keywordScores ??= input.keyword();
      return keywordScores;
    };

    const neighbors = input.semantic?.neighbors ?? [];

    // 1. Padrão
    if (input.pattern) {
      return this.result(input, {
        category: input.pattern.category,
        confidence: this.options.patternConfidence,
        method: ClassificationMethod.PATTERN,
        matchedRuleId: input.pattern.ruleId,
        neighbors,
        answer: input.answers?.canonicalAnswer(input.pattern.category),
        reasoning: `Regra "${input.pattern.ruleId}" (tier ${input.pattern.priority})`,
      });
    }

    // 2. Semântica
    const top = neighbors[0];
    if (input.semantic && top && top.similarity >= this.options.semanticThreshold) {
      const candidates = input.semantic.votes.filter((vote) => !input.findVeto(vote.category));
      const winner = this.pickSemanticWinner(candidates, keyword);

      if (winner) {
        const confidence = this.semanticConfidence(winner, neighbors.length);
        return this.result(input, {
          category: winner.category,
          confidence,
          method: ClassificationMethod.SEMANTIC,
          neighbors,
          keywordScores,
          answer: input.answers?.exampleAt(winner.bestIndex)?.answer,
          reasoning:
            `${winner.agreeing}/${neighbors.length} vizinhos concordam ` +
            `(melhor similaridade ${winner.bestSimilarity.toFixed(3)})`,
        });
      }
    }

    // 3. Palavras-chave
    const best = keyword().find((score) => !input.findVeto(score.category));
    if (best && best.score > this.options.keywordThreshold) {
      return this.result(input, {
        category: best.category,
        confidence: clamp(best.score, 0, 1),
        method: ClassificationMethod.KEYWORD,
        neighbors,
        keywordScores,
        answer: input.answers?.exampleAt(best.exampleIndex)?.answer,
        reasoning: `Similaridade TF-IDF ${best.score.toFixed(3)} com o exemplo #${best.exampleIndex}`,
      });
    }

    // 4. Default
    return this.result(input, {
      category: DEFAULT_CATEGORY,
      confidence: this.options.fallbackConfidence,
      method: ClassificationMethod.FALLBACK_DEFAULT,
      neighbors,
      keywordScores,
      answer: input.answers?.canonicalAnswer(DEFAULT_CATEGORY),
      reasoning: 'Nenhum sinal confiável',
    });
  }

  /**
   * Resultado padrão para query vazia (ou sem nenhum sinal disponível)
   */
  fallback(query: string, answers?: AnswerLookup, reasoning = 'Consulta vazia'): ClassificationResult {
    return Object.freeze({
      query,
      category: DEFAULT_CATEGORY,
      confidence: this.options.fallbackConfidence,
      method: ClassificationMethod.FALLBACK_DEFAULT,
      neighbors: [],
      answer: answers?.canonicalAnswer(DEFAULT_CATEGORY),
      reasoning,
    });
  }

  /**
   * confidence = base + (1 - base) * peso * extra
   * com base = melhor similaridade do vencedor e extra = (concordantes - 1) / (total - 1)
   */
  semanticConfidence(winner: SemanticVote, totalNeighbors: number): number {
    const base = winner.bestSimilarity;
    const extra = totalNeighbors > 1 ? (winner.agreeing - 1) / (totalNeighbors - 1) : 0;
    return clamp(base + (1 - base) * this.options.semanticBoostWeight * extra, 0, 1);
  }

  private pickSemanticWinner(
    candidates: readonly SemanticVote[],
    keyword: () => readonly KeywordScore[],
  ): SemanticVote | undefined {
    const [first] = candidates;
    if (!first) return undefined;

    const tied = candidates.filter((vote) => vote.weight === first.weight);
    if (tied.length === 1) return first;

    // Empate: desempata pelo score de palavras-chave e depois pelo índice
    const scores = new Map<IntentCategory, number>(keyword().map((score) => [score.category, score.score]));
    return [...tied].sort(
      (a, b) => (scores.get(b.category) ?? 0) - (scores.get(a.category) ?? 0) || a.bestIndex - b.bestIndex,
    )[0];
  }

  private result(
    input: FusionInput,
    decision: Omit<ClassificationResult, 'query'>,
  ): ClassificationResult {
    return Object.freeze({ query: input.query, ...decision });
  }
}
