import { IntentCategory } from '@common/constants/intent-categories.constants';
import { buildNgrams, normalizeQuery, tokenize } from '@core/utils/text-normalizer.util';
import { IndexedExample, KeywordScore } from '../classifier.types';

export interface KeywordMatcherOptions {
  readonly ngramRange: readonly [number, number];
  readonly maxFeatures: number;
}

/** Vetor esparso: coluna do vocabulário → peso */
type SparseVector = ReadonlyMap<number, number>;

/**
 * Espaço TF-IDF sobre os textos de treino
 *
 * - termos: n-gramas de palavras sobre o texto normalizado
 * - vocabulário limitado aos `maxFeatures` termos mais frequentes no corpus
 * - idf suavizado: ln((1 + n) / (1 + df)) + 1
 * - vetores L2-normalizados, então o produto escalar é o cosseno
 *
 * Score de uma categoria = melhor cosseno entre seus exemplos.
 */
export class KeywordFallbackMatcher {
  private constructor(
    private readonly examples: readonly IndexedExample[],
    private readonly vocabulary: ReadonlyMap<string, number>,
    private readonly idf: readonly number[],
    private readonly vectors: readonly SparseVector[],
    private readonly ngramRange: readonly [number, number],
  ) {}

  static fit(examples: readonly IndexedExample[], options: KeywordMatcherOptions): KeywordFallbackMatcher {
    const documents = examples.map((example) => KeywordFallbackMatcher.extractTerms(example.text, options.ngramRange));

    const totalCounts = new Map<string, number>();
    const documentFrequency = new Map<string, number>();
    for (const terms of documents) {
      for (const term of terms) {
        totalCounts.set(term, (totalCounts.get(term) ?? 0) + 1);
      }
      for (const term of new Set(terms)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    // Mais frequentes primeiro; empate pela ordem do próprio termo
    const selectedTerms = [...totalCounts.entries()]
      .sort(([termA, countA], [termB, countB]) => countB - countA || compareTerms(termA, termB))
      .slice(0, options.maxFeatures)
      .map(([term]) => term)
      .sort(compareTerms);

    const vocabulary = new Map<string, number>();
    selectedTerms.forEach((term, column) => vocabulary.set(term, column));

    const n = documents.length;
    const idf = selectedTerms.map((term) => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

    const vectors = documents.map((terms) => KeywordFallbackMatcher.vectorize(terms, vocabulary, idf));

    return new KeywordFallbackMatcher(examples, vocabulary, idf, vectors, options.ngramRange);
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  /**
   * Scores por categoria (maior primeiro). Categorias com score 0 são omitidas.
   */
  score(query: string): KeywordScore[] {
    const terms = KeywordFallbackMatcher.extractTerms(query, this.ngramRange);
    const queryVector = KeywordFallbackMatcher.vectorize(terms, this.vocabulary, this.idf);
    if (queryVector.size === 0) return [];

    const best = new Map<IntentCategory, KeywordScore>();

    this.vectors.forEach((vector, row) => {
      const similarity = dot(queryVector, vector);
      if (similarity <= 0) return;

      const example = this.examples[row];
      const current = best.get(example.category);
      // Iteração em ordem crescente: no empate fica o exemplo de menor índice
      if (!current || similarity > current.score) {
        best.set(example.category, {
          category: example.category,
          score: Math.min(similarity, 1),
          exampleIndex: example.index,
        });
      }
    });

    return [...best.values()].sort((a, b) => b.score - a.score || a.exampleIndex - b.exampleIndex);
  }

  private static extractTerms(text: string, ngramRange: readonly [number, number]): string[] {
    return buildNgrams(tokenize(normalizeQuery(text)), ngramRange);
  }

  private static vectorize(
    terms: readonly string[],
    vocabulary: ReadonlyMap<string, number>,
    idf: readonly number[],
  ): SparseVector {
    const counts = new Map<number, number>();
    for (const term of terms) {
      const column = vocabulary.get(term);
      if (column === undefined) continue;
      counts.set(column, (counts.get(column) ?? 0) + 1);
    }

    let norm = 0;
    const weighted = new Map<number, number>();
    for (const [column, count] of counts) {
      const weight = count * idf[column];
      weighted.set(column, weight);
      norm += weight * weight;
    }

    norm = Math.sqrt(norm);
    if (norm === 0) return new Map();

    for (const [column, weight] of weighted) {
      weighted.set(column, weight / norm);
    }
    return weighted;
  }
}

function compareTerms(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [column, weight] of small) {
    const other = large.get(column);
    if (other !== undefined) sum += weight * other;
  }
  return sum;
}
