import { Logger } from '@nestjs/common';
import { IntentCategory } from '@common/constants/intent-categories.constants';
import { SEMANTIC_CUE_BOOSTS } from '@common/constants/semantic-cues.constants';
import { ConfigurationError, EmbeddingProviderError } from '@common/errors/classifier.errors';
import { normalizeQuery } from '@core/utils/text-normalizer.util';
import { toUnitInterval } from '@core/utils/vector.util';
import { EmbeddingProvider } from '@infrastructure/ai/embeddings/embedding-provider.interface';
import {
  VectorIndex,
  VectorIndexProvider,
} from '@infrastructure/vector-index/vector-index.interface';
import { IndexedExample, SemanticNeighbor, SemanticVote } from '../classifier.types';

export interface SemanticMatcherOptions {
  readonly batchSize: number;
  readonly concurrency: number;
  /** Aplica SEMANTIC_CUE_BOOSTS na votação */
  readonly cueBoosts: boolean;
}

const NORMALIZED_CUE_BOOSTS = SEMANTIC_CUE_BOOSTS.map((boost) => ({
  ...boost,
  cues: boost.cues.map((cue) => normalizeQuery(cue)),
}));

interface VoteAccumulator {
  weight: number;
  agreeing: number;
  bestSimilarity: number;
  bestIndex: number;
}

/**
 * Busca de vizinhos semânticos + votação ponderada por categoria
 */
export class SemanticMatcher {
  private static readonly logger = new Logger(SemanticMatcher.name);

  private constructor(
    private readonly examples: readonly IndexedExample[],
    private readonly index: VectorIndex,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly cueBoosts: boolean,
  ) {}

  /**
   * Gera embeddings de todos os exemplos (em lotes, com concorrência limitada)
   * e constrói o índice. Qualquer falha rejeita o build inteiro.
   */
  static async build(
    examples: readonly IndexedExample[],
    embeddingProvider: EmbeddingProvider,
    vectorIndexProvider: VectorIndexProvider,
    options: SemanticMatcherOptions,
  ): Promise<SemanticMatcher> {
    if (examples.length === 0) {
      throw new ConfigurationError('Nenhum exemplo de treino para o índice semântico');
    }

    const texts = examples.map((example) => normalizeQuery(example.text));
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += options.batchSize) {
      batches.push(texts.slice(i, i + options.batchSize));
    }

    const startTime = Date.now();
    const batchResults: number[][][] = batches.map(() => []);
    let nextBatch = 0;
    // Após a primeira falha nenhum worker pega lote novo
    let failed = false;

    const worker = async (): Promise<void> => {
      while (!failed && nextBatch < batches.length) {
        const batchIndex = nextBatch++;
        const batch = batches[batchIndex];
        try {
          const vectors = await embeddingProvider.embedMany(batch);
          if (vectors.length !== batch.length) {
            throw new EmbeddingProviderError(
              `Lote ${batchIndex}: ${vectors.length} vetores para ${batch.length} textos`,
            );
          }
          batchResults[batchIndex] = vectors;
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    const workers = Math.min(options.concurrency, batches.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const vectors = batchResults.flat();
    const dimension = vectors[0].length;
    const inconsistent = vectors.findIndex((vector) => vector.length !== dimension);
    if (dimension === 0 || inconsistent !== -1) {
      throw new EmbeddingProviderError(
        `Embeddings com dimensão inválida (esperado ${dimension}, exemplo ${inconsistent})`,
      );
    }

    const index = await vectorIndexProvider.build(vectors);

    SemanticMatcher.logger.log(
      `🧠 Índice semântico: ${vectors.length} vetores (dim ${dimension}, ${batches.length} lotes) ` +
        `em ${Date.now() - startTime}ms - modelo ${embeddingProvider.model}`,
    );

    return new SemanticMatcher(examples, index, embeddingProvider, options.cueBoosts);
  }

  get dimension(): number {
    return this.index.dimension;
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Até k vizinhos, ordenados por similaridade (desc) e índice do exemplo (asc)
   */
  async query(text: string, k: number): Promise<SemanticNeighbor[]> {
    const vector = await this.embeddingProvider.embed(normalizeQuery(text));
    if (vector.length !== this.index.dimension) {
      throw new EmbeddingProviderError(
        `Embedding da consulta com dimensão ${vector.length} (índice: ${this.index.dimension})`,
      );
    }

    const hits = await this.index.search(vector, k);
    const neighbors: SemanticNeighbor[] = [];

    for (const hit of hits) {
      const example = Number.isInteger(hit.id) ? this.examples[hit.id] : undefined;
      if (!example) continue;
      neighbors.push({ example, similarity: toUnitInterval(hit.similarity) });
    }

    return neighbors
      .sort((a, b) => b.similarity - a.similarity || a.example.index - b.example.index)
      .slice(0, k);
  }

  /**
   * Votação ponderada: soma das similaridades por categoria, ajustada pelos boosts léxicos.
   * Ordenada por peso (desc) e pelo índice do melhor vizinho (asc).
   */
  vote(neighbors: readonly SemanticNeighbor[], query: string): SemanticVote[] {
    const votes = new Map<IntentCategory, VoteAccumulator>();

    for (const { example, similarity } of neighbors) {
      const current = votes.get(example.category);
      if (!current) {
        votes.set(example.category, {
          weight: similarity,
          agreeing: 1,
          bestSimilarity: similarity,
          bestIndex: example.index,
        });
        continue;
      }

      current.weight += similarity;
      current.agreeing += 1;
      if (
        similarity > current.bestSimilarity ||
        (similarity === current.bestSimilarity && example.index < current.bestIndex)
      ) {
        current.bestSimilarity = similarity;
        current.bestIndex = example.index;
      }
    }

    if (this.cueBoosts) {
      applyCueBoosts(votes, normalizeQuery(query));
    }

    return [...votes.entries()]
      .map(([category, vote]) => ({ category, ...vote }))
      .sort((a, b) => b.weight - a.weight || a.bestIndex - b.bestIndex);
  }
}

function applyCueBoosts(votes: Map<IntentCategory, VoteAccumulator>, normalizedQuery: string): void {
  for (const boost of NORMALIZED_CUE_BOOSTS) {
    if (!boost.cues.some((cue) => normalizedQuery.includes(cue))) continue;

    for (const category of boost.categories) {
      const vote = votes.get(category);
      if (vote) vote.weight *= boost.factor;
    }
  }
}
