import { Injectable } from '@nestjs/common';
import { VectorIndexError } from '@common/errors/classifier.errors';
import { cosineSimilarity } from '@core/utils/vector.util';
import { VectorIndex, VectorIndexProvider, VectorSearchHit } from './vector-index.interface';

/**
 * Busca exata por cosseno (varredura completa)
 *
 * Suficiente para datasets de alguns milhares de exemplos. Um índice ANN
 * pode substituir este provider via token VECTOR_INDEX_PROVIDER.
 */
export class InMemoryVectorIndex implements VectorIndex {
  constructor(
    private readonly vectors: readonly (readonly number[])[],
    readonly dimension: number,
  ) {}

  get size(): number {
    return this.vectors.length;
  }

  async search(vector: readonly number[], k: number): Promise<VectorSearchHit[]> {
    if (vector.length !== this.dimension) {
      throw new VectorIndexError(
        `Dimensão da consulta (${vector.length}) difere da do índice (${this.dimension})`,
      );
    }

    const hits = this.vectors.map((candidate, id) => ({
      id,
      similarity: cosineSimilarity(vector, candidate),
    }));

    hits.sort((a, b) => b.similarity - a.similarity || a.id - b.id);
    return hits.slice(0, Math.max(0, k));
  }
}

@Injectable()
export class InMemoryVectorIndexProvider implements VectorIndexProvider {
  async build(vectors: readonly (readonly number[])[]): Promise<VectorIndex> {
    if (vectors.length === 0) {
      throw new VectorIndexError('Não é possível construir índice sem vetores');
    }

    const dimension = vectors[0].length;
    const mismatch = vectors.findIndex((vector) => vector.length !== dimension);
    if (dimension === 0 || mismatch !== -1) {
      throw new VectorIndexError(
        `Vetores com dimensões inconsistentes (esperado ${dimension}, posição ${mismatch})`,
      );
    }

    return new InMemoryVectorIndex(
      vectors.map((vector) => [...vector]),
      dimension,
    );
  }
}
