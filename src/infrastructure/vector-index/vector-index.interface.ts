export interface VectorSearchHit {
  /** Posição do vetor na lista passada para `build` */
  readonly id: number;
  /** Similaridade de cosseno em [-1, 1] */
  readonly similarity: number;
}

export interface VectorIndex {
  readonly size: number;
  readonly dimension: number;
  /** Até k vizinhos mais próximos. Resultados aproximados são aceitos. */
  search(vector: readonly number[], k: number): Promise<VectorSearchHit[]>;
}

export interface VectorIndexProvider {
  build(vectors: readonly (readonly number[])[]): Promise<VectorIndex>;
}

export const VECTOR_INDEX_PROVIDER = 'VECTOR_INDEX_PROVIDER';
