/**
 * Provider de embeddings de sentenças
 *
 * Implementações devem devolver vetores de dimensão constante e, em
 * `embedMany`, na mesma ordem dos textos recebidos.
 */
export interface EmbeddingProvider {
  /** Identificador do modelo (logs, status e comparação de modelos) */
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: readonly string[]): Promise<number[][]>;
}

/**
 * Cria um provider para um modelo específico (usado na comparação de modelos)
 */
export type EmbeddingProviderFactory = (model: string) => EmbeddingProvider;

export const EMBEDDING_PROVIDER = 'EMBEDDING_PROVIDER';
export const EMBEDDING_PROVIDER_FACTORY = 'EMBEDDING_PROVIDER_FACTORY';
