import { normalizeQuery } from '../../src/core/utils/text-normalizer.util';
import { EmbeddingProvider } from '../../src/infrastructure/ai/embeddings/embedding-provider.interface';

/**
 * Provider de embeddings em memória: texto normalizado → vetor fixo
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[][] = [];
  /** Quando definido, toda chamada rejeita com este erro */
  failure: Error | null = null;
  private readonly vectors = new Map<string, number[]>();

  constructor(
    entries: ReadonlyArray<readonly [string, number[]]>,
    readonly model = 'fake-embedding',
  ) {
    for (const [text, vector] of entries) {
      this.vectors.set(normalizeQuery(text), vector);
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failure) {
      throw this.failure;
    }

    return texts.map((text) => {
      const vector = this.vectors.get(normalizeQuery(text));
      if (!vector) {
        throw new Error(`Sem vetor para "${text}"`);
      }
      return [...vector];
    });
  }
}
