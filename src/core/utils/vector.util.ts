/**
 * Operações vetoriais usadas pelo índice em memória e pela votação semântica
 */

/**
 * Similaridade de cosseno em [-1, 1]. Vetor nulo → 0.
 */
export function cosineSimilarity(vecA: readonly number[], vecB: readonly number[]): number {
  if (vecA.length !== vecB.length) {
    throw new Error(`Vetores com dimensões diferentes: ${vecA.length} vs ${vecB.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < vecA.length; i++) {
    dotProduct += vecA[i] * vecB[i];
    normA += vecA[i] * vecA[i];
    normB += vecB[i] * vecB[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/**
 * Converte similaridade de cosseno [-1, 1] para [0, 1]
 */
export function toUnitInterval(similarity: number): number {
  return clamp((similarity + 1) / 2, 0, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
