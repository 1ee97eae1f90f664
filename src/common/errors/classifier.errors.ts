/**
 * Erros do classificador
 *
 * - ConfigurationError: dados/regras/configuração inválidos (falha no carregamento ou treino)
 * - EmbeddingProviderError: provider de embeddings indisponível ou resposta malformada
 * - VectorIndexError: falha ao construir ou consultar o índice vetorial
 */
export class ClassifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConfigurationError extends ClassifierError {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}\n  - ${details.join('\n  - ')}` : message);
  }
}

export class EmbeddingProviderError extends ClassifierError {}

export class VectorIndexError extends ClassifierError {}

/**
 * Mensagem legível para qualquer valor lançado
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
