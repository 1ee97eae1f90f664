import { IntentCategory } from '../../../src/common/constants/intent-categories.constants';
import {
  ConfigurationError,
  EmbeddingProviderError,
} from '../../../src/common/errors/classifier.errors';
import { IndexedExample, SemanticNeighbor } from '../../../src/features/classifier/classifier.types';
import {
  SemanticMatcher,
  SemanticMatcherOptions,
} from '../../../src/features/classifier/semantic/semantic.matcher';
import { EmbeddingProvider } from '../../../src/infrastructure/ai/embeddings/embedding-provider.interface';
import { InMemoryVectorIndexProvider } from '../../../src/infrastructure/vector-index/in-memory-vector-index.provider';
import { VectorIndexProvider } from '../../../src/infrastructure/vector-index/vector-index.interface';
import { FakeEmbeddingProvider } from '../../helpers/fake-embedding.provider';

const OPTIONS: SemanticMatcherOptions = { batchSize: 64, concurrency: 2, cueBoosts: true };

function example(index: number, text: string, category: IntentCategory): IndexedExample {
  return { text, category, answer: `resposta ${index}`, index };
}

const EXAMPLES: IndexedExample[] = [
  example(0, 'status one', IntentCategory.NAMJARI_STATUS_CHECK),
  example(1, 'status two', IntentCategory.NAMJARI_STATUS_CHECK),
  example(2, 'fee one', IntentCategory.NAMJARI_FEE),
];

function provider(): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider([
    ['status one', [1, 0, 0]],
    ['status two', [1, 0, 0]],
    ['fee one', [0, 1, 0]],
    ['paraphrase', [1, 0, 0]],
    ['short vector', [1, 0]],
  ]);
}

describe('SemanticMatcher', () => {
  let embeddings: FakeEmbeddingProvider;
  let matcher: SemanticMatcher;

  beforeEach(async () => {
    embeddings = provider();
    matcher = await SemanticMatcher.build(EXAMPLES, embeddings, new InMemoryVectorIndexProvider(), OPTIONS);
  });

  describe('build', () => {
    it('deve indexar todos os exemplos', () => {
      expect(matcher.size).toBe(3);
      expect(matcher.dimension).toBe(3);
    });

    it('deve dividir os textos em lotes preservando a ordem', async () => {
      // Arrange
      const texts = ['aa', 'bb', 'cc', 'dd', 'ee'];
      const fake = new FakeEmbeddingProvider(texts.map((text, i): [string, number[]] => [text, [i + 1, 1]]));
      const rows = texts.map((text, i) => example(i, text, IntentCategory.GREETINGS));

      // Act
      const built = await SemanticMatcher.build(rows, fake, new InMemoryVectorIndexProvider(), {
        ...OPTIONS,
        batchSize: 2,
      });

      // Assert
      expect(fake.calls).toEqual([['aa', 'bb'], ['cc', 'dd'], ['ee']]);
      expect(built.size).toBe(5);
    });

    it('deve rejeitar dataset vazio', async () => {
      await expect(
        SemanticMatcher.build([], embeddings, new InMemoryVectorIndexProvider(), OPTIONS),
      ).rejects.toThrow(ConfigurationError);
    });

    it('deve propagar falha do provider de embeddings', async () => {
      embeddings.failure = new Error('offline');

      await expect(
        SemanticMatcher.build(EXAMPLES, embeddings, new InMemoryVectorIndexProvider(), OPTIONS),
      ).rejects.toThrow('offline');
    });

    it('deve parar de pedir lotes depois que um lote falha', async () => {
      // Arrange
      const embedMany = jest
        .fn<Promise<number[][]>, [readonly string[]]>()
        .mockRejectedValueOnce(new Error('offline'))
        .mockImplementation(() => new Promise((resolve) => setImmediate(() => resolve([[1, 0]]))));
      const stub: EmbeddingProvider = { model: 'stub', embed: async () => [1, 0], embedMany };
      const rows = ['aa', 'bb', 'cc', 'dd'].map((text, i) => example(i, text, IntentCategory.GREETINGS));

      // Act
      const build = SemanticMatcher.build(rows, stub, new InMemoryVectorIndexProvider(), {
        ...OPTIONS,
        batchSize: 1,
        concurrency: 2,
      });
      await expect(build).rejects.toThrow('offline');
      await new Promise((resolve) => setImmediate(resolve));

      // Assert
      expect(embedMany).toHaveBeenCalledTimes(2);
      expect(embedMany.mock.calls.map(([texts]) => texts)).toEqual([['aa'], ['bb']]);
    });

    it('deve rejeitar embeddings com dimensões inconsistentes', async () => {
      const fake = new FakeEmbeddingProvider([
        ['status one', [1, 0, 0]],
        ['status two', [1, 0]],
      ]);

      await expect(
        SemanticMatcher.build(EXAMPLES.slice(0, 2), fake, new InMemoryVectorIndexProvider(), OPTIONS),
      ).rejects.toThrow(EmbeddingProviderError);
    });
  });

  describe('query', () => {
    it('deve retornar os k vizinhos mais próximos com similaridade em [0, 1]', async () => {
      const neighbors = await matcher.query('paraphrase', 2);

      expect(neighbors.map((neighbor) => neighbor.example.index)).toEqual([0, 1]);
      expect(neighbors.map((neighbor) => neighbor.similarity)).toEqual([1, 1]);
    });

    it('deve mapear cosseno 0 para 0.5', async () => {
      const neighbors = await matcher.query('paraphrase', 10);

      expect(neighbors).toHaveLength(3);
      expect(neighbors[2].example.index).toBe(2);
      expect(neighbors[2].similarity).toBe(0.5);
    });

    it('deve rejeitar embedding da consulta com dimensão diferente', async () => {
      await expect(matcher.query('short vector', 3)).rejects.toThrow(EmbeddingProviderError);
    });

    it('deve descartar ids que não correspondem a exemplos', async () => {
      // Arrange
      const stubIndexProvider: VectorIndexProvider = {
        build: async () => ({
          size: 3,
          dimension: 3,
          search: async () => [
            { id: 99, similarity: 0.9 },
            { id: 0, similarity: 0.5 },
          ],
        }),
      };
      const stubbed = await SemanticMatcher.build(EXAMPLES, provider(), stubIndexProvider, OPTIONS);

      // Act
      const neighbors = await stubbed.query('paraphrase', 5);

      // Assert
      expect(neighbors).toHaveLength(1);
      expect(neighbors[0].example.index).toBe(0);
      expect(neighbors[0].similarity).toBe(0.75);
    });
  });

  describe('vote', () => {
    it('deve somar similaridades por categoria', async () => {
      const neighbors = await matcher.query('paraphrase', 10);

      expect(matcher.vote(neighbors, 'paraphrase')).toEqual([
        {
          category: IntentCategory.NAMJARI_STATUS_CHECK,
          weight: 2,
          agreeing: 2,
          bestSimilarity: 1,
          bestIndex: 0,
        },
        {
          category: IntentCategory.NAMJARI_FEE,
          weight: 0.5,
          agreeing: 1,
          bestSimilarity: 0.5,
          bestIndex: 2,
        },
      ]);
    });

    it('deve reforçar a categoria indicada por cue léxica', () => {
      // Arrange
      const neighbors: SemanticNeighbor[] = [
        { example: example(1, 'fee', IntentCategory.NAMJARI_FEE), similarity: 0.95 },
        { example: example(0, 'status', IntentCategory.NAMJARI_STATUS_CHECK), similarity: 0.9 },
      ];

      // Act
      const votes = matcher.vote(neighbors, 'অনেক দিন অপেক্ষা করছি');

      // Assert
      expect(votes[0].category).toBe(IntentCategory.NAMJARI_STATUS_CHECK);
      expect(votes[0].weight).toBeCloseTo(1.08, 10);
      expect(votes[1].weight).toBe(0.95);
    });

    it('deve atenuar herança quando a consulta fala de khatian', () => {
      const neighbors: SemanticNeighbor[] = [
        { example: example(0, 'inheritance', IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS), similarity: 0.9 },
        { example: example(1, 'copy', IntentCategory.NAMJARI_KHATIAN_COPY), similarity: 0.8 },
      ];

      const votes = matcher.vote(neighbors, 'খতিয়ানের কপি লাগবে');

      expect(votes.map((vote) => vote.category)).toEqual([
        IntentCategory.NAMJARI_KHATIAN_COPY,
        IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS,
      ]);
      expect(votes[1].weight).toBeCloseTo(0.63, 10);
    });

    it('deve reforçar herança quando a consulta cita হাল ওয়াশিাননামা', () => {
      const neighbors: SemanticNeighbor[] = [
        { example: example(1, 'fee', IntentCategory.NAMJARI_FEE), similarity: 0.9 },
        { example: example(0, 'inheritance', IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS), similarity: 0.8 },
      ];

      const votes = matcher.vote(neighbors, 'হাল ওয়াশিাননামা দিতে হবে');

      expect(votes[0].category).toBe(IntentCategory.NAMJARI_INHERITANCE_DOCUMENTS);
      expect(votes[0].weight).toBeCloseTo(0.96, 10);
      expect(votes[1].weight).toBe(0.9);
    });

    it('não deve aplicar cues quando desativadas', async () => {
      // Arrange
      const plain = await SemanticMatcher.build(EXAMPLES, provider(), new InMemoryVectorIndexProvider(), {
        ...OPTIONS,
        cueBoosts: false,
      });
      const neighbors: SemanticNeighbor[] = [
        { example: example(1, 'fee', IntentCategory.NAMJARI_FEE), similarity: 0.95 },
        { example: example(0, 'status', IntentCategory.NAMJARI_STATUS_CHECK), similarity: 0.9 },
      ];

      // Act
      const votes = plain.vote(neighbors, 'অনেক দিন অপেক্ষা করছি');

      // Assert
      expect(votes.map((vote) => [vote.category, vote.weight])).toEqual([
        [IntentCategory.NAMJARI_FEE, 0.95],
        [IntentCategory.NAMJARI_STATUS_CHECK, 0.9],
      ]);
    });

    it('deve desempatar pesos iguais pelo índice do melhor vizinho', () => {
      const neighbors: SemanticNeighbor[] = [
        { example: example(5, 'goodbye', IntentCategory.GOODBYE), similarity: 0.9 },
        { example: example(3, 'greeting', IntentCategory.GREETINGS), similarity: 0.9 },
      ];

      const votes = matcher.vote(neighbors, 'ok');

      expect(votes.map((vote) => vote.category)).toEqual([IntentCategory.GREETINGS, IntentCategory.GOODBYE]);
    });
  });
});
