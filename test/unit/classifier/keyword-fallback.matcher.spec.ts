import { IntentCategory } from '../../../src/common/constants/intent-categories.constants';
import { IndexedExample } from '../../../src/features/classifier/classifier.types';
import { KeywordFallbackMatcher } from '../../../src/features/classifier/keyword/keyword-fallback.matcher';

function examples(rows: ReadonlyArray<readonly [string, IntentCategory]>): IndexedExample[] {
  return rows.map(([text, category], index) => ({ text, category, answer: `resposta ${index}`, index }));
}

const OPTIONS = { ngramRange: [1, 2], maxFeatures: 5000 } as const;

describe('KeywordFallbackMatcher', () => {
  describe('corpus sem termos em comum', () => {
    const matcher = KeywordFallbackMatcher.fit(
      examples([
        ['khatian copy download', IntentCategory.NAMJARI_KHATIAN_COPY],
        ['fee amount payment', IntentCategory.NAMJARI_FEE],
        ['hearing notice date', IntentCategory.NAMJARI_HEARING_NOTIFICATION],
      ]),
      OPTIONS,
    );

    it('deve montar o vocabulário com unigramas e bigramas', () => {
      expect(matcher.vocabularySize).toBe(15);
    });

    it('deve pontuar apenas a categoria com termos em comum', () => {
      // Act
      const scores = matcher.score('How to download Khatian copy?');

      // Assert: 4 termos da consulta no vocabulário, 5 no exemplo, todos com o mesmo idf
      expect(scores).toHaveLength(1);
      expect(scores[0].category).toBe(IntentCategory.NAMJARI_KHATIAN_COPY);
      expect(scores[0].exampleIndex).toBe(0);
      expect(scores[0].score).toBeCloseTo(2 / Math.sqrt(5), 10);
    });

    it('deve retornar lista vazia para consulta fora do vocabulário', () => {
      expect(matcher.score('completely unrelated words')).toEqual([]);
      expect(matcher.score('')).toEqual([]);
    });
  });

  it('deve limitar o vocabulário aos termos mais frequentes', () => {
    // Arrange: "namjari" aparece 3 vezes; empates de frequência pela ordem do termo
    const matcher = KeywordFallbackMatcher.fit(
      examples([
        ['namjari fee', IntentCategory.NAMJARI_FEE],
        ['namjari copy', IntentCategory.NAMJARI_KHATIAN_COPY],
        ['namjari hearing', IntentCategory.NAMJARI_HEARING_NOTIFICATION],
      ]),
      { ngramRange: [1, 2], maxFeatures: 2 },
    );

    // Act
    const copyScores = matcher.score('copy');

    // Assert: vocabulário = { copy, namjari }
    const copyIdf = Math.log(4 / 2) + 1;
    expect(matcher.vocabularySize).toBe(2);
    expect(matcher.score('fee')).toEqual([]);
    expect(copyScores).toHaveLength(1);
    expect(copyScores[0]).toEqual({
      category: IntentCategory.NAMJARI_KHATIAN_COPY,
      score: expect.closeTo(copyIdf / Math.sqrt(1 + copyIdf * copyIdf), 10),
      exampleIndex: 1,
    });
  });

  it('deve usar o melhor exemplo de cada categoria', () => {
    const matcher = KeywordFallbackMatcher.fit(
      examples([
        ['alpha beta gamma', IntentCategory.GREETINGS],
        ['delta', IntentCategory.GREETINGS],
        ['epsilon', IntentCategory.GOODBYE],
      ]),
      OPTIONS,
    );

    const scores = matcher.score('delta');

    expect(scores).toEqual([
      { category: IntentCategory.GREETINGS, score: expect.closeTo(1, 10), exampleIndex: 1 },
    ]);
  });

  it('deve desempatar categorias pelo índice do exemplo', () => {
    const matcher = KeywordFallbackMatcher.fit(
      examples([
        ['same words here', IntentCategory.GOODBYE],
        ['same words here', IntentCategory.GREETINGS],
        ['other text', IntentCategory.IRRELEVANT],
      ]),
      OPTIONS,
    );

    const scores = matcher.score('same words here');

    expect(scores.map((score) => score.category)).toEqual([IntentCategory.GOODBYE, IntentCategory.GREETINGS]);
    expect(scores[0].score).toBe(scores[1].score);
  });

  it('deve ordenar categorias pelo score', () => {
    const matcher = KeywordFallbackMatcher.fit(
      examples([
        ['mutation fee', IntentCategory.NAMJARI_FEE],
        ['mutation status online check', IntentCategory.NAMJARI_STATUS_CHECK],
      ]),
      OPTIONS,
    );

    const scores = matcher.score('mutation fee');

    expect(scores.map((score) => score.category)).toEqual([
      IntentCategory.NAMJARI_FEE,
      IntentCategory.NAMJARI_STATUS_CHECK,
    ]);
    expect(scores[0].score).toBeCloseTo(1, 10);
    expect(scores[1].score).toBeGreaterThan(0);
  });
});
