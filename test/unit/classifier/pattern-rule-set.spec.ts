import { join } from 'path';
import { IntentCategory } from '../../../src/common/constants/intent-categories.constants';
import { ConfigurationError } from '../../../src/common/errors/classifier.errors';
import {
  PatternRuleDefinition,
  PatternRuleSet,
} from '../../../src/features/classifier/patterns/pattern-rule-set';

const PATTERNS_FILE = join(__dirname, '../../../data/namjari-patterns.json');

function rule(overrides: Partial<PatternRuleDefinition> & Pick<PatternRuleDefinition, 'id'>): PatternRuleDefinition {
  return {
    pattern: 'foo',
    category: IntentCategory.GREETINGS,
    priority: 1,
    isAntiPattern: false,
    ...overrides,
  };
}

function captureConfigurationError(action: () => unknown): ConfigurationError {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('ConfigurationError esperado');
}

describe('PatternRuleSet', () => {
  describe('tabela de padrões do projeto', () => {
    let patterns: PatternRuleSet;

    beforeAll(() => {
      patterns = PatternRuleSet.fromFile(PATTERNS_FILE);
    });

    it('deve carregar todas as regras e anti-patterns', () => {
      expect(patterns.size).toBe(70);
    });

    it('deve classificar pergunta de taxa pela regra de custo', () => {
      // Act
      const match = patterns.match('নামজারি করতে কত টাকা লাগে?');

      // Assert
      expect(match).toEqual({
        category: IntentCategory.NAMJARI_FEE,
        ruleId: 'fee-cost',
        priority: 2,
        description: 'Custo do namjari',
      });
    });

    it('deve casar a palavra isolada "নামজারি" como elegibilidade', () => {
      expect(patterns.match('নামজারি')?.ruleId).toBe('eligibility-single-word');
    });

    it('deve aplicar a regra de recurso quando não há veto', () => {
      const match = patterns.match('আবেদন বাতিল হয়ে গেছে');

      expect(match?.category).toBe(IntentCategory.NAMJARI_REJECTED_APPEAL);
      expect(match?.ruleId).toBe('rejected-appeal');
    });

    it('deve ignorar a regra vetada por anti-pattern de despedida', () => {
      expect(patterns.match('আবেদন বাতিল হয়ে গেছে, ধন্যবাদ')).toBeNull();
    });

    it('deve encontrar o veto de saudação para recurso de rejeição', () => {
      const veto = patterns.findVeto('হ্যালো, আমার আবেদন', IntentCategory.NAMJARI_REJECTED_APPEAL);

      expect(veto?.id).toBe('anti-rejected-greeting');
    });

    it('não deve vetar categorias sem anti-patterns', () => {
      expect(patterns.findVeto('হ্যালো, আমার আবেদন', IntentCategory.GREETINGS)).toBeNull();
    });

    it('deve retornar null para texto sem regra e para string vazia', () => {
      expect(patterns.match('xyzzy plugh')).toBeNull();
      expect(patterns.match('   ')).toBeNull();
    });
  });

  describe('ordem de avaliação', () => {
    it('deve avaliar tiers de menor prioridade primeiro', () => {
      // Arrange
      const patterns = new PatternRuleSet([
        rule({ id: 'late', pattern: 'foo', category: IntentCategory.GREETINGS, priority: 2 }),
        rule({ id: 'early', pattern: 'foo bar', category: IntentCategory.GOODBYE, priority: 1 }),
      ]);

      // Act & Assert
      expect(patterns.match('foo bar')?.ruleId).toBe('early');
      expect(patterns.match('foo')?.ruleId).toBe('late');
    });

    it('deve manter a ordem de declaração dentro do tier', () => {
      const patterns = new PatternRuleSet([
        rule({ id: 'first', pattern: 'foo', category: IntentCategory.GOODBYE }),
        rule({ id: 'second', pattern: 'foo', category: IntentCategory.GREETINGS }),
      ]);

      expect(patterns.match('foo')?.ruleId).toBe('first');
    });

    it('deve seguir para a próxima regra quando a primeira é vetada', () => {
      const patterns = new PatternRuleSet([
        rule({ id: 'greeting', pattern: 'foo', category: IntentCategory.GREETINGS, priority: 1 }),
        rule({ id: 'veto', pattern: 'bar', category: IntentCategory.GREETINGS, priority: 0, isAntiPattern: true }),
        rule({ id: 'goodbye', pattern: 'foo', category: IntentCategory.GOODBYE, priority: 2 }),
      ]);

      expect(patterns.match('foo bar')?.ruleId).toBe('goodbye');
      expect(patterns.match('foo')?.ruleId).toBe('greeting');
    });

    it('deve casar sem diferenciar maiúsculas nem acentos', () => {
      const patterns = new PatternRuleSet([rule({ id: 'accent', pattern: 'Ação' })]);

      expect(patterns.match('ACAO urgente')?.ruleId).toBe('accent');
    });
  });

  describe('validação', () => {
    it('deve rejeitar ids duplicados', () => {
      const error = captureConfigurationError(
        () => new PatternRuleSet([rule({ id: 'dup', pattern: 'a' }), rule({ id: 'dup', pattern: 'b' })]),
      );

      expect(error.details).toEqual(['regra dup: id duplicado']);
    });

    it('deve rejeitar categoria desconhecida', () => {
      const error = captureConfigurationError(
        () => new PatternRuleSet([rule({ id: 'x', category: 'weather' })]),
      );

      expect(error.details).toEqual(['regra x: categoria desconhecida "weather"']);
    });

    it('deve rejeitar prioridade não inteira', () => {
      const error = captureConfigurationError(() => new PatternRuleSet([rule({ id: 'x', priority: 1.5 })]));

      expect(error.details).toEqual(['regra x: prioridade deve ser inteira (recebido: 1.5)']);
    });

    it('deve rejeitar padrão vazio', () => {
      const error = captureConfigurationError(() => new PatternRuleSet([rule({ id: 'x', pattern: '  ' })]));

      expect(error.details).toEqual(['regra x: padrão vazio']);
    });

    it('deve rejeitar regex inválida', () => {
      const error = captureConfigurationError(() => new PatternRuleSet([rule({ id: 'bad', pattern: '(abc' })]));

      expect(error.details).toHaveLength(1);
      expect(error.details[0]).toMatch(/^regra bad: regex inválida/);
    });

    it('deve acumular todos os problemas antes de lançar', () => {
      const error = captureConfigurationError(
        () =>
          new PatternRuleSet([
            rule({ id: '', pattern: 'a' }),
            rule({ id: 'y', category: 'weather', pattern: '[' }),
          ]),
      );

      expect(error.details).toHaveLength(3);
      expect(error.details[0]).toBe('regra #0: id vazio');
      expect(error.details[1]).toBe('regra y: categoria desconhecida "weather"');
    });

    it('deve falhar ao ler arquivo inexistente', () => {
      expect(() => PatternRuleSet.fromFile(join(__dirname, 'nao-existe.json'))).toThrow(ConfigurationError);
    });
  });
});
