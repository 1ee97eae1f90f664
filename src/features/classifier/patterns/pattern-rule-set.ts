import { readFileSync } from 'fs';
import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { IntentCategory, isIntentCategory } from '@common/constants/intent-categories.constants';
import { ConfigurationError, describeError } from '@common/errors/classifier.errors';
import { flattenValidationErrors } from '@common/utils/validation.util';
import { normalizeQuery, normalizeUnicode } from '@core/utils/text-normalizer.util';
import { PatternMatch } from '../classifier.types';
import { PatternFileDto } from './pattern-file.dto';

interface PatternRuleBase {
  readonly id: string;
  readonly regex: RegExp;
  readonly category: IntentCategory;
  /** Menor número = tier avaliado primeiro */
  readonly priority: number;
  readonly description?: string;
}

/** Regra que atribui a categoria */
export interface AssigningPatternRule extends PatternRuleBase {
  readonly isAntiPattern: false;
}

/** Regra que veta a categoria */
export interface AntiPatternRule extends PatternRuleBase {
  readonly isAntiPattern: true;
}

export type PatternRule = AssigningPatternRule | AntiPatternRule;

/**
 * Definição "crua" de uma regra, antes da compilação
 */
export interface PatternRuleDefinition {
  readonly id: string;
  readonly pattern: string;
  readonly category: string;
  readonly priority: number;
  readonly isAntiPattern: boolean;
  readonly description?: string;
}

const REGEX_FLAGS = 'iu';

/**
 * Conjunto ordenado de regras regex com vetos (anti-patterns)
 *
 * Tiers são avaliados em ordem crescente de prioridade e, dentro do tier,
 * na ordem de declaração. A primeira regra que casa vence, a menos que um
 * anti-pattern da mesma categoria também case: nesse caso a avaliação segue.
 */
export class PatternRuleSet {
  private readonly logger = new Logger(PatternRuleSet.name);
  private readonly orderedRules: readonly AssigningPatternRule[];
  private readonly antiPatterns: ReadonlyMap<IntentCategory, readonly AntiPatternRule[]>;

  constructor(definitions: readonly PatternRuleDefinition[]) {
    const problems: string[] = [];
    const seenIds = new Set<string>();
    const rules: AssigningPatternRule[] = [];
    const antiPatterns = new Map<IntentCategory, AntiPatternRule[]>();

    definitions.forEach((definition, position) => {
      const label = definition.id || `#${position}`;

      if (!definition.id) {
        problems.push(`regra ${label}: id vazio`);
      } else if (seenIds.has(definition.id)) {
        problems.push(`regra ${label}: id duplicado`);
      }
      seenIds.add(definition.id);

      if (!Number.isInteger(definition.priority)) {
        problems.push(`regra ${label}: prioridade deve ser inteira (recebido: ${definition.priority})`);
      }

      const category = definition.category;
      if (!isIntentCategory(category)) {
        problems.push(`regra ${label}: categoria desconhecida "${category}"`);
      }

      if (definition.pattern.trim().length === 0) {
        problems.push(`regra ${label}: padrão vazio`);
        return;
      }

      let regex: RegExp;
      try {
        regex = new RegExp(normalizeUnicode(definition.pattern), REGEX_FLAGS);
      } catch (error) {
        problems.push(`regra ${label}: regex inválida (${describeError(error)})`);
        return;
      }

      if (!isIntentCategory(category)) return;

      const base = {
        id: definition.id,
        regex,
        category,
        priority: definition.priority,
        description: definition.description,
      };

      if (definition.isAntiPattern) {
        const list = antiPatterns.get(category) ?? [];
        list.push({ ...base, isAntiPattern: true });
        antiPatterns.set(category, list);
      } else {
        rules.push({ ...base, isAntiPattern: false });
      }
    });

    if (problems.length > 0) {
      throw new ConfigurationError('Tabela de padrões inválida', problems);
    }

    // sort é estável: a ordem de declaração se mantém dentro do tier
    this.orderedRules = [...rules].sort((a, b) => a.priority - b.priority);
    this.antiPatterns = antiPatterns;
  }

  /**
   * Carrega e compila a tabela de regras de um arquivo JSON
   */
  static fromFile(path: string): PatternRuleSet {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Não foi possível ler a tabela de padrões ${path}`, [
        describeError(error),
      ]);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`Tabela de padrões ${path} deve ser um objeto JSON`);
    }

    const file = plainToInstance(PatternFileDto, parsed);
    const errors = validateSync(file);
    if (errors.length > 0) {
      throw new ConfigurationError(
        `Tabela de padrões ${path} com formato inválido`,
        flattenValidationErrors(errors),
      );
    }

    const definitions: PatternRuleDefinition[] = [];
    for (const tier of file.tiers) {
      for (const rule of tier.rules) {
        definitions.push({ ...rule, priority: tier.priority, isAntiPattern: false });
      }
    }
    for (const rule of file.antiPatterns ?? []) {
      definitions.push({ ...rule, priority: 0, isAntiPattern: true });
    }

    return new PatternRuleSet(definitions);
  }

  /** Quantidade de regras (atribuição + veto) */
  get size(): number {
    let antiCount = 0;
    for (const list of this.antiPatterns.values()) antiCount += list.length;
    return this.orderedRules.length + antiCount;
  }

  match(query: string): PatternMatch | null {
    const normalized = normalizeQuery(query);
    if (!normalized) return null;

    for (const rule of this.orderedRules) {
      if (!rule.regex.test(normalized)) continue;

      const veto = this.findVeto(normalized, rule.category);
      if (veto) {
        this.logger.debug(`🚫 Regra "${rule.id}" vetada por "${veto.id}"`);
        continue;
      }

      return {
        category: rule.category,
        ruleId: rule.id,
        priority: rule.priority,
        description: rule.description,
      };
    }

    return null;
  }

  /**
   * Primeiro anti-pattern da categoria que casa com a query (ou null)
   */
  findVeto(query: string, category: IntentCategory): AntiPatternRule | null {
    const candidates = this.antiPatterns.get(category);
    if (!candidates) return null;

    const normalized = normalizeQuery(query);
    return candidates.find((rule) => rule.regex.test(normalized)) ?? null;
  }
}
