import { readFile } from 'fs/promises';
import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { parse } from 'csv-parse/sync';
import { ConfigurationError, describeError } from '@common/errors/classifier.errors';
import { flattenValidationErrors } from '@common/utils/validation.util';
import { cleanQuestion } from '@core/utils/text-normalizer.util';
import { EvaluationExample, TrainingExample } from '../classifier.types';
import { EvaluationRowDto, TrainingRowDto } from './dataset-row.dto';

/** Aliases aceitos no cabeçalho (comparação case-insensitive) */
const TRAINING_COLUMNS = {
  text: ['question', 'text'],
  category: ['category', 'tag'],
  answer: ['answer'],
} as const;

const EVALUATION_COLUMNS = {
  query: ['question', 'query'],
  expectedCategory: ['expected_category', 'expected_tag', 'category', 'tag'],
} as const;

interface CsvRow {
  /** Linha do arquivo onde o registro termina (1-based) */
  readonly line: number;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Carrega datasets CSV de treino e avaliação
 *
 * Cada linha é limpa (numeração inicial, aspas, espaços) e validada.
 * Qualquer linha inválida → ConfigurationError com as linhas do arquivo.
 */
@Injectable()
export class DatasetLoaderService {
  private readonly logger = new Logger(DatasetLoaderService.name);

  async loadTrainingExamples(path: string): Promise<TrainingExample[]> {
    const examples = this.parseTrainingCsv(await this.readDataset(path), path);
    this.logger.log(`📚 ${examples.length} exemplos de treino carregados de ${path}`);
    return examples;
  }

  async loadEvaluationExamples(path: string): Promise<EvaluationExample[]> {
    const examples = this.parseEvaluationCsv(await this.readDataset(path), path);
    this.logger.log(`🧪 ${examples.length} exemplos de avaliação carregados de ${path}`);
    return examples;
  }

  parseTrainingCsv(content: string, source = 'csv'): TrainingExample[] {
    const rows = this.parseCsv(content, source);
    const columns = this.resolveColumns(rows, TRAINING_COLUMNS, ['text', 'category'], source);
    const problems: string[] = [];
    const examples: TrainingExample[] = [];

    for (const row of rows) {
      const dto = plainToInstance(TrainingRowDto, {
        text: cleanQuestion(pick(row, columns.get('text'))),
        category: pick(row, columns.get('category')).trim(),
        answer: pick(row, columns.get('answer')).trim(),
      });

      const errors = validateSync(dto);
      if (errors.length > 0) {
        problems.push(...flattenValidationErrors(errors).map((message) => `linha ${row.line}: ${message}`));
        continue;
      }

      examples.push({ text: dto.text, category: dto.category, answer: dto.answer });
    }

    return this.finish(examples, problems, source);
  }

  parseEvaluationCsv(content: string, source = 'csv'): EvaluationExample[] {
    const rows = this.parseCsv(content, source);
    const columns = this.resolveColumns(rows, EVALUATION_COLUMNS, ['query', 'expectedCategory'], source);
    const problems: string[] = [];
    const examples: EvaluationExample[] = [];

    for (const row of rows) {
      const dto = plainToInstance(EvaluationRowDto, {
        query: cleanQuestion(pick(row, columns.get('query'))),
        expectedCategory: pick(row, columns.get('expectedCategory')).trim(),
      });

      const errors = validateSync(dto);
      if (errors.length > 0) {
        problems.push(...flattenValidationErrors(errors).map((message) => `linha ${row.line}: ${message}`));
        continue;
      }

      examples.push({ query: dto.query, expectedCategory: dto.expectedCategory });
    }

    return this.finish(examples, problems, source);
  }

  private async readDataset(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Não foi possível ler o dataset ${path}`, [describeError(error)]);
    }
  }

  private parseCsv(content: string, source: string): CsvRow[] {
    let records: unknown;
    try {
      records = parse(content, {
        columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
        bom: true,
        info: true,
      });
    } catch (error) {
      throw new ConfigurationError(`CSV malformado em ${source}`, [describeError(error)]);
    }

    if (!Array.isArray(records)) {
      throw new ConfigurationError(`CSV malformado em ${source}`);
    }

    return records.map((entry: unknown, position) => {
      const record: Record<string, unknown> = isObject(entry) && isObject(entry.record) ? entry.record : {};
      const info: Record<string, unknown> = isObject(entry) && isObject(entry.info) ? entry.info : {};
      const values: Record<string, string> = {};
      for (const [key, value] of Object.entries(record)) {
        values[key] = typeof value === 'string' ? value : '';
      }
      return {
        line: typeof info.lines === 'number' ? info.lines : position + 2,
        values,
      };
    });
  }

  /**
   * Resolve qual coluna do arquivo atende cada campo
   */
  private resolveColumns(
    rows: readonly CsvRow[],
    aliases: Readonly<Record<string, readonly string[]>>,
    required: readonly string[],
    source: string,
  ): ReadonlyMap<string, string | null> {
    if (rows.length === 0) {
      throw new ConfigurationError(`Dataset ${source} sem linhas de dados`);
    }

    const available = new Set(rows.flatMap((row) => Object.keys(row.values)));
    const resolved = new Map<string, string | null>();
    const missing: string[] = [];

    for (const [field, candidates] of Object.entries(aliases)) {
      const column = candidates.find((alias) => available.has(alias)) ?? null;
      resolved.set(field, column);
      if (column === null && required.includes(field)) {
        missing.push(`coluna obrigatória ausente: ${candidates.join(' | ')}`);
      }
    }

    if (missing.length > 0) {
      throw new ConfigurationError(`Cabeçalho inválido em ${source}`, missing);
    }

    return resolved;
  }

  private finish<T>(examples: T[], problems: string[], source: string): T[] {
    if (problems.length > 0) {
      throw new ConfigurationError(`Dataset ${source} com ${problems.length} problema(s)`, problems);
    }
    return examples;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function pick(row: CsvRow, column: string | null | undefined): string {
  return column ? (row.values[column] ?? '') : '';
}
