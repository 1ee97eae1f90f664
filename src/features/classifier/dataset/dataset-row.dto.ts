import { IsIn, IsNotEmpty, IsString } from 'class-validator';
import {
  INTENT_CATEGORIES,
  IntentCategory,
} from '@common/constants/intent-categories.constants';

/**
 * Linha do CSV de treino (após resolução dos aliases de coluna)
 */
export class TrainingRowDto {
  @IsString()
  @IsNotEmpty({ message: 'pergunta vazia' })
  text!: string;

  @IsIn(INTENT_CATEGORIES, { message: 'categoria desconhecida "$value"' })
  category!: IntentCategory;

  @IsString()
  answer!: string;
}

/**
 * Linha do CSV de avaliação
 */
export class EvaluationRowDto {
  @IsString()
  @IsNotEmpty({ message: 'pergunta vazia' })
  query!: string;

  @IsIn(INTENT_CATEGORIES, { message: 'categoria esperada desconhecida "$value"' })
  expectedCategory!: IntentCategory;
}
