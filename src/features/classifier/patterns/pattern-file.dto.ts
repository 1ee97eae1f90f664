import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

/**
 * Formato do arquivo de regras (data/namjari-patterns.json)
 *
 * Só a forma é validada aqui; regex, categoria, ids e prioridades
 * são validados pelo PatternRuleSet.
 */
export class PatternRuleEntryDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  pattern!: string;

  @IsString()
  category!: string;

  @IsString()
  @IsOptional()
  description?: string;
}

export class PatternTierDto {
  @IsNumber()
  priority!: number;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PatternRuleEntryDto)
  rules!: PatternRuleEntryDto[];
}

export class PatternFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PatternTierDto)
  tiers!: PatternTierDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PatternRuleEntryDto)
  @IsOptional()
  antiPatterns?: PatternRuleEntryDto[];
}
