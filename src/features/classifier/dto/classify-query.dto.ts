import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';

/**
 * DTO para classificar uma pergunta
 *
 * Sem limite de tamanho: string vazia ou muito longa também recebe um rótulo.
 */
export class ClassifyQueryDto {
  @ApiProperty({ example: 'নামজারি করতে কত টাকা লাগে?' })
  @IsString()
  query!: string;
}
