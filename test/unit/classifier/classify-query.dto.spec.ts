import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ClassifyQueryDto } from '../../../src/features/classifier/dto/classify-query.dto';

describe('ClassifyQueryDto', () => {
  const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true });
  const validate = (body: unknown) => pipe.transform(body, { type: 'body', metatype: ClassifyQueryDto });

  it('deve aceitar consulta longa', async () => {
    const query = 'নামজারি '.repeat(1000);

    const dto = await validate({ query });

    expect(dto).toBeInstanceOf(ClassifyQueryDto);
    expect(dto.query).toBe(query);
  });

  it('deve aceitar consulta vazia', async () => {
    const dto = await validate({ query: '' });

    expect(dto.query).toBe('');
  });

  it('deve rejeitar consulta que não é string', async () => {
    await expect(validate({ query: 42 })).rejects.toBeInstanceOf(BadRequestException);
  });

  it('deve rejeitar campos desconhecidos', async () => {
    await expect(validate({ query: 'x', extra: true })).rejects.toBeInstanceOf(BadRequestException);
  });
});
