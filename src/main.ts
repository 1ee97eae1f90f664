import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  // Validation pipe global
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableShutdownHooks();

  await app.listen(port);

  logger.log(`🚀 Namjari intent classifier running on port ${port}`);
  logger.log(`📊 Environment: ${nodeEnv}`);
  logger.log(`🔗 API: http://localhost:${port}/classifier`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('❌ Falha ao iniciar a aplicação', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
