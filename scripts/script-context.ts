import 'reflect-metadata';
import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';

/**
 * Contexto Nest para os scripts de linha de comando
 *
 * Os scripts treinam explicitamente com os arquivos que recebem, então o
 * treino na inicialização (CLASSIFIER_TRAIN_ON_BOOT) fica desligado aqui.
 */
export async function createScriptContext(
  logger: LogLevel[] | false = ['log', 'error', 'warn'],
): Promise<INestApplicationContext> {
  process.env.CLASSIFIER_TRAIN_ON_BOOT = 'false';
  return NestFactory.createApplicationContext(AppModule, { logger });
}
