import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { aiConfig } from './core/config/ai.config';
import { classifierConfig } from './core/config/classifier.config';
import { ClassifierModule } from './features/classifier/classifier.module';

@Module({
  imports: [
    // Configuração global
    ConfigModule.forRoot({
      isGlobal: true,
      load: [classifierConfig, aiConfig],
      envFilePath: '.env',
    }),

    ClassifierModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
