import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '@common/errors/classifier.errors';
import { ClassificationEngineService } from './classification-engine.service';
import { DatasetLoaderService } from './dataset/dataset-loader.service';

/**
 * Treina o classificador na subida da aplicação (CLASSIFIER_TRAIN_ON_BOOT=true)
 *
 * Se o treino falhar a aplicação continua no ar, só com padrões e default.
 */
@Injectable()
export class ClassifierBootstrapService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ClassifierBootstrapService.name);

  constructor(
    private readonly engine: ClassificationEngineService,
    private readonly datasetLoader: DatasetLoaderService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.configService.get<boolean>('classifier.trainOnBoot', false)) {
      this.logger.log('⏭️  Treino na inicialização desabilitado (CLASSIFIER_TRAIN_ON_BOOT)');
      return;
    }

    const path = this.configService.get<string>('classifier.trainingDataPath', 'data/training.csv');

    try {
      const examples = await this.datasetLoader.loadTrainingExamples(path);
      await this.engine.train(examples);
    } catch (error) {
      this.logger.error(
        `❌ Treino inicial falhou - classificador segue apenas com padrões: ${describeError(error)}`,
      );
    }
  }
}
