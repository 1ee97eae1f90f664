import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigurationError } from '@common/errors/classifier.errors';
import { ClassificationEngineService } from './classification-engine.service';
import {
  ClassificationResult,
  ClassifierStatus,
  EvaluationReport,
  TrainingSummary,
} from './classifier.types';
import { DatasetLoaderService } from './dataset/dataset-loader.service';
import { ClassifyQueryDto } from './dto/classify-query.dto';

@ApiTags('Classifier')
@Controller('classifier')
export class ClassifierController {
  private readonly logger = new Logger(ClassifierController.name);

  constructor(
    private readonly engine: ClassificationEngineService,
    private readonly datasetLoader: DatasetLoaderService,
    private readonly configService: ConfigService,
  ) {}

  @Post('classify')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Classificar pergunta sobre namjari' })
  @ApiResponse({ status: 200, description: 'Categoria, confiança e método de decisão' })
  async classify(@Body() dto: ClassifyQueryDto): Promise<ClassificationResult> {
    return this.engine.classify(dto.query);
  }

  @Get('status')
  @ApiOperation({ summary: 'Estado do classificador' })
  getStatus(): ClassifierStatus {
    return this.engine.getStatus();
  }

  @Post('train')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Retreinar',
    description: 'Recarrega o CSV de treino configurado e reconstrói os índices',
  })
  @ApiResponse({ status: 400, description: 'Dataset inválido' })
  async train(): Promise<TrainingSummary> {
    const path = this.configService.get<string>('classifier.trainingDataPath', 'data/training.csv');
    this.logger.log(`🔄 Retreino solicitado (${path})`);

    return this.translateErrors(async () => {
      const examples = await this.datasetLoader.loadTrainingExamples(path);
      return this.engine.train(examples);
    });
  }

  @Post('evaluate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Avaliar com o CSV de avaliação configurado' })
  @ApiResponse({ status: 400, description: 'Dataset inválido' })
  async evaluate(): Promise<EvaluationReport> {
    const path = this.configService.get<string>('classifier.evaluationDataPath', 'data/evaluation.csv');

    return this.translateErrors(async () => {
      const items = await this.datasetLoader.loadEvaluationExamples(path);
      return this.engine.evaluate(items);
    });
  }

  /**
   * ConfigurationError → 400 Bad Request
   */
  private async translateErrors<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new BadRequestException({ message: error.message, details: error.details });
      }
      throw error;
    }
  }
}
