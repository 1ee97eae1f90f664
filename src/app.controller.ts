import { Controller, Get } from '@nestjs/common';
import { ClassificationEngineService } from './features/classifier/classification-engine.service';

@Controller()
export class AppController {
  constructor(private readonly engine: ClassificationEngineService) {}

  @Get('health')
  healthCheck() {
    const classifier = this.engine.getStatus();

    return {
      // Sem treino o serviço responde, mas só com padrões e default
      status: classifier.trained ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'namjari-intent-classifier',
      classifier,
    };
  }
}
