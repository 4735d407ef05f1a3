import { Controller, Get, Inject } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from './config/app-config';

@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get()
  status() {
    return {
      service: this.config.service.name,
      version: this.config.service.version,
      status: 'running' as const,
    };
  }

  @Get('health')
  health() {
    return {
      status: 'healthy' as const,
      timestamp: new Date().toISOString(),
      generation: this.config.generation.mode,
    };
  }
}
