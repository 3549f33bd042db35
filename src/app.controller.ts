import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiExcludeController } from '@nestjs/swagger';
import { EnvironmentVariables } from './config/environment';

export const SERVICE_VERSION = '1.0.0';

export const SERVICE_ENDPOINTS = {
  upload_data: 'POST /api/flowmeter/upload',
  get_data: 'GET /api/flowmeter/data',
  get_latest: 'GET /api/flowmeter/latest',
  get_stats: 'GET /api/flowmeter/stats',
  health_check: 'GET /health',
  liveness: 'GET /health/live',
  api_docs: 'GET /api/docs',
} as const;

/**
 * Service metadata at the root path
 */
@ApiExcludeController()
@Controller()
export class AppController {
  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  @Get()
  getInfo() {
    return {
      success: true,
      message: 'SCADA Flow Meter API',
      status: 'running',
      version: SERVICE_VERSION,
      environment: this.configService.get('NODE_ENV', { infer: true }),
      endpoints: SERVICE_ENDPOINTS,
    };
  }
}
