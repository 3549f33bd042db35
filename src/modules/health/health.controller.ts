import { Controller, Get, HttpStatus, Logger, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import type { Response } from 'express';
import { DataSource } from 'typeorm';
import { EnvironmentVariables } from '../../config/environment';

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  database: 'connected' | 'disconnected';
  environment: string;
  timestamp: string;
  error?: string;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Runs one trivial query against the database.',
  })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        database: { type: 'string', example: 'connected' },
        environment: { type: 'string', example: 'production' },
        timestamp: { type: 'string', example: '2026-10-19T08:15:00.000Z' },
      },
    },
  })
  @ApiResponse({
    status: 500,
    description: 'Database unreachable',
  })
  async check(
    @Res({ passthrough: true }) res: Pick<Response, 'status'>,
  ): Promise<HealthReport> {
    const report = await this.probe();
    res.status(
      report.status === 'healthy'
        ? HttpStatus.OK
        : HttpStatus.INTERNAL_SERVER_ERROR,
    );
    return report;
  }

  /**
   * Never rejects: a failed round trip becomes an "unhealthy" report
   */
  async probe(): Promise<HealthReport> {
    const environment = this.configService.get('NODE_ENV', { infer: true });

    try {
      if (!this.dataSource.isInitialized) {
        throw new Error('Database connection is not initialized');
      }
      await this.dataSource.query('SELECT 1');

      return {
        status: 'healthy',
        database: 'connected',
        environment,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.error(
        'Health check failed',
        error instanceof Error ? error.message : String(error),
      );
      return {
        status: 'unhealthy',
        database: 'disconnected',
        error: 'Database connection failed',
        environment,
        timestamp: new Date().toISOString(),
      };
    }
  }

  @Get('live')
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Returns whether the service process is alive.',
  })
  live() {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
      pid: process.pid,
      uptime: process.uptime(),
    };
  }
}
