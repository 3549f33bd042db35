import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { SERVICE_VERSION } from './app.controller';
import { configureApp } from './bootstrap/configure-app';
import { EnvironmentVariables, resolveLogLevels } from './config/environment';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const configService = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  app.useLogger(resolveLogLevels(configService.get('LOG_LEVEL', { infer: true })));
  configureApp(app, {
    corsOrigin: configService.get('CORS_ORIGIN', { infer: true }),
  });

  // Swagger API Documentation
  const config = new DocumentBuilder()
    .setTitle('Flow Meter Ingestion API')
    .setDescription(
      'Ingests SCADA flow meter readings (9 channels x 6 measurements) and serves filtered, paged history',
    )
    .setVersion(SERVICE_VERSION)
    .addTag('flowmeter', 'Reading ingestion and retrieval')
    .addTag('health', 'Liveness and database health')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = configService.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`Flow meter API listening on http://localhost:${port}`);
  logger.log(`API documentation: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
