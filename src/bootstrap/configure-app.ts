import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ApiExceptionFilter } from '../common/filters/api-exception.filter';

/**
 * Media types the upload endpoint parses as JSON
 */
export const JSON_MEDIA_TYPES = ['application/json', 'application/*+json'];

export interface HttpSurfaceOptions {
  corsOrigin: string;
}

/**
 * `*` allows any origin; otherwise a comma-separated allow list
 */
export function parseCorsOrigin(corsOrigin: string): true | string[] {
  if (corsOrigin.trim() === '*') {
    return true;
  }
  return corsOrigin
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Body parsing, global pipes, error envelope and CORS, shared by main.ts
 * and the e2e tests so both see the same HTTP surface.
 */
export function configureApp(
  app: NestExpressApplication,
  options: HttpSurfaceOptions,
): NestExpressApplication {
  // Replaces Nest's default JSON parser, which only reads application/json
  app.useBodyParser('json', { type: JSON_MEDIA_TYPES });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      // Unknown query parameters are dropped, not rejected
      forbidNonWhitelisted: false,
      transform: true,
    }),
  );
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableCors({
    origin: parseCorsOrigin(options.corsOrigin),
    methods: ['GET', 'POST'],
  });
  return app;
}
