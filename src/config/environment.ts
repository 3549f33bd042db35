import {
  plainToInstance,
  Transform,
  TransformFnParams,
} from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import type { LogLevel } from '@nestjs/common';

export enum Environment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

export type ServiceLogLevel = 'error' | 'warn' | 'log' | 'debug' | 'verbose';

const LOG_LEVEL_ORDER: ServiceLogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

// Reads the raw env string; implicit conversion would already have turned
// "false" into true.
function toBoolean({ key, obj }: TransformFnParams): unknown {
  const raw: unknown = obj[key];
  if (typeof raw !== 'string') {
    return raw;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0' || normalized === '') return false;
  return raw;
}

/**
 * Environment variables recognised by the service.
 *
 * Every variable has a default, so a bare `node dist/main.js` talks to a
 * local Postgres.
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.DEVELOPMENT;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  DB_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 5432;

  @IsString()
  @IsNotEmpty()
  DB_USERNAME: string = 'postgres';

  @IsString()
  DB_PASSWORD: string = 'postgres';

  @IsString()
  @IsNotEmpty()
  DB_NAME: string = 'flowmeter';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SSL: boolean = false;

  @IsInt()
  @Min(1)
  @Max(200)
  DB_POOL_MAX: number = 10;

  /** Create the readings table on startup when missing */
  @Transform(toBoolean)
  @IsBoolean()
  DB_RUN_MIGRATIONS: boolean = false;

  @IsString()
  @IsNotEmpty()
  CORS_ORIGIN: string = '*';

  @IsIn(['error', 'warn', 'log', 'debug', 'verbose'])
  LOG_LEVEL: ServiceLogLevel = 'log';
}

/**
 * ConfigModule `validate` hook: coerces and checks process.env.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}

/**
 * Nest log levels enabled at and above the configured threshold
 */
export function resolveLogLevels(level: ServiceLogLevel): LogLevel[] {
  const index = LOG_LEVEL_ORDER.indexOf(level);
  return LOG_LEVEL_ORDER.slice(0, index + 1);
}
