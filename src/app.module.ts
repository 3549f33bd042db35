import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { Environment, EnvironmentVariables, validateEnvironment } from './config/environment';
import { CreateFlowMeterReadings1760860800000 } from './database/migrations/1760860800000-CreateFlowMeterReadings';
import { FlowmeterModule } from './modules/flowmeter/flowmeter.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    // Configuration module - loads and validates .env
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      validate: validateEnvironment,
    }),

    // TypeORM database connection
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => ({
        type: 'postgres',
        host: configService.get('DB_HOST', { infer: true }),
        port: configService.get('DB_PORT', { infer: true }),
        username: configService.get('DB_USERNAME', { infer: true }),
        password: configService.get('DB_PASSWORD', { infer: true }),
        database: configService.get('DB_NAME', { infer: true }),
        entities: [],
        synchronize: false,
        // IF NOT EXISTS DDL; off unless this instance owns schema setup
        migrations: [CreateFlowMeterReadings1760860800000],
        migrationsRun: configService.get('DB_RUN_MIGRATIONS', { infer: true }),
        logging:
          configService.get('NODE_ENV', { infer: true }) === Environment.DEVELOPMENT,
        ssl: configService.get('DB_SSL', { infer: true })
          ? { rejectUnauthorized: false }
          : false,
        extra: {
          max: configService.get('DB_POOL_MAX', { infer: true }),
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 30000,
        },
      }),
      inject: [ConfigService],
    }),

    // Feature modules
    FlowmeterModule,
    HealthModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
