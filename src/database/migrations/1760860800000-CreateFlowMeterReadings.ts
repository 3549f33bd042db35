import { MigrationInterface, QueryRunner } from 'typeorm';
import { FLOW_FIELD_KEYS, MEASUREMENT_COLUMN_TYPE } from '../../models';
import { FLOW_METER_READINGS_TABLE } from '../sql/flow-meter-readings.sql';

/**
 * Creates the wide readings table: one row per upload, one nullable
 * numeric column per channel measurement.
 *
 * Every statement is IF NOT EXISTS; an existing table is left as it is.
 * gen_random_uuid() is built in from PostgreSQL 13.
 */
export class CreateFlowMeterReadings1760860800000 implements MigrationInterface {
  name = 'CreateFlowMeterReadings1760860800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    const measurementColumns = FLOW_FIELD_KEYS.map(
      (key) => `"${key}" ${MEASUREMENT_COLUMN_TYPE}`,
    ).join(',\n        ');

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "${FLOW_METER_READINGS_TABLE}" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "deviceId" varchar(64) NOT NULL,
        ${measurementColumns},
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_flow_meter_readings" PRIMARY KEY ("id")
      )
    `);

    // Device history, newest first
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_flow_readings_device_created"
      ON "${FLOW_METER_READINGS_TABLE}" ("deviceId", "createdAt" DESC)
    `);

    // Fleet-wide time range scans
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_flow_readings_created"
      ON "${FLOW_METER_READINGS_TABLE}" ("createdAt" DESC)
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP INDEX IF EXISTS "idx_flow_readings_created"`,
    );
    await queryRunner.query(
      `DROP INDEX IF EXISTS "idx_flow_readings_device_created"`,
    );
    await queryRunner.query(
      `DROP TABLE IF EXISTS "${FLOW_METER_READINGS_TABLE}"`,
    );
  }
}
