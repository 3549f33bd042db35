import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import {
  DeviceSummaryRow,
  FlowMeterReadingRow,
  NormalizedReading,
  StoredReadingRef,
} from '../../../models';
import {
  buildCountStatement,
  buildDeviceSummaryStatement,
  buildInsertStatement,
  buildLatestStatement,
  buildPageStatement,
  PageWindow,
  ReadingCriteria,
  SqlStatement,
} from '../../../database/sql/flow-meter-readings.sql';

/**
 * Data access for flow_meter_readings.
 *
 * Raw parameterized SQL over the TypeORM connection: the table is one
 * wide row with a column per channel measurement, and inserts list only
 * the columns that carry a value.
 */
@Injectable()
export class FlowMeterReadingRepository {
  constructor(private readonly dataSource: DataSource) {}

  private run<T>(statement: SqlStatement): Promise<T> {
    return this.dataSource.query<T>(statement.text, statement.values);
  }

  /**
   * Append one reading. The store assigns id and createdAt.
   *
   * Not idempotent: a client retry after a timeout stores a second row.
   */
  async insert(reading: NormalizedReading): Promise<StoredReadingRef> {
    const rows = await this.run<StoredReadingRef[]>(
      buildInsertStatement(reading),
    );
    const [stored] = rows;
    if (!stored) {
      throw new Error('INSERT returned no row');
    }
    return { id: String(stored.id), createdAt: new Date(stored.createdAt) };
  }

  async count(criteria: ReadingCriteria): Promise<number> {
    const rows = await this.run<Array<{ totalCount: number | string }>>(
      buildCountStatement(criteria),
    );
    return Number(rows[0]?.totalCount ?? 0);
  }

  async findPage(
    criteria: ReadingCriteria,
    window: PageWindow,
  ): Promise<FlowMeterReadingRow[]> {
    return this.run<FlowMeterReadingRow[]>(buildPageStatement(criteria, window));
  }

  async findLatest(deviceId?: string): Promise<FlowMeterReadingRow | null> {
    const rows = await this.run<FlowMeterReadingRow[]>(
      buildLatestStatement(deviceId),
    );
    return rows[0] ?? null;
  }

  async summarizeByDevice(
    criteria: ReadingCriteria,
  ): Promise<DeviceSummaryRow[]> {
    return this.run<DeviceSummaryRow[]>(buildDeviceSummaryStatement(criteria));
  }
}
