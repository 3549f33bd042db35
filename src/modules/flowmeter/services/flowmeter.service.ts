import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { StorageException } from '../../../common/exceptions';
import { ReadingCriteria } from '../../../database/sql/flow-meter-readings.sql';
import {
  DeviceReadingSummary,
  FlowMeterReadingRecord,
} from '../../../models';
import { FlowMeterReadingRepository } from '../repositories/flow-meter-reading.repository';
import { ReadingFilters } from './reading-filters';
import {
  countPresentMeasurements,
  normalizeReading,
} from './reading-normalizer';
import { toDeviceSummary, toReadingRecord } from './reading-record.mapper';

const UPLOAD_FAILED = 'Internal server error';
const RETRIEVAL_FAILED = 'Error retrieving data';

export interface UploadResult {
  success: true;
  message: string;
  id: string;
  device_id: string;
  timestamp: string;
}

export interface ReadingPage {
  success: true;
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  data: FlowMeterReadingRecord[];
}

export interface LatestReading {
  success: true;
  data: FlowMeterReadingRecord;
}

export interface ReadingStats {
  success: true;
  totalReadings: number;
  deviceCount: number;
  devices: DeviceReadingSummary[];
}

@Injectable()
export class FlowmeterService {
  private readonly logger = new Logger(FlowmeterService.name);

  constructor(private readonly readingRepo: FlowMeterReadingRepository) {}

  /**
   * Validate and store one SCADA upload.
   *
   * Validation failures surface as 400s before the database is touched;
   * unparseable measurement fields are stored as NULL, not rejected.
   */
  async ingest(payload: unknown): Promise<UploadResult> {
    const reading = normalizeReading(payload);

    const stored = await this.withStore(
      `Failed to store reading for device ${reading.deviceId}`,
      UPLOAD_FAILED,
      () => this.readingRepo.insert(reading),
    );

    this.logger.log(
      `Stored reading ${stored.id} for device ${reading.deviceId} (${countPresentMeasurements(reading)} fields)`,
    );

    return {
      success: true,
      message: 'Data received and stored successfully',
      id: stored.id,
      device_id: reading.deviceId,
      timestamp: stored.createdAt.toISOString(),
    };
  }

  /**
   * Paged history, newest first, plus the unpaged match count
   */
  async query(filters: ReadingFilters): Promise<ReadingPage> {
    const { page, pageSize, ...criteria } = filters;

    const { totalCount, rows } = await this.withStore(
      'Error retrieving readings',
      RETRIEVAL_FAILED,
      async () => ({
        totalCount: await this.readingRepo.count(criteria),
        rows: await this.readingRepo.findPage(criteria, { page, pageSize }),
      }),
    );

    this.logger.debug(
      `Returning ${rows.length} of ${totalCount} readings (page ${page}, size ${pageSize})`,
    );

    return {
      success: true,
      totalCount,
      page,
      pageSize,
      totalPages: Math.ceil(totalCount / pageSize),
      data: rows.map(toReadingRecord),
    };
  }

  async latest(deviceId?: string): Promise<LatestReading> {
    const row = await this.withStore(
      'Error retrieving latest reading',
      RETRIEVAL_FAILED,
      () => this.readingRepo.findLatest(deviceId),
    );

    if (!row) {
      throw new NotFoundException(
        deviceId ? `No readings found for device ${deviceId}` : 'No readings found',
      );
    }

    return { success: true, data: toReadingRecord(row) };
  }

  /**
   * Per-device reading counts and first/last timestamps
   */
  async stats(criteria: ReadingCriteria): Promise<ReadingStats> {
    const rows = await this.withStore(
      'Error computing reading statistics',
      RETRIEVAL_FAILED,
      () => this.readingRepo.summarizeByDevice(criteria),
    );
    const devices = rows.map(toDeviceSummary);

    return {
      success: true,
      totalReadings: devices.reduce((sum, device) => sum + device.readingCount, 0),
      deviceCount: devices.length,
      devices,
    };
  }

  /**
   * Run a repository call; log any failure in full and rethrow it as an
   * opaque StorageException.
   */
  private async withStore<T>(
    context: string,
    failureMessage: string,
    work: () => Promise<T>,
  ): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.logger.error(
        context,
        error instanceof Error ? error.stack ?? error.message : String(error),
      );
      throw new StorageException(failureMessage);
    }
  }
}
