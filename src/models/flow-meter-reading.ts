import { FlowFieldKey, FlowMeasurements } from './flow-fields';

/**
 * A validated upload, before the store assigns id and createdAt
 */
export interface NormalizedReading {
  deviceId: string;
  measurements: FlowMeasurements;
}

/**
 * Identity assigned by the store on insert
 */
export interface StoredReadingRef {
  id: string;
  createdAt: Date;
}

/**
 * Raw row from flow_meter_readings.
 *
 * pg hands numeric(18,4) columns back as text, timestamptz as Date.
 */
export type FlowMeterReadingRow = {
  id: string;
  deviceId: string;
  createdAt: Date | string;
} & Record<FlowFieldKey, string | number | null>;

/**
 * JSON-safe reading as returned by the API
 */
export type FlowMeterReadingRecord = {
  id: string;
  deviceId: string;
  createdAt: string;
} & FlowMeasurements;

export interface DeviceSummaryRow {
  deviceId: string;
  readingCount: number;
  firstReadingAt: Date | string;
  lastReadingAt: Date | string;
}

export interface DeviceReadingSummary {
  deviceId: string;
  readingCount: number;
  firstReadingAt: string;
  lastReadingAt: string;
}
