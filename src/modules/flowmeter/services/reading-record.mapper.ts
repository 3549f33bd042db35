import {
  DeviceReadingSummary,
  DeviceSummaryRow,
  FlowMeterReadingRecord,
  FlowMeterReadingRow,
  mapFlowFields,
} from '../../../models';

export function toIsoTimestamp(value: Date | string): string {
  return (value instanceof Date ? value : new Date(value)).toISOString();
}

/**
 * numeric columns arrive as decimal text ("12.5000"); null stays null
 */
export function toMeasurementValue(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toReadingRecord(row: FlowMeterReadingRow): FlowMeterReadingRecord {
  return {
    id: String(row.id),
    deviceId: row.deviceId,
    createdAt: toIsoTimestamp(row.createdAt),
    ...mapFlowFields((key) => toMeasurementValue(row[key])),
  };
}

export function toDeviceSummary(row: DeviceSummaryRow): DeviceReadingSummary {
  return {
    deviceId: row.deviceId,
    readingCount: Number(row.readingCount),
    firstReadingAt: toIsoTimestamp(row.firstReadingAt),
    lastReadingAt: toIsoTimestamp(row.lastReadingAt),
  };
}
