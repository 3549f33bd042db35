import { FlowMeterReadingRow, mapFlowFields } from '../../../models';
import {
  toDeviceSummary,
  toIsoTimestamp,
  toMeasurementValue,
  toReadingRecord,
} from './reading-record.mapper';

describe('reading record mapper', () => {
  it('should render Date and text timestamps as ISO strings', () => {
    expect(toIsoTimestamp(new Date('2026-10-19T08:15:00.000Z'))).toBe(
      '2026-10-19T08:15:00.000Z',
    );
    expect(toIsoTimestamp('2026-10-19T10:15:00+02:00')).toBe(
      '2026-10-19T08:15:00.000Z',
    );
  });

  it.each([
    ['12.5000', 12.5],
    ['-0.2500', -0.25],
    [7, 7],
    [null, null],
    ['garbage', null],
  ])('should convert column value %p to %p', (raw, expected) => {
    expect(toMeasurementValue(raw)).toBe(expected);
  });

  it('should map a stored row to the API record', () => {
    const row: FlowMeterReadingRow = {
      id: '6f1c2a34-0000-4000-8000-000000000001',
      deviceId: 'FM-7',
      createdAt: new Date('2026-10-19T08:15:00.000Z'),
      ...mapFlowFields((key): string | null =>
        key === 'FT1MassFlow' ? '12.5000' : null,
      ),
    };

    const record = toReadingRecord(row);

    expect(record.id).toBe('6f1c2a34-0000-4000-8000-000000000001');
    expect(record.deviceId).toBe('FM-7');
    expect(record.createdAt).toBe('2026-10-19T08:15:00.000Z');
    expect(record.FT1MassFlow).toBe(12.5);
    expect(record.FT1Masstotal).toBeNull();
    expect(record.FT9Density).toBeNull();
  });

  it('should map a device summary row', () => {
    expect(
      toDeviceSummary({
        deviceId: 'FM-7',
        readingCount: 3,
        firstReadingAt: new Date('2026-10-18T00:00:00.000Z'),
        lastReadingAt: new Date('2026-10-19T00:00:00.000Z'),
      }),
    ).toEqual({
      deviceId: 'FM-7',
      readingCount: 3,
      firstReadingAt: '2026-10-18T00:00:00.000Z',
      lastReadingAt: '2026-10-19T00:00:00.000Z',
    });
  });
});
