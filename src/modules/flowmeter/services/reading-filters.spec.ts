import { InvalidDateFormatException } from '../../../common/exceptions';
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  maxPageFor,
  parseDateFilter,
  resolvePage,
  resolvePageSize,
  resolveReadingCriteria,
  resolveReadingFilters,
} from './reading-filters';

describe('reading filters', () => {
  describe('resolvePage', () => {
    it.each([
      [undefined, 1],
      ['3', 3],
      [' 2 ', 2],
      ['0', 1],
      ['-4', 1],
      ['abc', 1],
      ['2.5', 1],
    ])('should resolve page %p to %p', (raw, expected) => {
      expect(resolvePage(raw)).toBe(expected);
    });

    it('should cap the page so the row offset stays a safe integer', () => {
      const page = resolvePage('99999999999999999999', 1000);

      expect(page).toBe(maxPageFor(1000));
      expect(page).toBe(9007199254740);
      expect(Number.isSafeInteger((page - 1) * 1000)).toBe(true);
    });
  });

  describe('resolvePageSize', () => {
    it.each([
      [undefined, DEFAULT_PAGE_SIZE],
      ['50', 50],
      ['1', 1],
      ['1000', 1000],
      ['0', DEFAULT_PAGE_SIZE],
      ['-10', DEFAULT_PAGE_SIZE],
      ['1001', MAX_PAGE_SIZE],
      ['250000', MAX_PAGE_SIZE],
      ['lots', DEFAULT_PAGE_SIZE],
    ])('should resolve page size %p to %p', (raw, expected) => {
      expect(resolvePageSize(raw)).toBe(expected);
    });
  });

  describe('parseDateFilter', () => {
    it('should return undefined when the filter is not supplied', () => {
      expect(parseDateFilter(undefined, 'start_date')).toBeUndefined();
      expect(parseDateFilter('', 'start_date')).toBeUndefined();
    });

    it('should parse a UTC timestamp', () => {
      expect(
        parseDateFilter('2026-10-01T06:30:00Z', 'start_date')?.toISOString(),
      ).toBe('2026-10-01T06:30:00.000Z');
    });

    it('should honour an explicit offset', () => {
      expect(
        parseDateFilter('2026-10-01T08:30:00+02:00', 'end_date')?.toISOString(),
      ).toBe('2026-10-01T06:30:00.000Z');
    });

    it('should read a timestamp without offset as UTC', () => {
      expect(
        parseDateFilter('2026-10-01T06:30:00', 'start_date')?.toISOString(),
      ).toBe('2026-10-01T06:30:00.000Z');
      expect(
        parseDateFilter('2026-10-01 06:30:00', 'start_date')?.toISOString(),
      ).toBe('2026-10-01T06:30:00.000Z');
    });

    it('should accept a bare date as UTC midnight', () => {
      expect(parseDateFilter('2026-10-01', 'start_date')?.toISOString()).toBe(
        '2026-10-01T00:00:00.000Z',
      );
    });

    it.each(['not-a-date', '2026-13-01', '2026-02-30', '01/10/2026', '   '])(
      'should reject %p',
      (raw) => {
        expect(() => parseDateFilter(raw, 'start_date')).toThrow(
          InvalidDateFormatException,
        );
      },
    );

    it('should name the offending field in the message', () => {
      expect(() => parseDateFilter('yesterday', 'end_date')).toThrow(
        'Invalid end_date format. Use ISO format.',
      );
    });
  });

  describe('resolveReadingCriteria', () => {
    it('should omit every filter that was not supplied', () => {
      expect(resolveReadingCriteria({})).toEqual({});
    });

    it('should treat an empty device id as absent', () => {
      expect(resolveReadingCriteria({ device_id: '' })).toEqual({});
    });

    it('should combine device and date range', () => {
      expect(
        resolveReadingCriteria({
          device_id: 'FM-7',
          start_date: '2026-10-01T00:00:00Z',
          end_date: '2026-10-02T00:00:00Z',
        }),
      ).toEqual({
        deviceId: 'FM-7',
        startDate: new Date('2026-10-01T00:00:00Z'),
        endDate: new Date('2026-10-02T00:00:00Z'),
      });
    });
  });

  describe('resolveReadingFilters', () => {
    it('should apply paging defaults', () => {
      expect(resolveReadingFilters({})).toEqual({ page: 1, pageSize: 100 });
    });

    it('should carry criteria and paging together', () => {
      expect(
        resolveReadingFilters({ device_id: 'FM-7', page: '2', page_size: '5000' }),
      ).toEqual({ deviceId: 'FM-7', page: 2, pageSize: 1000 });
    });

    it('should cap an oversized page against the resolved page size', () => {
      expect(
        resolveReadingFilters({ page: '99999999999999999999' }),
      ).toEqual({ page: 90071992547409, pageSize: 100 });
    });
  });
});
