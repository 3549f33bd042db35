import { isISO8601 } from 'class-validator';
import {
  DateFilterField,
  InvalidDateFormatException,
} from '../../../common/exceptions';
import {
  PageWindow,
  ReadingCriteria,
} from '../../../database/sql/flow-meter-readings.sql';
import { FlowReadingQueryDto } from '../../../dto';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

export interface ReadingFilters extends ReadingCriteria, PageWindow {}

const INTEGER_TEXT = /^[+-]?\d+$/;
const ZONE_DESIGNATOR = /([zZ]|[+-]\d{2}(:?\d{2})?)$/;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !INTEGER_TEXT.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value.trim(), 10);
}

/**
 * Parse an ISO-8601 date filter.
 *
 * Date-times without an offset are taken as UTC, matching the stored
 * createdAt. Anything else that is not ISO-8601 is rejected.
 */
export function parseDateFilter(
  value: string | undefined,
  field: DateFilterField,
): Date | undefined {
  if (value === undefined || value.length === 0) {
    return undefined;
  }

  let text = value.trim().replace(' ', 'T');
  if (!isISO8601(text, { strict: true })) {
    throw new InvalidDateFormatException(field);
  }
  if (text.includes('T') && !ZONE_DESIGNATOR.test(text)) {
    text = `${text}Z`;
  }

  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateFormatException(field);
  }
  return date;
}

/**
 * Highest page whose offset, `(page - 1) * pageSize`, is still a safe
 * integer that binds as a bigint.
 */
export function maxPageFor(pageSize: number): number {
  return Math.floor(Number.MAX_SAFE_INTEGER / pageSize);
}

export function resolvePage(
  value: string | undefined,
  pageSize: number = DEFAULT_PAGE_SIZE,
): number {
  const page = parseInteger(value) ?? DEFAULT_PAGE;
  if (page < 1) {
    return DEFAULT_PAGE;
  }
  return Math.min(page, maxPageFor(pageSize));
}

export function resolvePageSize(value: string | undefined): number {
  const pageSize = parseInteger(value) ?? DEFAULT_PAGE_SIZE;
  if (pageSize < 1) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(pageSize, MAX_PAGE_SIZE);
}

/**
 * Device and date criteria only; used where no paging applies.
 * Throws InvalidDateFormatException before any query is built.
 */
export function resolveReadingCriteria(
  query: FlowReadingQueryDto,
): ReadingCriteria {
  const criteria: ReadingCriteria = {};

  if (query.device_id !== undefined && query.device_id.length > 0) {
    criteria.deviceId = query.device_id;
  }

  const startDate = parseDateFilter(query.start_date, 'start_date');
  if (startDate) {
    criteria.startDate = startDate;
  }

  const endDate = parseDateFilter(query.end_date, 'end_date');
  if (endDate) {
    criteria.endDate = endDate;
  }

  return criteria;
}

export function resolveReadingFilters(
  query: FlowReadingQueryDto,
): ReadingFilters {
  const pageSize = resolvePageSize(query.page_size);
  return {
    ...resolveReadingCriteria(query),
    page: resolvePage(query.page, pageSize),
    pageSize,
  };
}
