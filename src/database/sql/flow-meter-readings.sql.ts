import { FLOW_FIELD_KEYS, NormalizedReading } from '../../models';

export const FLOW_METER_READINGS_TABLE = 'flow_meter_readings';

/**
 * A statement plus its positional ($1..$n) parameters.
 * Caller-supplied values only ever travel in `values`.
 */
export interface SqlStatement {
  text: string;
  values: unknown[];
}

export interface ReadingCriteria {
  deviceId?: string;
  startDate?: Date;
  endDate?: Date;
}

export interface PageWindow {
  page: number;
  pageSize: number;
}

const TABLE = `"${FLOW_METER_READINGS_TABLE}"`;
const NEWEST_FIRST = 'ORDER BY "createdAt" DESC, "id" DESC';

function joinClauses(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join(' ');
}

/**
 * One predicate per supplied criterion, AND-ed together.
 * Returns an empty clause when nothing is filtered.
 */
export function buildWhereClause(criteria: ReadingCriteria): {
  clause: string;
  values: unknown[];
} {
  const conditions: string[] = [];
  const values: unknown[] = [];

  if (criteria.deviceId !== undefined) {
    values.push(criteria.deviceId);
    conditions.push(`"deviceId" = $${values.length}`);
  }
  if (criteria.startDate !== undefined) {
    values.push(criteria.startDate);
    conditions.push(`"createdAt" >= $${values.length}`);
  }
  if (criteria.endDate !== undefined) {
    values.push(criteria.endDate);
    conditions.push(`"createdAt" <= $${values.length}`);
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

/**
 * INSERT listing deviceId plus only the measurements that are present.
 * Absent fields fall back to the column default (NULL).
 */
export function buildInsertStatement(reading: NormalizedReading): SqlStatement {
  const columns = ['"deviceId"'];
  const values: unknown[] = [reading.deviceId];

  for (const key of FLOW_FIELD_KEYS) {
    const value = reading.measurements[key];
    if (value !== null) {
      columns.push(`"${key}"`);
      values.push(value);
    }
  }

  const placeholders = values.map((_, index) => `$${index + 1}`);

  return {
    text: `INSERT INTO ${TABLE} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING "id", "createdAt"`,
    values,
  };
}

export function buildCountStatement(criteria: ReadingCriteria): SqlStatement {
  const where = buildWhereClause(criteria);
  return {
    text: joinClauses(
      `SELECT COUNT(*)::int AS "totalCount" FROM ${TABLE}`,
      where.clause,
    ),
    values: where.values,
  };
}

export function buildPageStatement(
  criteria: ReadingCriteria,
  window: PageWindow,
): SqlStatement {
  const where = buildWhereClause(criteria);
  const values = [
    ...where.values,
    window.pageSize,
    (window.page - 1) * window.pageSize,
  ];

  return {
    text: joinClauses(
      `SELECT * FROM ${TABLE}`,
      where.clause,
      NEWEST_FIRST,
      `LIMIT $${values.length - 1} OFFSET $${values.length}`,
    ),
    values,
  };
}

export function buildLatestStatement(deviceId?: string): SqlStatement {
  const where = buildWhereClause({ deviceId });
  return {
    text: joinClauses(`SELECT * FROM ${TABLE}`, where.clause, NEWEST_FIRST, 'LIMIT 1'),
    values: where.values,
  };
}

export function buildDeviceSummaryStatement(
  criteria: ReadingCriteria,
): SqlStatement {
  const where = buildWhereClause(criteria);
  return {
    text: joinClauses(
      'SELECT "deviceId", COUNT(*)::int AS "readingCount", MIN("createdAt") AS "firstReadingAt", MAX("createdAt") AS "lastReadingAt"',
      `FROM ${TABLE}`,
      where.clause,
      'GROUP BY "deviceId" ORDER BY "deviceId" ASC',
    ),
    values: where.values,
  };
}
