import { addDays } from '../dates';
import { DatasetSchemaError } from '../errors';
import { getCell, hasColumn, type Cell, type Table } from '../table/table';

export interface DailyValue {
  date: string;
  value: number;
}

export type DailySeries = DailyValue[];

const LEADING_DATE = /^(\d{4}-\d{2}-\d{2})/;
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Plain decimal text only; blanks, hex and other forms `Number()` accepts are missing. */
export function parseMeasurement(raw: Cell): number | null {
  const text = raw?.trim() ?? '';
  if (!DECIMAL_NUMBER.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Calendar day of a datetime cell. ISO text keeps the day in its own offset, as the
 * archive records local time; anything else falls back to the UTC day of the instant.
 */
export function calendarDay(datetime: string): string | null {
  const text = datetime.trim();
  const leading = LEADING_DATE.exec(text)?.[1];
  if (leading) {
    return addDays(leading, 0) === leading ? leading : null;
  }
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString().slice(0, 10);
}

export function assertPromptColumns(table: Table, parameter: string): void {
  const required = ['datetime', 'location_name', parameter];
  const missing = required.filter((column) => !hasColumn(table, column));
  if (missing.length > 0) {
    throw new DatasetSchemaError(missing);
  }
}

/** Mean of the parameter per calendar day for one location; empty days are left out. */
export function toDailySeries(table: Table, options: { locationName: string; parameter: string }): DailySeries {
  assertPromptColumns(table, options.parameter);

  const buckets = new Map<string, { sum: number; count: number }>();
  for (const row of table.rows) {
    if (getCell(row, 'location_name') !== options.locationName) {
      continue;
    }
    const datetime = getCell(row, 'datetime');
    const day = datetime === null ? null : calendarDay(datetime);
    if (day === null) {
      continue;
    }
    const value = parseMeasurement(getCell(row, options.parameter));
    const bucket = buckets.get(day) ?? { sum: 0, count: 0 };
    if (value !== null) {
      bucket.sum += value;
      bucket.count += 1;
    }
    buckets.set(day, bucket);
  }

  return Array.from(buckets.entries())
    .filter(([, bucket]) => bucket.count > 0)
    .map(([date, bucket]) => ({ date, value: bucket.sum / bucket.count }))
    .sort((left, right) => left.date.localeCompare(right.date));
}
