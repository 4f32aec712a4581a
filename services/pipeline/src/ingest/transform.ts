import { getCell, hasColumn, withColumn, type Cell, type Row, type Table } from '../table/table';
import type { LocationMetadataMap } from './metadata';

export interface EnrichmentResult {
  table: Table;
  duplicatesRemoved: number;
  incompleteRemoved: number;
}

export function attachLocationMetadata(table: Table, metadata: LocationMetadataMap): Table {
  const lookup = (row: Row) => {
    const locationId = getCell(row, 'location_id');
    return locationId === null ? undefined : metadata.get(locationId.trim());
  };
  const named = withColumn(table, 'location_name', (row) => lookup(row)?.locationName ?? '');
  return withColumn(named, 'provider', (row) => lookup(row)?.provider ?? '');
}

export function normalizeColumnName(column: string): string {
  return column.toLowerCase().replace(/ /g, '_');
}

/**
 * Lower-cases column names and turns spaces into underscores. When two columns collapse
 * onto one name, the first keeps its position and the later one's values win.
 */
export function normalizeColumnNames(table: Table): Table {
  const columns: string[] = [];
  for (const column of table.columns) {
    const normalized = normalizeColumnName(column);
    if (!columns.includes(normalized)) {
      columns.push(normalized);
    }
  }

  const rows = table.rows.map((row) => {
    const next: Row = {};
    for (const column of table.columns) {
      next[normalizeColumnName(column)] = getCell(row, column);
    }
    return next;
  });
  return { columns, rows };
}

export function ensureLocationColumn(table: Table): Table {
  if (hasColumn(table, 'location')) {
    return table;
  }
  return withColumn(table, 'location', () => 'Unknown');
}

export function parseTimestamp(value: Cell): Cell {
  if (value === null) {
    return null;
  }
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

export function deriveTimestamp(table: Table): Table {
  if (!hasColumn(table, 'date')) {
    return table;
  }
  return withColumn(table, 'timestamp', (row) => parseTimestamp(getCell(row, 'date')));
}

function rowSignature(columns: string[], row: Row): string {
  return JSON.stringify(columns.map((column) => getCell(row, column)));
}

/** Keeps the first occurrence of each exact duplicate row. */
export function dropDuplicateRows(table: Table): Table {
  const seen = new Set<string>();
  const rows = table.rows.filter((row) => {
    const signature = rowSignature(table.columns, row);
    if (seen.has(signature)) {
      return false;
    }
    seen.add(signature);
    return true;
  });
  return { columns: [...table.columns], rows };
}

export function dropIncompleteRows(table: Table): Table {
  const rows = table.rows.filter((row) => table.columns.every((column) => getCell(row, column) !== null));
  return { columns: [...table.columns], rows };
}

/**
 * Metadata join, column normalization, `location` placeholder, `timestamp` derivation,
 * then duplicate removal before null removal. A duplicate row with a null counts as a
 * duplicate only.
 */
export function enrichDataset(table: Table, metadata: LocationMetadataMap): EnrichmentResult {
  const shaped = deriveTimestamp(ensureLocationColumn(normalizeColumnNames(attachLocationMetadata(table, metadata))));
  const deduplicated = dropDuplicateRows(shaped);
  const complete = dropIncompleteRows(deduplicated);
  return {
    table: complete,
    duplicatesRemoved: shaped.rows.length - deduplicated.rows.length,
    incompleteRemoved: deduplicated.rows.length - complete.rows.length
  };
}
