export type Cell = string | null;

export type Row = Record<string, Cell>;

export interface Table {
  columns: string[];
  rows: Row[];
}

/** Markers read as a missing value, alongside the empty field. */
export const NULL_MARKERS: ReadonlySet<string> = new Set(['', 'NA', 'N/A', 'NaN', 'null']);

export function emptyTable(): Table {
  return { columns: [], rows: [] };
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

export function getCell(row: Row, column: string): Cell {
  return row[column] ?? null;
}

/**
 * Appends tables row-wise. Columns are the union in first-seen order; cells a source
 * table lacks are `null`.
 */
export function concatTables(tables: Table[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const table of tables) {
    for (const column of table.columns) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }

  const rows: Row[] = [];
  for (const table of tables) {
    for (const row of table.rows) {
      const next: Row = {};
      for (const column of columns) {
        next[column] = getCell(row, column);
      }
      rows.push(next);
    }
  }
  return { columns, rows };
}

export function withColumn(table: Table, column: string, valueFor: (row: Row) => Cell): Table {
  const columns = hasColumn(table, column) ? [...table.columns] : [...table.columns, column];
  const rows = table.rows.map((row) => ({ ...row, [column]: valueFor(row) }));
  return { columns, rows };
}
