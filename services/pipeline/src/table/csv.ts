import { NULL_MARKERS, getCell, type Cell, type Row, type Table } from './table';

function splitRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  for (let index = 0; index < content.length; index += 1) {
    const char = content[index];

    if (inQuotes) {
      if (char === '"') {
        if (content[index + 1] === '"') {
          field += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      inQuotes = true;
      fieldStarted = true;
      continue;
    }
    if (char === ',') {
      record.push(field);
      field = '';
      fieldStarted = true;
      continue;
    }
    if (char === '\n' || char === '\r') {
      if (char === '\r' && content[index + 1] === '\n') {
        index += 1;
      }
      if (fieldStarted || field.length > 0 || record.length > 0) {
        record.push(field);
        records.push(record);
      }
      record = [];
      field = '';
      fieldStarted = false;
      continue;
    }
    field += char;
    fieldStarted = true;
  }

  if (inQuotes) {
    throw new Error('CSV content ends inside a quoted field');
  }
  if (fieldStarted || field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

function toCell(raw: string): Cell {
  return NULL_MARKERS.has(raw) ? null : raw;
}

/**
 * Parses CSV text with a header row. Blank lines are skipped; short records are padded
 * with `null`, extra trailing fields are dropped.
 */
export function parseCsv(content: string): Table {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const [header, ...records] = splitRecords(text);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((name) => name.trim());
  const rows: Row[] = records.map((values) => {
    const row: Row = {};
    columns.forEach((column, index) => {
      const value = values[index];
      row[column] = value === undefined ? null : toCell(value);
    });
    return row;
  });
  return { columns, rows };
}

function escapeField(value: Cell): string {
  if (value === null) {
    return '';
  }
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Header first, `\n` line endings, no index column. */
export function serializeCsv(table: Table): string {
  const lines = [table.columns.map((column) => escapeField(column)).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeField(getCell(row, column))).join(','));
  }
  return `${lines.join('\n')}\n`;
}
