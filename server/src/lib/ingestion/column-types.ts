import type { ColumnType } from './types';

const INTEGER_RE = /^[-+]?\d+$/;
const FLOAT_RE = /^[-+]?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const BOOL_VALUES = new Set(['true', 'false']);

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function classifyValue(value: unknown): ColumnType {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }

  if (typeof value === 'boolean') {
    return 'boolean';
  }

  if (value instanceof Date) {
    return 'datetime';
  }

  const text = String(value).trim();
  if (BOOL_VALUES.has(text.toLowerCase())) {
    return 'boolean';
  }
  if (INTEGER_RE.test(text)) {
    return 'integer';
  }
  if (FLOAT_RE.test(text)) {
    return 'float';
  }
  if (ISO_DATETIME_RE.test(text) || ISO_DATE_RE.test(text)) {
    return 'datetime';
  }

  return 'string';
}

/**
 * Infers one type name per column from sampled rows. Blank cells are ignored;
 * integer and float values together widen to float, any other mix is string.
 */
export function inferColumnTypes(
  columnNames: string[],
  rows: unknown[][]
): Record<string, ColumnType> {
  const columnTypes: Record<string, ColumnType> = {};

  columnNames.forEach((name, columnIndex) => {
    const kinds = new Set<ColumnType>();
    for (const row of rows) {
      const value = row[columnIndex];
      if (!isBlank(value)) {
        kinds.add(classifyValue(value));
      }
    }

    if (kinds.size === 0) {
      columnTypes[name] = 'empty';
    } else if (kinds.size === 1) {
      columnTypes[name] = kinds.values().next().value ?? 'string';
    } else if (kinds.size === 2 && kinds.has('integer') && kinds.has('float')) {
      columnTypes[name] = 'float';
    } else {
      columnTypes[name] = 'string';
    }
  });

  return columnTypes;
}

/**
 * Turns a raw header row into unique column names. Blank headers become
 * `col_<index>` and repeated names get a `.1`, `.2`... suffix.
 */
export function normalizeHeader(headerRow: unknown[]): string[] {
  const seen = new Map<string, number>();

  return headerRow.map((cell, index) => {
    const base = isBlank(cell) ? `col_${index}` : String(cell).trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}
