import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { inferColumnTypes, normalizeHeader } from '../column-types';
import type { SpreadsheetDetails, TableShape } from '../types';
import { SAMPLE_ROW_COUNT } from './delimited-extractor';
import type { FormatExtractor } from './format-extractor';

function describeSheet(sheet: XLSX.WorkSheet): TableShape {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });

  const columnNames = normalizeHeader(rows[0] ?? []);
  const sampleRows = rows.slice(1, 1 + SAMPLE_ROW_COUNT);

  return {
    rowCount: Math.max(0, rows.length - 1),
    columnCount: columnNames.length,
    columnNames,
    columnTypes: inferColumnTypes(columnNames, sampleRows),
  };
}

/**
 * Workbook branch for `.xlsx` and `.xls`. Every sheet is read in full for an
 * exact data-row count; names and types come from the header and the first
 * sampled rows.
 */
export class SpreadsheetFormatExtractor implements FormatExtractor {
  id = 'excel' as const;
  extensions = ['.xlsx', '.xls'] as const;

  async extract(filePath: string): Promise<SpreadsheetDetails> {
    const buffer = await readFile(filePath);
    const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });

    const sheets: Record<string, TableShape> = {};
    for (const name of workbook.SheetNames) {
      const sheet = workbook.Sheets[name];
      if (!sheet) {
        throw new Error(`Sheet '${name}' not found in workbook`);
      }
      sheets[name] = describeSheet(sheet);
    }

    return {
      kind: 'spreadsheet',
      sheetCount: workbook.SheetNames.length,
      sheetNames: [...workbook.SheetNames],
      sheets,
    };
  }
}
