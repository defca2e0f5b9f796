import { createInterface } from 'node:readline';
import { createReadStream } from 'node:fs';
import * as XLSX from 'xlsx';
import { inferColumnTypes, normalizeHeader } from '../column-types';
import type { DelimitedDetails } from '../types';
import type { FormatExtractor } from './format-extractor';

export const SAMPLE_ROW_COUNT = 5;

const LINE_FEED = 0x0a;

async function readLeadingLines(filePath: string, limit: number): Promise<string[]> {
  const stream = createReadStream(filePath, { encoding: 'utf8' });
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  const lines: string[] = [];

  try {
    for await (const line of reader) {
      const cleaned = lines.length === 0 ? line.replace(/^\uFEFF/, '') : line;
      if (cleaned.trim().length === 0) {
        continue;
      }
      lines.push(cleaned);
      if (lines.length >= limit) {
        break;
      }
    }
  } finally {
    reader.close();
    stream.destroy();
  }

  return lines;
}

/**
 * Counts lines across the whole file. A final line without a trailing
 * newline still counts.
 */
export async function countLines(filePath: string): Promise<number> {
  let lines = 0;
  let lastByte: number | null = null;

  for await (const chunk of createReadStream(filePath)) {
    const buffer: Buffer = chunk;
    for (let index = buffer.indexOf(LINE_FEED); index !== -1; index = buffer.indexOf(LINE_FEED, index + 1)) {
      lines += 1;
    }
    if (buffer.length > 0) {
      lastByte = buffer[buffer.length - 1];
    }
  }

  if (lastByte !== null && lastByte !== LINE_FEED) {
    lines += 1;
  }

  return lines;
}

export class DelimitedFormatExtractor implements FormatExtractor {
  id = 'csv' as const;
  extensions = ['.csv', '.tsv'] as const;

  async extract(filePath: string, extension: string): Promise<DelimitedDetails> {
    const delimiter = extension === '.tsv' ? '\t' : ',';
    const sampleLines = await readLeadingLines(filePath, SAMPLE_ROW_COUNT + 1);

    if (sampleLines.length === 0) {
      throw new Error('No columns to parse from file');
    }

    // raw keeps every cell a string so type inference sees the source text.
    const workbook = XLSX.read(sampleLines.join('\n'), { type: 'string', FS: delimiter, raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows: unknown[][] = sheet
      ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false })
      : [];

    const columnNames = normalizeHeader(rows[0] ?? []);
    const lineCount = await countLines(filePath);

    return {
      kind: 'delimited',
      delimiter,
      rowCount: Math.max(0, lineCount - 1),
      columnCount: columnNames.length,
      columnNames,
      columnTypes: inferColumnTypes(columnNames, rows.slice(1)),
    };
  }
}
