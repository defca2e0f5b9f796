import parquet, { type ParquetField } from 'parquetjs-lite';
import type { ParquetDetails } from '../types';
import type { FormatExtractor } from './format-extractor';

function describeField(field: ParquetField): string {
  if (field.isNested) {
    return field.originalType ?? 'GROUP';
  }
  return field.originalType ?? field.primitiveType ?? 'UNKNOWN';
}

/**
 * Reads counts and column types from the footer schema only; no row data is
 * decoded.
 */
export class ParquetFormatExtractor implements FormatExtractor {
  id = 'parquet' as const;
  extensions = ['.parquet'] as const;

  async extract(filePath: string): Promise<ParquetDetails> {
    const reader = await parquet.ParquetReader.openFile(filePath);

    try {
      const fields = Object.values(reader.getSchema().fields);
      const columnNames = fields.map((field) => field.name);
      const columnTypes: Record<string, string> = {};
      for (const field of fields) {
        columnTypes[field.name] = describeField(field);
      }

      return {
        kind: 'parquet',
        rowCount: Number(reader.getRowCount()),
        columnCount: columnNames.length,
        columnNames,
        columnTypes,
      };
    } finally {
      await reader.close();
    }
  }
}
