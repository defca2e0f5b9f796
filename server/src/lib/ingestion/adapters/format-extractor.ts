import type { FormatBranch, FormatDetails } from '../types';
import { DelimitedFormatExtractor } from './delimited-extractor';
import { JsonFormatExtractor } from './json-extractor';
import { ParquetFormatExtractor } from './parquet-extractor';
import { SpreadsheetFormatExtractor } from './spreadsheet-extractor';

export interface FormatExtractor {
  id: FormatBranch;
  extensions: readonly string[];
  extract(filePath: string, extension: string): Promise<FormatDetails>;
}

export function createFormatExtractors(): FormatExtractor[] {
  return [
    new DelimitedFormatExtractor(),
    new SpreadsheetFormatExtractor(),
    new JsonFormatExtractor(),
    new ParquetFormatExtractor(),
  ];
}

/**
 * Picks the extractor registered for a lowercase extension (with dot).
 * Extensions without a format branch, such as `.txt`, resolve to null.
 */
export function findFormatExtractor(
  extractors: readonly FormatExtractor[],
  extension: string
): FormatExtractor | null {
  return extractors.find((extractor) => extractor.extensions.includes(extension)) ?? null;
}
