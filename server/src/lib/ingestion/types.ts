export const SUPPORTED_EXTENSIONS = [
  '.csv',
  '.xlsx',
  '.xls',
  '.json',
  '.parquet',
  '.txt',
  '.tsv',
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const INGESTION_EVENTS = ['start', 'file_processed', 'complete'] as const;

export type IngestionEvent = (typeof INGESTION_EVENTS)[number];

export const FORMAT_BRANCHES = ['csv', 'excel', 'json', 'parquet'] as const;

export type FormatBranch = (typeof FORMAT_BRANCHES)[number];

export const COLUMN_TYPES = ['integer', 'float', 'boolean', 'datetime', 'string', 'empty'] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type TableShape = {
  rowCount: number;
  columnCount: number;
  columnNames: string[];
  columnTypes: Record<string, ColumnType | string>;
};

export type DelimitedDetails = TableShape & {
  kind: 'delimited';
  delimiter: string;
};

export type SpreadsheetDetails = {
  kind: 'spreadsheet';
  sheetCount: number;
  sheetNames: string[];
  sheets: Record<string, TableShape>;
};

export type JsonDetails =
  | { kind: 'json'; jsonType: 'array'; recordCount: number; sampleKeys: string[] | null }
  | { kind: 'json'; jsonType: 'object'; topLevelKeys: string[] }
  | { kind: 'json'; jsonType: 'scalar'; typeName: string };

export type ParquetDetails = TableShape & {
  kind: 'parquet';
};

export type FormatDetails = DelimitedDetails | SpreadsheetDetails | JsonDetails | ParquetDetails;

export type FormatError = {
  format: FormatBranch;
  message: string;
};

export type ExtractedFileMetadata = {
  filePath: string;
  fileName: string;
  fileSizeBytes: number;
  fileExtension: string;
  createdTime: string;
  modifiedTime: string;
  checksum: string;
  extractionTime: string;
  formatDetails?: FormatDetails;
  formatError?: FormatError;
};

export type FailedFileMetadata = {
  filePath: string;
  error: string;
  extractionTime: string;
};

export type FileMetadataRecord = ExtractedFileMetadata | FailedFileMetadata;

export function isExtractionFailure(record: FileMetadataRecord): record is FailedFileMetadata {
  return 'error' in record;
}

type HistoryEntryBase = {
  sessionId: string;
  timestamp: string;
};

export type IngestionStartEntry = HistoryEntryBase & {
  event: 'start';
  filesDetected: number;
};

export type FileProcessedEntry = HistoryEntryBase & {
  event: 'file_processed';
  filePath: string;
  success: boolean;
  metadata: FileMetadataRecord;
};

export type IngestionCompleteEntry = HistoryEntryBase & {
  event: 'complete';
  processedCount: number;
  failedCount: number;
};

export type IngestionHistoryEntry = IngestionStartEntry | FileProcessedEntry | IngestionCompleteEntry;

export type FileOutcome =
  | { filePath: string; success: boolean; metadata: FileMetadataRecord }
  | { filePath: string; success: false; error: string };

export type IngestionRunSummary = {
  sessionId: string;
  totalFiles: number;
  processedCount: number;
  failedCount: number;
  results: FileOutcome[];
  error?: string;
};

export function toErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' && error.length > 0 ? error : fallback;
}
