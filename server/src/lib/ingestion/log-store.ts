import { basename, join } from 'node:path';
import { move, outputJson, pathExists, readJson } from 'fs-extra/esm';
import { z } from 'zod';
import type { Logger } from '../logger';
import {
  isExtractionFailure,
  toErrorMessage,
  type ExtractedFileMetadata,
  type FileMetadataRecord,
  type IngestionHistoryEntry,
} from './types';

export const HISTORY_FILE_NAME = 'ingestion_history.json';
export const METADATA_FILE_NAME = 'ingestion_metadata.json';

function hasFilePath(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'filePath' in value &&
    typeof value.filePath === 'string'
  );
}

const metadataRecordSchema = z.custom<FileMetadataRecord>(hasFilePath, {
  message: 'Metadata record is missing filePath',
});

const historySchema: z.ZodType<IngestionHistoryEntry[]> = z.array(
  z.discriminatedUnion('event', [
    z.object({
      sessionId: z.string(),
      timestamp: z.string(),
      event: z.literal('start'),
      filesDetected: z.number().int(),
    }),
    z.object({
      sessionId: z.string(),
      timestamp: z.string(),
      event: z.literal('file_processed'),
      filePath: z.string(),
      success: z.boolean(),
      metadata: metadataRecordSchema,
    }),
    z.object({
      sessionId: z.string(),
      timestamp: z.string(),
      event: z.literal('complete'),
      processedCount: z.number().int(),
      failedCount: z.number().int(),
    }),
  ])
);

const metadataTableSchema: z.ZodType<Record<string, ExtractedFileMetadata>> = z.record(
  z.string(),
  z.custom<ExtractedFileMetadata>(hasFilePath, { message: 'Metadata record is missing filePath' })
);

/**
 * Append-only session history plus a path-keyed metadata table, each kept as
 * one JSON document in the log directory. Every write is a full
 * read-modify-write, so writes are queued and run one at a time. Failures are
 * logged and never thrown to callers.
 */
export class IngestionLogStore {
  readonly historyPath: string;
  readonly metadataPath: string;
  private readonly logger: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(logDirectory: string, logger: Logger) {
    this.historyPath = join(logDirectory, HISTORY_FILE_NAME);
    this.metadataPath = join(logDirectory, METADATA_FILE_NAME);
    this.logger = logger.child({ component: 'log-store' });
  }

  async recordStart(sessionId: string, filesDetected: number): Promise<void> {
    await this.appendEntry({
      sessionId,
      timestamp: new Date().toISOString(),
      event: 'start',
      filesDetected,
    });
    this.logger.info(
      { sessionId, filesDetected },
      `Started ingestion session ${sessionId} with ${filesDetected} files`
    );
  }

  async recordFileOutcome(
    sessionId: string,
    filePath: string,
    metadata: FileMetadataRecord,
    success: boolean
  ): Promise<void> {
    await this.appendEntry({
      sessionId,
      timestamp: new Date().toISOString(),
      event: 'file_processed',
      filePath,
      success,
      metadata,
    });

    if (success && !isExtractionFailure(metadata)) {
      this.logger.info({ sessionId, filePath }, `Successfully processed: ${basename(filePath)}`);
      await this.storeMetadata(metadata);
    } else {
      this.logger.error({ sessionId, filePath }, `Failed to process: ${basename(filePath)}`);
    }
  }

  async recordComplete(sessionId: string, processedCount: number, failedCount: number): Promise<void> {
    await this.appendEntry({
      sessionId,
      timestamp: new Date().toISOString(),
      event: 'complete',
      processedCount,
      failedCount,
    });
    this.logger.info(
      { sessionId, processedCount, failedCount },
      `Completed ingestion session ${sessionId}: ${processedCount} processed, ${failedCount} failed`
    );
  }

  /**
   * Returns the last `limit` entries in append order, or the whole history
   * when `limit` is 0 or omitted.
   */
  async getHistory(limit?: number): Promise<IngestionHistoryEntry[]> {
    return this.enqueue(async () => {
      try {
        const history = await this.readHistory();
        return limit ? history.slice(-limit) : history;
      } catch (error) {
        this.logFailure('Failed to retrieve ingestion history', this.historyPath, error);
        return [];
      }
    });
  }

  getMetadata(): Promise<Record<string, ExtractedFileMetadata>>;
  getMetadata(filePath: string): Promise<ExtractedFileMetadata | null>;
  async getMetadata(
    filePath?: string
  ): Promise<Record<string, ExtractedFileMetadata> | ExtractedFileMetadata | null> {
    return this.enqueue(async () => {
      try {
        const table = await this.readMetadataTable();
        if (filePath !== undefined) {
          return table[filePath] ?? null;
        }
        return table;
      } catch (error) {
        this.logFailure('Failed to retrieve metadata', this.metadataPath, error);
        return filePath !== undefined ? null : {};
      }
    });
  }

  private async appendEntry(entry: IngestionHistoryEntry): Promise<void> {
    await this.enqueue(async () => {
      try {
        const history = await this.readHistory();
        history.push(entry);
        await this.writeDocument(this.historyPath, history);
      } catch (error) {
        this.logFailure('Failed to append to ingestion log', this.historyPath, error);
      }
    });
  }

  private async storeMetadata(metadata: ExtractedFileMetadata): Promise<void> {
    await this.enqueue(async () => {
      try {
        const table = await this.readMetadataTable();
        table[metadata.filePath] = metadata;
        await this.writeDocument(this.metadataPath, table);
      } catch (error) {
        this.logFailure('Failed to store metadata', this.metadataPath, error);
      }
    });
  }

  private async readHistory(): Promise<IngestionHistoryEntry[]> {
    if (!(await pathExists(this.historyPath))) {
      return [];
    }
    return historySchema.parse(await readJson(this.historyPath));
  }

  private async readMetadataTable(): Promise<Record<string, ExtractedFileMetadata>> {
    if (!(await pathExists(this.metadataPath))) {
      return {};
    }
    return metadataTableSchema.parse(await readJson(this.metadataPath));
  }

  // Write-then-rename so a crash mid-write never leaves a truncated document.
  private async writeDocument(targetPath: string, document: unknown): Promise<void> {
    const tempPath = `${targetPath}.tmp`;
    await outputJson(tempPath, document, { spaces: 2 });
    await move(tempPath, targetPath, { overwrite: true });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private logFailure(message: string, storePath: string, error: unknown): void {
    this.logger.error({ storePath, error: toErrorMessage(error) }, `${message}: ${toErrorMessage(error)}`);
  }
}
