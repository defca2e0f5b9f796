import type { Logger } from '../logger';
import { FileDetector } from './file-detector';
import { IngestionLogStore } from './log-store';
import { MetadataExtractor } from './metadata-extractor';
import {
  isExtractionFailure,
  toErrorMessage,
  type FileOutcome,
  type IngestionRunSummary,
} from './types';

export const PIPELINE_STATES = [
  'idle',
  'detecting',
  'processing_file',
  'completing',
  'done',
  'failed',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export type IngestionPipelineDeps = {
  detector: FileDetector;
  extractor: MetadataExtractor;
  logStore: IngestionLogStore;
  logger: Logger;
  now?: () => Date;
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatSessionTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * One ingestion run: detect, extract each file in detection order, record
 * every outcome, then record completion. A file's failure only ever counts
 * against that file; anything escaping the per-file loop fails the run.
 */
export class IngestionPipeline {
  private readonly detector: FileDetector;
  private readonly extractor: MetadataExtractor;
  private readonly logStore: IngestionLogStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private lastSessionBase: string | null = null;
  private sessionCounter = 0;
  private currentState: PipelineState = 'idle';

  constructor(deps: IngestionPipelineDeps) {
    this.detector = deps.detector;
    this.extractor = deps.extractor;
    this.logStore = deps.logStore;
    this.logger = deps.logger.child({ component: 'pipeline' });
    this.now = deps.now ?? (() => new Date());
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(recursive: boolean): Promise<IngestionRunSummary> {
    const sessionId = this.nextSessionId();
    const runStartedMs = Date.now();

    try {
      this.transition('detecting', sessionId);
      const detectedFiles = await this.detector.detect(recursive);
      await this.logStore.recordStart(sessionId, detectedFiles.length);

      let processedCount = 0;
      let failedCount = 0;
      const results: FileOutcome[] = [];

      for (const filePath of detectedFiles) {
        this.transition('processing_file', sessionId);
        const fileStartedMs = Date.now();

        try {
          const metadata = await this.extractor.extract(filePath);
          const success = !isExtractionFailure(metadata);
          await this.logStore.recordFileOutcome(sessionId, filePath, metadata, success);

          if (success) {
            processedCount += 1;
          } else {
            failedCount += 1;
          }
          results.push({ filePath, success, metadata });
          this.logger.debug(
            { sessionId, filePath, success, durationMs: Date.now() - fileStartedMs },
            'File processed'
          );
        } catch (error) {
          failedCount += 1;
          const message = `Unexpected error processing ${filePath}: ${toErrorMessage(error)}`;
          this.logger.error({ sessionId, filePath }, message);
          results.push({ filePath, success: false, error: message });
        }
      }

      this.transition('completing', sessionId);
      await this.logStore.recordComplete(sessionId, processedCount, failedCount);
      this.transition('done', sessionId);

      this.logger.info(
        {
          sessionId,
          totalFiles: detectedFiles.length,
          processedCount,
          failedCount,
          durationMs: Date.now() - runStartedMs,
        },
        'Ingestion run finished'
      );

      return {
        sessionId,
        totalFiles: detectedFiles.length,
        processedCount,
        failedCount,
        results,
      };
    } catch (error) {
      const message = toErrorMessage(error, 'Unknown ingestion pipeline failure');
      this.transition('failed', sessionId);
      this.logger.error({ sessionId, error: message }, `Critical error in ingestion pipeline: ${message}`);
      return {
        sessionId,
        totalFiles: 0,
        processedCount: 0,
        failedCount: 0,
        results: [],
        error: message,
      };
    }
  }

  // Same-second runs on one instance get a `_2`, `_3`... suffix.
  private nextSessionId(): string {
    const base = `ingestion_${formatSessionTimestamp(this.now())}`;
    if (base === this.lastSessionBase) {
      this.sessionCounter += 1;
      return `${base}_${this.sessionCounter}`;
    }

    this.lastSessionBase = base;
    this.sessionCounter = 1;
    return base;
  }

  private transition(next: PipelineState, sessionId: string): void {
    this.logger.debug({ sessionId, from: this.currentState, to: next }, 'Pipeline state change');
    this.currentState = next;
  }
}

export type IngestionPipelineConfig = {
  watchDirectories: string[];
  logDirectory: string;
  logger: Logger;
  checksumAlgorithm?: string;
};

export type IngestionComponents = {
  pipeline: IngestionPipeline;
  logStore: IngestionLogStore;
};

/**
 * Wires detector, extractor and store around one logger. The returned store
 * is the instance the pipeline writes through; share it with readers so all
 * access to the log directory goes through one write queue.
 */
export function createIngestionPipeline(config: IngestionPipelineConfig): IngestionComponents {
  const logStore = new IngestionLogStore(config.logDirectory, config.logger);
  const pipeline = new IngestionPipeline({
    detector: new FileDetector(config.watchDirectories, config.logger),
    extractor: new MetadataExtractor(config.logger, { checksumAlgorithm: config.checksumAlgorithm }),
    logStore,
    logger: config.logger,
  });

  return { pipeline, logStore };
}
