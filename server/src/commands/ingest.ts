import type { Command } from 'commander';
import { getChecksumAlgorithm, getLogDirectory, getLogLevel, getWatchDirectories } from '../lib/env';
import { createLogger, type LoggerHandle, type LoggerOptions } from '../lib/logger';
import { createIngestionPipeline } from '../lib/ingestion/pipeline';
import type { IngestionRunSummary } from '../lib/ingestion/types';

const RULE = '='.repeat(50);

export type IngestOptions = {
  directories: string[];
  logDir: string;
  recursive: boolean;
  json?: boolean;
};

export type IngestCommandDeps = {
  createLogger: (options: LoggerOptions) => Promise<LoggerHandle>;
  print: (line: string) => void;
};

const defaultDeps: IngestCommandDeps = {
  createLogger,
  print: (line) => console.log(line),
};

export function formatSummary(summary: IngestionRunSummary): string[] {
  const lines = [
    RULE,
    'INGESTION SUMMARY',
    RULE,
    `Session ID: ${summary.sessionId}`,
    `Total Files: ${summary.totalFiles}`,
    `Successfully Processed: ${summary.processedCount}`,
    `Failed: ${summary.failedCount}`,
  ];

  if (summary.error) {
    lines.push(`Error: ${summary.error}`);
  }

  lines.push(RULE);
  return lines;
}

/**
 * Runs one ingestion pass and prints the summary.
 * Sets a non-zero exit code when the run itself failed.
 */
async function runIngest(options: IngestOptions, deps: IngestCommandDeps): Promise<IngestionRunSummary> {
  const { logger, close } = await deps.createLogger({
    logDirectory: options.logDir,
    level: getLogLevel(),
    console: false,
  });

  let summary: IngestionRunSummary;
  try {
    const { pipeline } = createIngestionPipeline({
      watchDirectories: options.directories,
      logDirectory: options.logDir,
      logger,
      checksumAlgorithm: getChecksumAlgorithm(),
    });
    summary = await pipeline.run(options.recursive);
  } finally {
    await close();
  }

  if (options.json) {
    deps.print(JSON.stringify(summary, null, 2));
  } else {
    for (const line of formatSummary(summary)) {
      deps.print(line);
    }
  }

  if (summary.error) {
    process.exitCode = 1;
  }

  return summary;
}

export function registerIngestCommand(program: Command, deps: IngestCommandDeps = defaultDeps): void {
  program
    .option('-d, --directories <dirs...>', 'Directories to scan for files', getWatchDirectories())
    .option('-l, --log-dir <dir>', 'Directory for logs and metadata', getLogDirectory())
    .option('--no-recursive', 'Disable recursive directory scanning')
    .option('--json', 'Print the run summary as JSON')
    .action(async (options: IngestOptions) => {
      await runIngest(options, deps);
    });
}
