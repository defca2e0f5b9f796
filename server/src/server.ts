import 'dotenv/config';
import { serve } from '@hono/node-server';
import { ensureDir } from 'fs-extra/esm';
import { createApp } from './api';
import {
  getChecksumAlgorithm,
  getCorsOrigin,
  getLogDirectory,
  getLogLevel,
  getPort,
  getUploadDirectory,
  getWatchDirectories,
} from './lib/env';
import { createLogger } from './lib/logger';
import { createIngestionPipeline } from './lib/ingestion/pipeline';

async function startServer(): Promise<void> {
  const logDirectory = getLogDirectory();
  const uploadDirectory = getUploadDirectory();
  const { logger, close } = await createLogger({ logDirectory, level: getLogLevel() });

  await ensureDir(uploadDirectory);

  const { pipeline, logStore } = createIngestionPipeline({
    watchDirectories: getWatchDirectories(),
    logDirectory,
    logger,
    checksumAlgorithm: getChecksumAlgorithm(),
  });

  const app = createApp({
    pipeline,
    logStore,
    uploadDirectory,
    logger,
    corsOrigin: getCorsOrigin(),
  });

  const port = getPort();
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(
      { port: info.port, uploadDirectory, logDirectory },
      `Data Ingestion API listening on port ${info.port}`
    );
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down...`);
    server.close(() => {
      close().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : 'Unknown error';
        console.error(`[server] Failed to close log file: ${message}`);
        process.exitCode = 1;
      });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

void startServer().catch((error) => {
  const message = error instanceof Error ? error.message : 'Unknown startup error';
  console.error(`[server] Startup failed: ${message}`);
  process.exitCode = 1;
});
