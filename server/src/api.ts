import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { z } from 'zod';
import type { Logger } from './lib/logger';
import type { IngestionLogStore } from './lib/ingestion/log-store';
import type { IngestionPipeline } from './lib/ingestion/pipeline';
import { toErrorMessage } from './lib/ingestion/types';
import {
  getAllowedUploadExtensions,
  saveFilesToDirectory,
  type UploadPayload,
} from './lib/upload-storage';

export type AppDeps = {
  pipeline: IngestionPipeline;
  logStore: IngestionLogStore;
  uploadDirectory: string;
  logger: Logger;
  corsOrigin?: string;
};

const logsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().default(100),
});

export function createApp(deps: AppDeps) {
  const log = deps.logger.child({ component: 'api' });
  const app = new Hono();

  app.use('*', requestLogger((message) => log.info(message)));
  app.use('*', cors({ origin: deps.corsOrigin ?? 'http://localhost:3000', credentials: true }));

  app.get('/health', (c) =>
    c.json({ status: 'healthy', message: 'Data Ingestion API is running' })
  );

  app.post('/upload', async (c) => {
    try {
      const formData = await c.req.formData();
      const filesFieldEntries = formData.getAll('files');
      const singleFileEntry = formData.get('file');
      const candidateEntries = singleFileEntry
        ? [...filesFieldEntries, singleFileEntry]
        : filesFieldEntries;

      const files: UploadPayload[] = [];
      for (const entry of candidateEntries) {
        if (typeof entry !== 'string') {
          files.push(entry);
        }
      }

      if (files.length === 0) {
        return c.json({
          success: false,
          error: 'No files were provided. Use "file" or "files" multipart fields.',
          allowedExtensions: getAllowedUploadExtensions(),
        }, 400);
      }

      const { uploadedFiles, rejectedFiles } = await saveFilesToDirectory(deps.uploadDirectory, files);
      const ingestionResults = await deps.pipeline.run(false);

      return c.json({
        success: true,
        message: `Successfully uploaded ${uploadedFiles.length} files`,
        uploadedFiles,
        rejectedFiles,
        ingestionResults,
      });
    } catch (error) {
      const message = toErrorMessage(error);
      log.error({ error: message }, 'Upload route error');
      return c.json({ success: false, error: `Upload failed: ${message}` }, 500);
    }
  });

  app.get('/metadata', async (c) => {
    try {
      const filePath = c.req.query('path');
      const metadata = filePath
        ? (await deps.logStore.getMetadata(filePath)) ?? {}
        : await deps.logStore.getMetadata();

      return c.json({ success: true, metadata });
    } catch (error) {
      const message = toErrorMessage(error);
      log.error({ error: message }, 'Metadata route error');
      return c.json({ success: false, error: `Failed to get metadata: ${message}` }, 500);
    }
  });

  app.get('/logs', async (c) => {
    const parsed = logsQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!parsed.success) {
      return c.json({ success: false, error: 'limit must be a positive integer' }, 400);
    }

    try {
      const logs = await deps.logStore.getHistory(parsed.data.limit);
      return c.json({ success: true, logs });
    } catch (error) {
      const message = toErrorMessage(error);
      log.error({ error: message }, 'Logs route error');
      return c.json({ success: false, error: `Failed to get logs: ${message}` }, 500);
    }
  });

  app.post('/trigger-ingestion', async (c) => {
    try {
      const results = await deps.pipeline.run(false);
      return c.json({ success: true, results });
    } catch (error) {
      const message = toErrorMessage(error);
      log.error({ error: message }, 'Trigger ingestion route error');
      return c.json({ success: false, error: `Ingestion failed: ${message}` }, 500);
    }
  });

  return app;
}
