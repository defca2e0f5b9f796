import { join } from 'node:path';
import { ensureDir } from 'fs-extra/esm';
import pino, { type Logger } from 'pino';
import pinoRoll from 'pino-roll';

export type { Logger };

export type LoggerOptions = {
  logDirectory: string;
  level?: string;
  console?: boolean;
};

export type LoggerHandle = {
  logger: Logger;
  close: () => Promise<void>;
};

/**
 * Builds the process logger: a daily-rolled diagnostic file in the log
 * directory (`ingestion.<yyyyMMdd>.<n>.log`) plus stdout. Create it once at
 * startup and pass it to every component.
 *
 * The roll schedule keeps a timer alive until `close` ends the file stream.
 */
export async function createLogger(options: LoggerOptions): Promise<LoggerHandle> {
  const level = options.level ?? 'info';
  await ensureDir(options.logDirectory);

  const fileStream = await pinoRoll({
    file: join(options.logDirectory, 'ingestion'),
    frequency: 'daily',
    dateFormat: 'yyyyMMdd',
    extension: '.log',
    mkdir: true,
  });

  const streams: pino.StreamEntry[] = [{ level: 'debug', stream: fileStream }];
  if (options.console !== false) {
    streams.push({ level: 'info', stream: process.stdout });
  }

  const logger = pino({ level, base: undefined }, pino.multistream(streams));

  const close = () =>
    new Promise<void>((resolve, reject) => {
      fileStream.once('close', () => resolve());
      fileStream.once('error', reject);
      fileStream.end();
    });

  return { logger, close };
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
