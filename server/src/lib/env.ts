/**
 * Environment variable accessors shared by the HTTP server and the CLI.
 * Entry points load `.env` through `dotenv/config` before calling these.
 */

/**
 * Get environment variable with fallback support
 */
export function getEnv(key: string, defaultValue: string): string;
export function getEnv(key: string, defaultValue?: string): string | undefined;
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : defaultValue;
}

export function getWatchDirectories(): string[] {
  const directories = getEnv('WATCH_DIRECTORIES', './data/incoming')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

  return directories.length > 0 ? directories : ['./data/incoming'];
}

export function getUploadDirectory(): string {
  return getEnv('UPLOAD_DIRECTORY') ?? getWatchDirectories()[0];
}

export function getLogDirectory(): string {
  return getEnv('LOG_DIRECTORY', './logs');
}

export function getLogLevel(): string {
  return getEnv('LOG_LEVEL', 'info');
}

export function getChecksumAlgorithm(): string {
  return getEnv('CHECKSUM_ALGORITHM', 'sha256');
}

export function getPort(): number {
  const raw = getEnv('PORT', '8000');
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 8000;
}

export function getCorsOrigin(): string {
  return getEnv('CORS_ORIGIN', 'http://localhost:3000');
}
