import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const CHECKSUM_CHUNK_BYTES = 4096;

/**
 * Streams the whole file through the digest in fixed-size chunks and returns
 * the hex digest. Rejects when the file cannot be opened or read.
 */
export async function calculateChecksum(filePath: string, algorithm = 'sha256'): Promise<string> {
  const hash = createHash(algorithm);
  const stream = createReadStream(filePath, { highWaterMark: CHECKSUM_CHUNK_BYTES });

  for await (const chunk of stream) {
    hash.update(chunk);
  }

  return hash.digest('hex');
}
