import { stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import type { Logger } from '../logger';
import { calculateChecksum } from './checksum';
import { createFormatExtractors, findFormatExtractor, type FormatExtractor } from './adapters/format-extractor';
import { toErrorMessage, type ExtractedFileMetadata, type FileMetadataRecord } from './types';

export type MetadataExtractorOptions = {
  checksumAlgorithm?: string;
  extractors?: FormatExtractor[];
};

export class MetadataExtractor {
  private readonly logger: Logger;
  private readonly checksumAlgorithm: string;
  private readonly extractors: FormatExtractor[];

  constructor(logger: Logger, options: MetadataExtractorOptions = {}) {
    this.logger = logger.child({ component: 'extractor' });
    this.checksumAlgorithm = options.checksumAlgorithm ?? 'sha256';
    this.extractors = options.extractors ?? createFormatExtractors();
  }

  /**
   * Never rejects. Filesystem or checksum failures produce a failed record
   * (`{ filePath, error, extractionTime }`); a failure inside a format branch
   * keeps the base facts and sets `formatError` instead.
   */
  async extract(filePath: string): Promise<FileMetadataRecord> {
    const absolutePath = resolve(filePath);

    try {
      const stats = await stat(absolutePath);
      if (!stats.isFile()) {
        throw new Error(`Not a regular file: ${absolutePath}`);
      }

      const extension = extname(absolutePath).toLowerCase();
      const checksum = await calculateChecksum(absolutePath, this.checksumAlgorithm);
      const createdAt = stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;

      const metadata: ExtractedFileMetadata = {
        filePath: absolutePath,
        fileName: basename(absolutePath),
        fileSizeBytes: stats.size,
        fileExtension: extension,
        createdTime: createdAt.toISOString(),
        modifiedTime: stats.mtime.toISOString(),
        checksum,
        extractionTime: new Date().toISOString(),
      };

      const extractor = findFormatExtractor(this.extractors, extension);
      if (extractor) {
        try {
          metadata.formatDetails = await extractor.extract(absolutePath, extension);
        } catch (error) {
          const message = toErrorMessage(error, `Unknown ${extractor.id} failure`);
          this.logger.error(
            { filePath: absolutePath, format: extractor.id, error: message },
            `Failed to extract ${extractor.id} metadata`
          );
          metadata.formatError = { format: extractor.id, message };
        }
      }

      this.logger.info({ filePath: absolutePath }, `Extracted metadata for: ${metadata.fileName}`);
      return metadata;
    } catch (error) {
      const message = toErrorMessage(error, 'Unknown extraction failure');
      this.logger.error({ filePath: absolutePath, error: message }, 'Failed to extract metadata');
      return {
        filePath: absolutePath,
        error: message,
        extractionTime: new Date().toISOString(),
      };
    }
  }
}
