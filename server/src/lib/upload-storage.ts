import { basename, extname, join, resolve } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { ensureDir } from 'fs-extra/esm';
import { SUPPORTED_EXTENSIONS } from './ingestion/types';

const ALLOWED_EXTENSIONS = new Set<string>(SUPPORTED_EXTENSIONS);

export interface UploadedFileMetadata {
  filename: string;
  size: number;
  path: string;
}

export interface RejectedFileMetadata {
  filename: string;
  reason: string;
}

export interface UploadPayload {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface UploadResult {
  uploadedFiles: UploadedFileMetadata[];
  rejectedFiles: RejectedFileMetadata[];
}

export function sanitizeFileName(filename: string): string {
  const withoutPath = basename(filename.replace(/\\/g, '/'));
  const sanitized = withoutPath.replace(/[^a-zA-Z0-9._-]/g, '_');
  return sanitized.replace(/^\.+/, '') || 'file';
}

function isExtensionAllowed(filename: string): boolean {
  const extension = extname(filename).toLowerCase();
  return ALLOWED_EXTENSIONS.has(extension);
}

export function getAllowedUploadExtensions(): string[] {
  return Array.from(ALLOWED_EXTENSIONS.values());
}

/**
 * Writes each payload verbatim into the watched directory under its sanitized
 * name, replacing any earlier upload with the same name.
 */
export async function saveFilesToDirectory(directory: string, files: UploadPayload[]): Promise<UploadResult> {
  const targetDir = resolve(directory);
  await ensureDir(targetDir);

  const uploadedFiles: UploadedFileMetadata[] = [];
  const rejectedFiles: RejectedFileMetadata[] = [];

  for (const file of files) {
    const filename = file.name?.trim() || 'unknown';

    if (!file.name || !file.name.trim()) {
      rejectedFiles.push({ filename, reason: 'File name is required' });
      continue;
    }

    if (!isExtensionAllowed(file.name)) {
      rejectedFiles.push({ filename, reason: 'Unsupported file type' });
      continue;
    }

    const arrayBuffer = await file.arrayBuffer();
    const size = arrayBuffer.byteLength;

    if (size === 0) {
      rejectedFiles.push({ filename, reason: 'File is empty' });
      continue;
    }

    const storedPath = join(targetDir, sanitizeFileName(file.name));
    await writeFile(storedPath, Buffer.from(arrayBuffer));

    uploadedFiles.push({ filename: file.name, size, path: storedPath });
  }

  return { uploadedFiles, rejectedFiles };
}
