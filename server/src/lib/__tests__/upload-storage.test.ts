import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  getAllowedUploadExtensions,
  sanitizeFileName,
  saveFilesToDirectory,
  type UploadPayload,
} from '../upload-storage';

function payload(name: string, content: string): UploadPayload {
  return { name, arrayBuffer: () => new Blob([content]).arrayBuffer() };
}

describe('sanitizeFileName', () => {
  it('drops directory components', () => {
    expect(sanitizeFileName('../../etc/passwd.csv')).toBe('passwd.csv');
    expect(sanitizeFileName('..\\..\\windows\\data.json')).toBe('data.json');
  });

  it('replaces characters outside the safe set', () => {
    expect(sanitizeFileName('my report (1).csv')).toBe('my_report__1_.csv');
  });

  it('strips leading dots and falls back when nothing is left', () => {
    expect(sanitizeFileName('.hidden.csv')).toBe('hidden.csv');
    expect(sanitizeFileName('...')).toBe('file');
  });
});

describe('saveFilesToDirectory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'upload-storage-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes accepted payloads under their sanitized names', async () => {
    const result = await saveFilesToDirectory(dir, [payload('sales report.csv', 'id\n1\n')]);

    expect(result.rejectedFiles).toEqual([]);
    expect(result.uploadedFiles).toEqual([
      { filename: 'sales report.csv', size: 5, path: join(dir, 'sales_report.csv') },
    ]);
    await expect(readFile(join(dir, 'sales_report.csv'), 'utf8')).resolves.toBe('id\n1\n');
  });

  it('rejects unsupported, empty and unnamed payloads without writing them', async () => {
    const result = await saveFilesToDirectory(dir, [
      payload('tool.exe', 'MZ'),
      payload('empty.csv', ''),
      payload('  ', 'x'),
    ]);

    expect(result.uploadedFiles).toEqual([]);
    expect(result.rejectedFiles).toEqual([
      { filename: 'tool.exe', reason: 'Unsupported file type' },
      { filename: 'empty.csv', reason: 'File is empty' },
      { filename: 'unknown', reason: 'File name is required' },
    ]);
    await expect(readdir(dir)).resolves.toEqual([]);
  });

  it('accepts extensions case-insensitively and overwrites earlier uploads', async () => {
    await saveFilesToDirectory(dir, [payload('DATA.JSON', '[1]')]);
    await saveFilesToDirectory(dir, [payload('DATA.JSON', '[1,2]')]);

    await expect(readFile(join(dir, 'DATA.JSON'), 'utf8')).resolves.toBe('[1,2]');
  });

  it('lists every supported extension', () => {
    expect(getAllowedUploadExtensions()).toEqual(['.csv', '.xlsx', '.xls', '.json', '.parquet', '.txt', '.tsv']);
  });
});
