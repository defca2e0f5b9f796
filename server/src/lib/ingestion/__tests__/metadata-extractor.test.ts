import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import parquet from 'parquetjs-lite';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSilentLogger } from '../../logger';
import { calculateChecksum } from '../checksum';
import { MetadataExtractor } from '../metadata-extractor';
import { isExtractionFailure, type ExtractedFileMetadata, type FileMetadataRecord } from '../types';

function expectExtracted(record: FileMetadataRecord): ExtractedFileMetadata {
  if (isExtractionFailure(record)) {
    throw new Error(`Expected successful extraction, got: ${record.error}`);
  }
  return record;
}

describe('MetadataExtractor', () => {
  let dir: string;
  let extractor: MetadataExtractor;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ingestion-extract-'));
    extractor = new MetadataExtractor(createSilentLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('records filesystem facts and checksum', async () => {
    const filePath = join(dir, 'notes.txt');
    await writeFile(filePath, 'hello');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.filePath).toBe(filePath);
    expect(record.fileName).toBe('notes.txt');
    expect(record.fileSizeBytes).toBe(5);
    expect(record.fileExtension).toBe('.txt');
    expect(record.checksum).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    expect(Number.isNaN(Date.parse(record.createdTime))).toBe(false);
    expect(Number.isNaN(Date.parse(record.modifiedTime))).toBe(false);
    expect(Number.isNaN(Date.parse(record.extractionTime))).toBe(false);
    expect(record.formatDetails).toBeUndefined();
    expect(record.formatError).toBeUndefined();
  });

  it('uses the configured checksum algorithm', async () => {
    const filePath = join(dir, 'notes.txt');
    await writeFile(filePath, 'hello');
    const md5Extractor = new MetadataExtractor(createSilentLogger(), { checksumAlgorithm: 'md5' });

    const record = expectExtracted(await md5Extractor.extract(filePath));

    expect(record.checksum).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('counts every csv data row and samples column names and types', async () => {
    const filePath = join(dir, 'a.csv');
    await writeFile(filePath, 'id,name\n1,alice\n2,bob\n3,carol\n');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toEqual({
      kind: 'delimited',
      delimiter: ',',
      rowCount: 3,
      columnCount: 2,
      columnNames: ['id', 'name'],
      columnTypes: { id: 'integer', name: 'string' },
    });
  });

  it('counts rows beyond the sampled ones', async () => {
    const rows = Array.from({ length: 40 }, (_, index) => `${index},${index * 1.5}`);
    const filePath = join(dir, 'long.csv');
    await writeFile(filePath, `n,half\n${rows.join('\n')}`);

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toMatchObject({ kind: 'delimited', rowCount: 40, columnCount: 2 });
  });

  it('reads tab-separated files and upper-case extensions', async () => {
    const filePath = join(dir, 'CITIES.TSV');
    await writeFile(filePath, 'city\tcount\nParis\t10\nLyon\t20\n');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.fileExtension).toBe('.tsv');
    expect(record.formatDetails).toEqual({
      kind: 'delimited',
      delimiter: '\t',
      rowCount: 2,
      columnCount: 2,
      columnNames: ['city', 'count'],
      columnTypes: { city: 'string', count: 'integer' },
    });
  });

  it('keeps base facts and sets a branch error for an empty csv', async () => {
    const filePath = join(dir, 'empty.csv');
    await writeFile(filePath, '');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.fileSizeBytes).toBe(0);
    expect(record.checksum).toBe(await calculateChecksum(filePath));
    expect(record.formatDetails).toBeUndefined();
    expect(record.formatError).toEqual({ format: 'csv', message: 'No columns to parse from file' });
  });

  it('describes a json array of records', async () => {
    const filePath = join(dir, 'b.json');
    await writeFile(filePath, JSON.stringify([{ x: 1 }, { x: 2 }]));

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toEqual({
      kind: 'json',
      jsonType: 'array',
      recordCount: 2,
      sampleKeys: ['x'],
    });
  });

  it('describes json arrays of scalars, objects and scalars', async () => {
    await writeFile(join(dir, 'numbers.json'), '[1, 2, 3]');
    await writeFile(join(dir, 'object.json'), '{"name": "demo", "items": []}');
    await writeFile(join(dir, 'scalar.json'), '42');

    const numbers = expectExtracted(await extractor.extract(join(dir, 'numbers.json')));
    const object = expectExtracted(await extractor.extract(join(dir, 'object.json')));
    const scalar = expectExtracted(await extractor.extract(join(dir, 'scalar.json')));

    expect(numbers.formatDetails).toEqual({
      kind: 'json',
      jsonType: 'array',
      recordCount: 3,
      sampleKeys: null,
    });
    expect(object.formatDetails).toEqual({ kind: 'json', jsonType: 'object', topLevelKeys: ['name', 'items'] });
    expect(scalar.formatDetails).toEqual({ kind: 'json', jsonType: 'scalar', typeName: 'integer' });
  });

  it('sets a json branch error for malformed json', async () => {
    const filePath = join(dir, 'broken.json');
    await writeFile(filePath, '{"unterminated": ');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toBeUndefined();
    expect(record.formatError?.format).toBe('json');
    expect(record.formatError?.message).toContain('broken.json');
  });

  it('describes every sheet of a workbook', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['id', 'label'],
        [1, 'first'],
        [2, 'second'],
        [3, 'third'],
      ]),
      'People'
    );
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['only', 'header']]), 'Headers');
    const filePath = join(dir, 'book.xlsx');
    await writeFile(filePath, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toEqual({
      kind: 'spreadsheet',
      sheetCount: 2,
      sheetNames: ['People', 'Headers'],
      sheets: {
        People: {
          rowCount: 3,
          columnCount: 2,
          columnNames: ['id', 'label'],
          columnTypes: { id: 'integer', label: 'string' },
        },
        Headers: {
          rowCount: 0,
          columnCount: 2,
          columnNames: ['only', 'header'],
          columnTypes: { only: 'empty', header: 'empty' },
        },
      },
    });
  });

  it('reads parquet counts and column types from the embedded schema', async () => {
    const filePath = join(dir, 'events.parquet');
    const schema = new parquet.ParquetSchema({
      id: { type: 'INT64' },
      name: { type: 'UTF8' },
    });
    const writer = await parquet.ParquetWriter.openFile(schema, filePath);
    await writer.appendRow({ id: 1, name: 'alpha' });
    await writer.appendRow({ id: 2, name: 'beta' });
    await writer.appendRow({ id: 3, name: 'gamma' });
    await writer.close();

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toEqual({
      kind: 'parquet',
      rowCount: 3,
      columnCount: 2,
      columnNames: ['id', 'name'],
      columnTypes: { id: 'INT64', name: 'UTF8' },
    });
  });

  it('sets a parquet branch error for a file that is not parquet', async () => {
    const filePath = join(dir, 'fake.parquet');
    await writeFile(filePath, 'definitely not parquet');

    const record = expectExtracted(await extractor.extract(filePath));

    expect(record.formatDetails).toBeUndefined();
    expect(record.formatError?.format).toBe('parquet');
  });

  it('returns an error record instead of throwing for a missing file', async () => {
    const filePath = join(dir, 'gone.csv');

    const record = await extractor.extract(filePath);

    expect(isExtractionFailure(record)).toBe(true);
    expect(record).toEqual({
      filePath,
      error: expect.stringContaining('ENOENT'),
      extractionTime: expect.any(String),
    });
  });
});
