import { readJson } from 'fs-extra/esm';
import type { JsonDetails } from '../types';
import type { FormatExtractor } from './format-extractor';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeScalar(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  return typeof value;
}

export class JsonFormatExtractor implements FormatExtractor {
  id = 'json' as const;
  extensions = ['.json'] as const;

  async extract(filePath: string): Promise<JsonDetails> {
    const data: unknown = await readJson(filePath);

    if (Array.isArray(data)) {
      const first: unknown = data[0];
      return {
        kind: 'json',
        jsonType: 'array',
        recordCount: data.length,
        sampleKeys: isPlainRecord(first) ? Object.keys(first) : null,
      };
    }

    if (isPlainRecord(data)) {
      return { kind: 'json', jsonType: 'object', topLevelKeys: Object.keys(data) };
    }

    return { kind: 'json', jsonType: 'scalar', typeName: describeScalar(data) };
  }
}
