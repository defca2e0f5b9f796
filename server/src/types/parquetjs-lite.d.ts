declare module 'parquetjs-lite' {
  export interface ParquetFieldDefinition {
    type?: string;
    optional?: boolean;
    repeated?: boolean;
    fields?: Record<string, ParquetFieldDefinition>;
  }

  export interface ParquetField {
    name: string;
    path: string[];
    primitiveType?: string;
    originalType?: string;
    repetitionType: string;
    isNested?: boolean;
    fieldCount?: number;
    fields?: Record<string, ParquetField>;
  }

  export class ParquetSchema {
    constructor(schema: Record<string, ParquetFieldDefinition>);
    fields: Record<string, ParquetField>;
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }

  export class ParquetReader {
    static openFile(path: string): Promise<ParquetReader>;
    getRowCount(): number | { valueOf(): number };
    getSchema(): ParquetSchema;
    close(): Promise<void>;
  }

  const parquet: {
    ParquetSchema: typeof ParquetSchema;
    ParquetWriter: typeof ParquetWriter;
    ParquetReader: typeof ParquetReader;
  };

  export default parquet;
}
