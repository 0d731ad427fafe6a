declare module "parquetjs-lite" {
  export interface ParquetField {
    name: string;
    path: string[];
  }

  export class ParquetSchema {
    constructor(schema: Record<string, unknown>);
    fieldList: ParquetField[];
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }

  export class ParquetReader {
    static openFile(path: string): Promise<ParquetReader>;
    getSchema(): ParquetSchema;
    getCursor(): { next(): Promise<Record<string, unknown> | null> };
    close(): Promise<void>;
  }
}
