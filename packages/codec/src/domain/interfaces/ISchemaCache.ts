import type { RecordSchema } from "../schema/RecordSchema";

export interface ISchemaCache {
  getSchema(
    schemaId: number,
    load: () => Promise<RecordSchema>
  ): Promise<RecordSchema>;
  getId(key: string, load: () => Promise<number>): Promise<number>;
  primeSchema(schemaId: number, schema: RecordSchema): void;
  clear(): void;
}
