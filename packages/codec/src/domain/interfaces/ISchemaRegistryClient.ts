import type { RecordSchema } from "../schema/RecordSchema";
import type { ICompatibilityReport } from "./ICompatibility";

export interface ISchemaRegistryClient {
  register(subject: string, definition: RecordSchema): Promise<number>;
  lookup(schemaId: number): Promise<RecordSchema>;
  checkCompatibility(
    subject: string,
    candidate: RecordSchema
  ): Promise<ICompatibilityReport>;
}
