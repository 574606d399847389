import type { ICompatibilityReport } from "../../domain/interfaces/ICompatibility";
import type { IContract } from "../../domain/interfaces/IContract";
import type { RecordSchema } from "../../domain/schema/RecordSchema";

export interface ISerde {
  /** Validates and encodes a record, registering its schema on first use. */
  serialize<T extends object>(contract: IContract<T>, value: T): Promise<Buffer>;
  /** Encodes a record under a schema id the caller already holds. */
  encode<T extends object>(contract: IContract<T>, schemaId: number, value: T): Buffer;
  deserialize<T extends object>(contract: IContract<T>, message: Buffer): Promise<Readonly<T>>;
  register<T>(contract: IContract<T>): Promise<number>;
  checkCompatibility<T>(
    contract: IContract<T>,
    candidate?: RecordSchema
  ): Promise<ICompatibilityReport>;
  /** Writes out all buffered log entries. */
  close(): void;
}
