import type { IContract } from "../../domain/interfaces/IContract";
import { BinaryRecordEncoder } from "../../infrastructure/binarySchema/BinaryRecordEncoder";
import type { RegisterContract } from "./RegisterContract";

export class EncodeRecord {
  constructor(
    private registrar: RegisterContract,
    private encoder = new BinaryRecordEncoder()
  ) {}

  /** Validates, registers the contract's schema when needed, then encodes. */
  async execute<T extends object>(contract: IContract<T>, value: T): Promise<Buffer> {
    const record = contract.schema.validate(value);
    const schemaId = await this.registrar.execute(contract);
    return this.write(contract, schemaId, record);
  }

  encode<T extends object>(contract: IContract<T>, schemaId: number, value: T): Buffer {
    return this.write(contract, schemaId, contract.schema.validate(value));
  }

  // `record` has already passed the contract's validator
  private write<T extends object>(contract: IContract<T>, schemaId: number, record: T): Buffer {
    return this.encoder.encode(
      contract.schema.definition,
      schemaId,
      new Map(Object.entries(record))
    );
  }
}
