import type { ICompatibilityReport } from "../domain/interfaces/ICompatibility";
import type { IContract } from "../domain/interfaces/IContract";
import type { ILogger } from "../domain/interfaces/ILogger";
import type { RecordSchema } from "../domain/schema/RecordSchema";
import type { ISerde } from "./interfaces/ISerde";
import type { CheckContractCompatibility } from "./usecases/CheckContractCompatibility";
import type { DecodeRecord } from "./usecases/DecodeRecord";
import type { EncodeRecord } from "./usecases/EncodeRecord";
import type { RegisterContract } from "./usecases/RegisterContract";

export class Serde implements ISerde {
  constructor(
    private encoder: EncodeRecord,
    private decoder: DecodeRecord,
    private registrar: RegisterContract,
    private compatibility: CheckContractCompatibility,
    private loggers: ILogger[] = []
  ) {}

  async serialize<T extends object>(contract: IContract<T>, value: T): Promise<Buffer> {
    return this.encoder.execute(contract, value);
  }

  encode<T extends object>(contract: IContract<T>, schemaId: number, value: T): Buffer {
    return this.encoder.encode(contract, schemaId, value);
  }

  async deserialize<T extends object>(
    contract: IContract<T>,
    message: Buffer
  ): Promise<Readonly<T>> {
    return this.decoder.execute(contract, message);
  }

  async register<T>(contract: IContract<T>): Promise<number> {
    return this.registrar.execute(contract);
  }

  async checkCompatibility<T>(
    contract: IContract<T>,
    candidate?: RecordSchema
  ): Promise<ICompatibilityReport> {
    return this.compatibility.execute(contract, candidate);
  }

  close(): void {
    this.loggers.forEach((logger) => logger.drain());
  }
}
