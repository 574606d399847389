import { asContractError } from "../../domain/errors/ContractError";
import type { IContract } from "../../domain/interfaces/IContract";
import type { ILogger } from "../../domain/interfaces/ILogger";
import type { ISchemaCache } from "../../domain/interfaces/ISchemaCache";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import type { ISubjectNamer } from "../../domain/interfaces/ISubjectNamer";

export class RegisterContract {
  constructor(
    private registry: ISchemaRegistryClient,
    private cache: ISchemaCache,
    private subjects: ISubjectNamer,
    private logger: ILogger
  ) {}

  async execute<T>(contract: IContract<T>): Promise<number> {
    const subject = this.subjects.subjectFor(contract);
    const { definition, fingerprint, fullName } = contract.schema;

    let schemaId: number;
    try {
      schemaId = await this.cache.getId(`${subject}:${fingerprint}`, async () => {
        const id = await this.registry.register(subject, definition);
        this.logger.log("Schema is registered", { subject, schemaId: id, record: fullName });
        return id;
      });
    } catch (err) {
      const error = asContractError(err);
      this.logger.log(
        "Schema registration failed",
        { subject, record: fullName, code: error.code, error: error.message },
        "error"
      );
      throw error;
    }

    this.cache.primeSchema(schemaId, definition);
    return schemaId;
  }
}
