import type { ICompatibilityReport } from "../../domain/interfaces/ICompatibility";
import type { IContract } from "../../domain/interfaces/IContract";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import type { ISubjectNamer } from "../../domain/interfaces/ISubjectNamer";
import type { RecordSchema } from "../../domain/schema/RecordSchema";

export class CheckContractCompatibility {
  constructor(
    private registry: ISchemaRegistryClient,
    private subjects: ISubjectNamer
  ) {}

  /** Checks `candidate` (the contract's own schema by default) against the latest registered one. */
  execute<T>(
    contract: IContract<T>,
    candidate: RecordSchema = contract.schema.definition
  ): Promise<ICompatibilityReport> {
    return this.registry.checkCompatibility(this.subjects.subjectFor(contract), candidate);
  }
}
