import { asContractError } from "../../domain/errors/ContractError";
import { SchemaMismatchError } from "../../domain/errors/SchemaMismatchError";
import { freezeRecord } from "../../domain/freezeRecord";
import type { IContract } from "../../domain/interfaces/IContract";
import type { ILogger } from "../../domain/interfaces/ILogger";
import type { ISchemaCache } from "../../domain/interfaces/ISchemaCache";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import type { RecordSchema } from "../../domain/schema/RecordSchema";
import { BinaryRecordDecoder } from "../../infrastructure/binarySchema/BinaryRecordDecoder";
import { WireFrame } from "../../infrastructure/binary/WireFrame";
import type { ResolutionPlan } from "../../infrastructure/resolution/ResolutionPlan";
import { ResolutionPlanner } from "../../infrastructure/resolution/ResolutionPlanner";

export class DecodeRecord {
  // keyed by writer schema id and reader fingerprint
  private plans = new Map<string, ResolutionPlan>();

  constructor(
    private registry: ISchemaRegistryClient,
    private cache: ISchemaCache,
    private logger: ILogger,
    private planner = new ResolutionPlanner(),
    private decoder = new BinaryRecordDecoder()
  ) {}

  async execute<T extends object>(
    contract: IContract<T>,
    message: Buffer
  ): Promise<Readonly<T>> {
    try {
      const { schemaId, reader } = WireFrame.readHeader(message);
      const writer = await this.cache.getSchema(schemaId, () => {
        this.logger.log("Schema cache miss", { schemaId }, "debug");
        return this.registry.lookup(schemaId);
      });

      const plan = this.planFor(schemaId, writer, contract);
      const record = this.decoder.decode(plan, reader);

      if (!contract.schema.is(record)) {
        const [issue] = contract.schema.issues(record);
        throw new SchemaMismatchError(
          issue?.field ?? "",
          `Decoded ${contract.name} does not satisfy the reader schema: ${issue?.message ?? "unknown issue"}`,
          { schemaId }
        );
      }
      return freezeRecord(record);
    } catch (err) {
      const error = asContractError(err);
      this.logger.log(
        "Message decoding failed",
        { destination: contract.destination, code: error.code, error: error.message },
        "warn"
      );
      throw error;
    }
  }

  private planFor<T>(
    schemaId: number,
    writer: RecordSchema,
    contract: IContract<T>
  ): ResolutionPlan {
    const key = `${schemaId}:${contract.schema.fingerprint}`;
    const cached = this.plans.get(key);
    if (cached) return cached;

    const plan = this.planner.resolve(writer, contract.schema.definition, { schemaId });
    this.plans.set(key, plan);
    return plan;
  }
}
