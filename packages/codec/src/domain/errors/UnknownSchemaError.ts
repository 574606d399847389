import { ContractError } from "./ContractError";

export class UnknownSchemaError extends ContractError {
  public readonly schemaId: number;

  constructor(schemaId: number, cause?: unknown) {
    super({
      code: "UNKNOWN_SCHEMA",
      message: `Schema ${schemaId} is not known to the registry`,
      details: { schemaId },
      cause,
    });
    this.name = "UnknownSchemaError";
    this.schemaId = schemaId;
  }
}
