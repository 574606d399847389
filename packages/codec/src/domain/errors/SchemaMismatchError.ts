import { ContractError } from "./ContractError";

export class SchemaMismatchError extends ContractError {
  public readonly field: string;

  constructor(field: string, message: string, details?: object) {
    super({
      code: "SCHEMA_MISMATCH",
      message,
      details: { field, ...details },
    });
    this.name = "SchemaMismatchError";
    this.field = field;
  }
}
