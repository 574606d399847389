import { ContractError } from "./ContractError";

export class SchemaDefinitionError extends ContractError {
  public readonly problems: string[];

  constructor(problems: string[], name?: string, cause?: unknown) {
    super({
      code: "SCHEMA_DEFINITION",
      message: `Invalid schema definition${name ? ` ${name}` : ""}: ${problems.join("; ")}`,
      details: { name, problems },
      cause,
    });
    this.name = "SchemaDefinitionError";
    this.problems = problems;
  }
}
