import { ContractError } from "./ContractError";

export class IncompatibleSchemaError extends ContractError {
  public readonly subject: string;
  public readonly violations: string[];

  constructor(subject: string, violations: string[]) {
    super({
      code: "INCOMPATIBLE_SCHEMA",
      message: `Schema for ${subject} is incompatible: ${violations.join("; ")}`,
      details: { subject, violations },
    });
    this.name = "IncompatibleSchemaError";
    this.subject = subject;
    this.violations = violations;
  }
}
