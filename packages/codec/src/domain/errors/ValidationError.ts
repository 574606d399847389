import { ContractError } from "./ContractError";

export interface FieldIssue {
  field: string;
  message: string;
  expected?: string;
  actual?: string;
}

export class ValidationError extends ContractError {
  public readonly record: string;
  public readonly issues: FieldIssue[];

  constructor(record: string, issues: FieldIssue[]) {
    super({
      code: "VALIDATION_ERROR",
      message: `Invalid ${record}: ${issues.map((i) => i.message).join("; ")}`,
      details: { record, issues },
    });
    this.name = "ValidationError";
    this.record = record;
    this.issues = issues;
  }

  /** First offending field. */
  get field(): string | undefined {
    return this.issues[0]?.field;
  }
}
