import type { FieldIssue } from "../errors/ValidationError";
import type { RecordSchema } from "../schema/RecordSchema";

export interface ICompiledSchema<T> {
  readonly definition: RecordSchema;
  readonly fullName: string;
  readonly fingerprint: number;
  /** Returns the value typed as `T` or throws `ValidationError`. */
  validate(value: unknown): T;
  is(value: unknown): value is T;
  issues(value: unknown): FieldIssue[];
}
