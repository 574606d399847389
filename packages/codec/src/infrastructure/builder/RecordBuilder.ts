import { ValidationError, type FieldIssue } from "../../domain/errors/ValidationError";
import type { ICompiledSchema } from "../../domain/interfaces/ICompiledSchema";
import { freezeRecord } from "../../domain/freezeRecord";
import { isPlainObject } from "../../domain/schema/values";

/** Input of a builder: every field of `T`, with the defaulted ones `D` optional. */
export type BuildInput<T, D extends keyof T = never> = Omit<T, D> & Partial<Pick<T, D>>;

export type Invariant<T> = (record: T) => FieldIssue | undefined;

export class RecordBuilder<T extends object, D extends keyof T = never> {
  constructor(
    private readonly schema: ICompiledSchema<T>,
    private readonly invariants: Invariant<T>[] = []
  ) {}

  build(fields: BuildInput<T, D>): Readonly<T> {
    return this.from(fields);
  }

  /** Builds from an untyped value, e.g. parsed JSON. */
  from(fields: unknown): Readonly<T> {
    const { definition } = this.schema;
    if (!isPlainObject(fields)) {
      throw new ValidationError(definition.name, this.schema.issues(fields));
    }

    const entries = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([name, value]): [string, unknown] => [name, isPlainObject(value) ? { ...value } : value]);
    for (const field of definition.fields) {
      if (field.default === undefined || fields[field.name] !== undefined) continue;
      const value = field.default;
      entries.push([field.name, typeof value === "object" ? { ...value } : value]);
    }

    const record = this.schema.validate(Object.fromEntries(entries));

    const issues = this.invariants.flatMap((check) => check(record) ?? []);
    if (issues.length > 0) {
      throw new ValidationError(definition.name, issues);
    }

    return freezeRecord(record);
  }
}
