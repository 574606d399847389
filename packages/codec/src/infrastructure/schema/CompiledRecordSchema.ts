import type { ErrorObject, ValidateFunction } from "ajv";
import { ValidationError, type FieldIssue } from "../../domain/errors/ValidationError";
import type { ICompiledSchema } from "../../domain/interfaces/ICompiledSchema";
import {
  describeType,
  fullName,
  type FieldSchema,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import { describeValue, isPlainObject } from "../../domain/schema/values";

function unescapePointer(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

export class CompiledRecordSchema<T> implements ICompiledSchema<T> {
  readonly fullName: string;
  private readonly fields: Map<string, FieldSchema>;

  constructor(
    readonly definition: RecordSchema,
    readonly fingerprint: number,
    private readonly validator: ValidateFunction
  ) {
    this.fullName = fullName(definition);
    this.fields = new Map(definition.fields.map((f) => [f.name, f]));
  }

  is(value: unknown): value is T {
    return this.validator(value);
  }

  validate(value: unknown): T {
    if (this.is(value)) return value;
    throw new ValidationError(this.definition.name, this.issues(value));
  }

  issues(value: unknown): FieldIssue[] {
    if (!isPlainObject(value)) {
      return [
        {
          field: "",
          expected: "object",
          actual: describeValue(value),
          message: `expected an object but got ${describeValue(value)}`,
        },
      ];
    }

    if (this.validator(value)) return [];

    const issues = new Map<string, FieldIssue>();
    for (const error of this.validator.errors ?? []) {
      const issue = this.toIssue(error, value);
      if (!issues.has(issue.field)) issues.set(issue.field, issue);
    }
    return [...issues.values()];
  }

  private toIssue(error: ErrorObject, record: Record<string, unknown>): FieldIssue {
    const { missingProperty, additionalProperty, allowedValues } = error.params;

    if (error.keyword === "required" && typeof missingProperty === "string") {
      const field = this.fields.get(missingProperty);
      return {
        field: missingProperty,
        expected: field ? describeType(field.type) : undefined,
        actual: "undefined",
        message: `field "${missingProperty}" is required`,
      };
    }

    if (
      error.keyword === "additionalProperties" &&
      error.instancePath === "" &&
      typeof additionalProperty === "string"
    ) {
      return {
        field: additionalProperty,
        message: `field "${additionalProperty}" is not declared by ${this.definition.name}`,
      };
    }

    const [, segment = ""] = error.instancePath.split("/");
    const name = unescapePointer(segment);
    const field = this.fields.get(name);
    const actual = describeValue(record[name]);

    if (error.keyword === "enum" && Array.isArray(allowedValues)) {
      return {
        field: name,
        expected: allowedValues.join(" | "),
        actual: typeof record[name] === "string" ? String(record[name]) : actual,
        message: `field "${name}" must be one of ${allowedValues.join(", ")}`,
      };
    }

    const expected = field ? describeType(field.type) : "undeclared";
    if (error.keyword === "pattern" || error.keyword === "propertyNames") {
      return {
        field: name,
        expected,
        actual: "malformed string",
        message: `field "${name}" contains an unpaired UTF-16 surrogate`,
      };
    }

    if (error.keyword === "minimum" || error.keyword === "maximum") {
      return {
        field: name,
        expected,
        actual: String(record[name]),
        message: `field "${name}" is out of range for ${expected}`,
      };
    }

    return {
      field: name,
      expected,
      actual,
      message: `field "${name}" expected ${expected} but got ${actual}`,
    };
  }
}
