import { ValidationError } from "../../domain/errors/ValidationError";
import {
  describeType,
  type FieldSchema,
  type FieldType,
  type PrimitiveType,
  type PrimitiveValue,
} from "../../domain/schema/RecordSchema";
import {
  describeValue,
  hasLoneSurrogate,
  isPlainObject,
  isWellFormed,
  matchesType,
} from "../../domain/schema/values";

/**
 * Narrows field values during encoding. Values normally arrive validated;
 * the guard keeps the sizer and serializer honest when they do not.
 */
export class FieldGuard {
  constructor(private readonly record: string) {}

  missing(field: FieldSchema): ValidationError {
    return new ValidationError(this.record, [
      {
        field: field.name,
        expected: describeType(field.type),
        actual: "undefined",
        message: `field "${field.name}" is required`,
      },
    ]);
  }

  check(field: string, type: FieldType, value: unknown): void {
    if (matchesType(type, value)) return;

    const textual = type === "string" || (typeof type === "object" && type.type === "map");
    if (textual && hasLoneSurrogate(value)) {
      throw new ValidationError(this.record, [
        {
          field,
          expected: describeType(type),
          actual: "malformed string",
          message: `field "${field}" contains an unpaired UTF-16 surrogate`,
        },
      ]);
    }

    throw new ValidationError(this.record, [
      {
        field,
        expected: describeType(type),
        actual: describeValue(value),
        message: `field "${field}" expected ${describeType(type)} but got ${describeValue(value)}`,
      },
    ]);
  }

  string(field: string, value: unknown): string {
    if (typeof value === "string" && isWellFormed(value)) return value;
    this.check(field, "string", value);
    return String(value);
  }

  number(field: string, type: "int" | "long" | "double", value: unknown): number {
    this.check(field, type, value);
    return Number(value);
  }

  boolean(field: string, value: unknown): boolean {
    if (typeof value === "boolean") return value;
    this.check(field, "boolean", value);
    return Boolean(value);
  }

  symbolIndex(field: string, symbols: string[], value: unknown): number {
    const index = typeof value === "string" ? symbols.indexOf(value) : -1;
    if (index === -1) {
      throw new ValidationError(this.record, [
        {
          field,
          expected: symbols.join(" | "),
          actual: typeof value === "string" ? value : describeValue(value),
          message: `field "${field}" must be one of ${symbols.join(", ")}`,
        },
      ]);
    }
    return index;
  }

  entries(
    field: string,
    values: PrimitiveType,
    value: unknown
  ): Array<[string, PrimitiveValue]> {
    this.check(field, { type: "map", values }, value);
    if (!isPlainObject(value)) return [];

    const entries: Array<[string, PrimitiveValue]> = [];
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") {
        entries.push([key, item]);
      }
    }
    return entries;
  }
}
