import type { SchemaObject } from "ajv";
import {
  INT_MAX,
  INT_MIN,
  isPrimitiveType,
  type FieldType,
  type PrimitiveType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import { WELL_FORMED_PATTERN } from "../../domain/schema/values";

/** Builds the JSON Schema that ajv validates record values against. */
export class JsonSchemaGenerator {
  generate(schema: RecordSchema): SchemaObject {
    const properties: Record<string, SchemaObject> = {};
    const required: string[] = [];

    for (const field of schema.fields) {
      properties[field.name] = this.forType(field.type);
      if (!field.optional) required.push(field.name);
    }

    return {
      type: "object",
      properties,
      required,
      additionalProperties: false,
    };
  }

  private forType(type: FieldType): SchemaObject {
    if (isPrimitiveType(type)) return this.forPrimitive(type);

    if (type.type === "enum") {
      return { type: "string", enum: type.symbols };
    }

    return {
      type: "object",
      propertyNames: { type: "string", pattern: WELL_FORMED_PATTERN },
      additionalProperties: this.forPrimitive(type.values),
    };
  }

  private forPrimitive(type: PrimitiveType): SchemaObject {
    switch (type) {
      case "int":
        return { type: "integer", minimum: INT_MIN, maximum: INT_MAX };
      case "long":
        return {
          type: "integer",
          minimum: Number.MIN_SAFE_INTEGER,
          maximum: Number.MAX_SAFE_INTEGER,
        };
      case "double":
        return { type: "number" };
      case "string":
        return { type, pattern: WELL_FORMED_PATTERN };
      default:
        return { type };
    }
  }
}
