import { SchemaMismatchError } from "../../domain/errors/SchemaMismatchError";
import {
  describeType,
  isPrimitiveType,
  type EnumType,
  type FieldSchema,
  type FieldType,
  type PrimitiveType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import type {
  FieldStep,
  ResolutionPlan,
  ResolutionResult,
  SchemaViolation,
} from "./ResolutionPlan";

/**
 * Reconciles a writer schema against a reader schema.
 *
 * Reader fields take the writer's value by name (long may widen to double),
 * else the reader default, else stay absent when optional. Anything else is a
 * violation. Writer-only fields are read and dropped.
 */
export class ResolutionPlanner {
  plan(writer: RecordSchema, reader: RecordSchema): ResolutionResult {
    const violations: SchemaViolation[] = [];
    if (writer.name !== reader.name) {
      violations.push({
        field: "",
        message: `record ${reader.name} cannot read record ${writer.name}`,
      });
    }

    const readerFields = new Map(reader.fields.map((f) => [f.name, f]));
    const writerNames = new Set(writer.fields.map((f) => f.name));

    const steps = writer.fields.map((writerField): FieldStep => {
      const readerField = readerFields.get(writerField.name);
      if (!readerField) return { writerField };

      const violation = this.checkField(writerField, readerField);
      if (violation) {
        violations.push(violation);
        return { writerField };
      }

      return {
        writerField,
        target: readerField.name,
        fallback: readerField.optional ? undefined : readerField.default,
        convert: this.converterFor(writerField.type, readerField),
      };
    });

    const defaults: ResolutionPlan["defaults"] = [];
    for (const readerField of reader.fields) {
      if (writerNames.has(readerField.name)) continue;

      if (readerField.default !== undefined) {
        defaults.push({ name: readerField.name, value: readerField.default });
      } else if (!readerField.optional) {
        violations.push({
          field: readerField.name,
          message: `field "${readerField.name}" is required by the reader schema but missing from the writer schema and has no default`,
        });
      }
    }

    if (violations.length > 0) return { ok: false, violations };
    return { ok: true, plan: { writer, reader, steps, defaults } };
  }

  /** Like `plan`, but throws `SchemaMismatchError` for the first violation. */
  resolve(writer: RecordSchema, reader: RecordSchema, details?: object): ResolutionPlan {
    const result = this.plan(writer, reader);
    if (result.ok) return result.plan;

    const [first] = result.violations;
    throw new SchemaMismatchError(first.field, first.message, {
      writer: writer.name,
      reader: reader.name,
      violations: result.violations.map((v) => v.message),
      ...details,
    });
  }

  private checkField(
    writerField: FieldSchema,
    readerField: FieldSchema
  ): SchemaViolation | undefined {
    const name = readerField.name;

    if (!this.isReadableAs(writerField.type, readerField.type)) {
      return {
        field: name,
        message: `field "${name}" of type ${describeType(writerField.type)} cannot be read as ${describeType(readerField.type)}`,
      };
    }

    const missing = this.missingSymbols(writerField.type, readerField.type);
    if (missing.length > 0 && typeof readerField.default !== "string") {
      return {
        field: name,
        message: `field "${name}" has no default for symbols ${missing.join(", ")} missing from the reader enum`,
      };
    }

    if (writerField.optional && !readerField.optional && readerField.default === undefined) {
      return {
        field: name,
        message: `field "${name}" is optional in the writer schema but required in the reader schema`,
      };
    }

    return undefined;
  }

  private isReadableAs(writer: FieldType, reader: FieldType): boolean {
    if (isPrimitiveType(writer) || isPrimitiveType(reader)) {
      return (
        isPrimitiveType(writer) &&
        isPrimitiveType(reader) &&
        this.isPrimitiveReadableAs(writer, reader)
      );
    }

    if (writer.type === "enum" && reader.type === "enum") {
      return writer.name === reader.name;
    }

    if (writer.type === "map" && reader.type === "map") {
      return this.isPrimitiveReadableAs(writer.values, reader.values);
    }

    return false;
  }

  private isPrimitiveReadableAs(writer: PrimitiveType, reader: PrimitiveType): boolean {
    return writer === reader || (writer === "long" && reader === "double");
  }

  /** Writer enum symbols the reader enum does not declare. */
  private missingSymbols(writer: FieldType, reader: FieldType): string[] {
    if (isPrimitiveType(writer) || isPrimitiveType(reader)) return [];
    if (writer.type !== "enum" || reader.type !== "enum") return [];
    return writer.symbols.filter((symbol) => !reader.symbols.includes(symbol));
  }

  private converterFor(
    writer: FieldType,
    readerField: FieldSchema
  ): ((value: unknown) => unknown) | undefined {
    const fallback = readerField.default;
    if (typeof fallback !== "string") return undefined;
    if (this.missingSymbols(writer, readerField.type).length === 0) return undefined;

    const known = new Set(isEnum(readerField.type) ? readerField.type.symbols : []);
    return (value) => (typeof value === "string" && known.has(value) ? value : fallback);
  }
}

function isEnum(type: FieldType): type is EnumType {
  return !isPrimitiveType(type) && type.type === "enum";
}
