import {
  isPrimitiveType,
  type EnumType,
  type FieldSchema,
  type FieldType,
  type FieldValue,
  type MapType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import { isPlainObject } from "../../domain/schema/values";

/** A primitive, an inline named type, or a reference to one declared earlier. */
export type AvroFieldType = string | EnumType | MapType;

export interface AvroField {
  name: string;
  type: AvroFieldType | ["null", AvroFieldType];
  doc?: string;
  default?: FieldValue | null;
}

export interface AvroRecord {
  type: "record";
  name: string;
  namespace?: string;
  doc?: string;
  fields: AvroField[];
}

/**
 * Translates record schemas to the Avro documents a Confluent registry
 * expects, and back. Optional fields travel as `["null", T]` unions with a
 * null default; an enum declared twice is written once and then referenced
 * by name.
 */
export class AvroSchemaMapper {
  toAvro(schema: RecordSchema): AvroRecord {
    const declared = new Set<string>();
    return {
      type: "record",
      name: schema.name,
      ...(schema.namespace === undefined ? {} : { namespace: schema.namespace }),
      ...(schema.doc === undefined ? {} : { doc: schema.doc }),
      fields: schema.fields.map((field) => this.fieldToAvro(field, declared)),
    };
  }

  /**
   * Rewrites an Avro document into record-schema shape. Anything it does not
   * recognise passes through untouched for the schema compiler to reject.
   */
  fromAvro(document: unknown): unknown {
    if (!isPlainObject(document) || !Array.isArray(document.fields)) return document;

    const enums = new Map<string, EnumType>();
    const fields: unknown[] = document.fields;
    return {
      ...document,
      fields: fields.map((field) => this.fieldFromAvro(field, enums)),
    };
  }

  private fieldToAvro(field: FieldSchema, declared: Set<string>): AvroField {
    const type = this.typeToAvro(field.type, declared);
    const avro: AvroField = {
      name: field.name,
      type: field.optional ? ["null", type] : type,
    };

    if (field.doc !== undefined) avro.doc = field.doc;
    if (field.optional) avro.default = null;
    else if (field.default !== undefined) avro.default = field.default;
    return avro;
  }

  private typeToAvro(type: FieldType, declared: Set<string>): AvroFieldType {
    if (isPrimitiveType(type) || type.type === "map") return type;
    if (declared.has(type.name)) return type.name;

    declared.add(type.name);
    return type;
  }

  private fieldFromAvro(field: unknown, enums: Map<string, EnumType>): unknown {
    if (!isPlainObject(field)) return field;

    const { type, default: fallback, ...rest } = field;
    const branches: unknown[] = Array.isArray(type) ? type : [];
    if (branches.length === 2 && branches[0] === "null") {
      return { ...rest, type: this.typeFromAvro(branches[1], enums), optional: true };
    }

    const resolved = this.typeFromAvro(type, enums);
    return fallback === undefined
      ? { ...rest, type: resolved }
      : { ...rest, type: resolved, default: fallback };
  }

  private typeFromAvro(type: unknown, enums: Map<string, EnumType>): unknown {
    if (typeof type === "string") {
      return enums.get(type) ?? enums.get(type.slice(type.lastIndexOf(".") + 1)) ?? type;
    }
    if (!isPlainObject(type) || type.type !== "enum") return type;

    const { name, symbols, doc } = type;
    if (typeof name !== "string" || !Array.isArray(symbols)) return type;
    if (!symbols.every((symbol): symbol is string => typeof symbol === "string")) return type;

    // Avro-only attributes such as aliases or a symbol default are dropped
    const declared: EnumType = {
      type: "enum",
      name,
      symbols,
      ...(typeof doc === "string" ? { doc } : {}),
    };
    enums.set(name, declared);
    return declared;
  }
}
