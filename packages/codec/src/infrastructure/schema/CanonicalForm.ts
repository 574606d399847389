import crc32 from "crc-32";
import {
  isPrimitiveType,
  type FieldSchema,
  type FieldType,
  type FieldValue,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";

function canonicalType(type: FieldType): unknown {
  if (isPrimitiveType(type)) return type;
  if (type.type === "enum") {
    return { type: "enum", name: type.name, symbols: type.symbols };
  }
  return { type: "map", values: type.values };
}

function canonicalDefault(value: FieldValue): unknown {
  if (typeof value !== "object") return value;
  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((key) => [key, value[key]])
  );
}

function canonicalField(field: FieldSchema): unknown {
  return {
    name: field.name,
    type: canonicalType(field.type),
    ...(field.optional ? { optional: true } : {}),
    ...(field.default !== undefined ? { default: canonicalDefault(field.default) } : {}),
  };
}

/** JSON of the parts of a schema that affect the wire format, in a fixed key order. */
export function canonicalForm(schema: RecordSchema): string {
  return JSON.stringify({
    type: "record",
    name: schema.name,
    ...(schema.namespace ? { namespace: schema.namespace } : {}),
    fields: schema.fields.map(canonicalField),
  });
}

/** Unsigned CRC-32 of the canonical form. */
export function fingerprint(schema: RecordSchema): number {
  return crc32.str(canonicalForm(schema)) >>> 0;
}
