import {
  isPrimitiveType,
  type FieldType,
  type PrimitiveType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import { varBigUintSize, varUintSize, zigZagInt, zigZagLong } from "../binary/varint";
import { FieldGuard } from "./FieldGuard";

/** Computes the exact payload size of a record so it is written in one allocation. */
export class BinaryRecordSizer {
  calculate(schema: RecordSchema, fields: ReadonlyMap<string, unknown>): number {
    const guard = new FieldGuard(schema.name);
    let total = 0;

    for (const field of schema.fields) {
      const value = fields.get(field.name);

      if (field.optional) {
        total += 1; // presence tag
        if (value === undefined) continue;
      } else if (value === undefined) {
        throw guard.missing(field);
      }

      total += this.getFieldSize(guard, field.name, field.type, value);
    }

    return total;
  }

  private getFieldSize(
    guard: FieldGuard,
    name: string,
    type: FieldType,
    value: unknown
  ): number {
    if (isPrimitiveType(type)) {
      return this.getPrimitiveSize(guard, name, type, value);
    }

    if (type.type === "enum") {
      return varUintSize(guard.symbolIndex(name, type.symbols, value));
    }

    const entries = guard.entries(name, type.values, value);
    let size = varUintSize(entries.length);
    for (const [key, item] of entries) {
      size += this.getStringSize(key);
      size += this.getPrimitiveSize(guard, `${name}.${key}`, type.values, item);
    }
    return size;
  }

  private getPrimitiveSize(
    guard: FieldGuard,
    name: string,
    type: PrimitiveType,
    value: unknown
  ): number {
    switch (type) {
      case "string":
        return this.getStringSize(guard.string(name, value));
      case "int":
        return varUintSize(zigZagInt(guard.number(name, type, value)));
      case "long":
        return varBigUintSize(zigZagLong(guard.number(name, type, value)));
      case "double":
        guard.number(name, type, value);
        return 8;
      case "boolean":
        guard.boolean(name, value);
        return 1;
    }
  }

  private getStringSize(value: string): number {
    const length = Buffer.byteLength(value, "utf8");
    return varUintSize(length) + length;
  }
}
