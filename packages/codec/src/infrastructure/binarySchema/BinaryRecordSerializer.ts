import {
  isPrimitiveType,
  type FieldType,
  type PrimitiveType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import type { BinaryWriter } from "../binary/BinaryWriter";
import { FieldGuard } from "./FieldGuard";

export class BinaryRecordSerializer {
  write(
    schema: RecordSchema,
    fields: ReadonlyMap<string, unknown>,
    writer: BinaryWriter
  ): void {
    const guard = new FieldGuard(schema.name);

    for (const field of schema.fields) {
      const value = fields.get(field.name);

      if (field.optional) {
        writer.writeUInt8(value === undefined ? 0x00 : 0x01);
        if (value === undefined) continue;
      } else if (value === undefined) {
        throw guard.missing(field);
      }

      this.writeField(writer, guard, field.name, field.type, value);
    }
  }

  private writeField(
    writer: BinaryWriter,
    guard: FieldGuard,
    name: string,
    type: FieldType,
    value: unknown
  ): void {
    if (isPrimitiveType(type)) {
      this.writePrimitive(writer, guard, name, type, value);
      return;
    }

    if (type.type === "enum") {
      writer.writeVarUint(guard.symbolIndex(name, type.symbols, value));
      return;
    }

    const entries = guard.entries(name, type.values, value);
    writer.writeVarUint(entries.length);
    for (const [key, item] of entries) {
      writer.writeString(key);
      this.writePrimitive(writer, guard, `${name}.${key}`, type.values, item);
    }
  }

  private writePrimitive(
    writer: BinaryWriter,
    guard: FieldGuard,
    name: string,
    type: PrimitiveType,
    value: unknown
  ): void {
    switch (type) {
      case "string":
        writer.writeString(guard.string(name, value));
        return;
      case "int":
        writer.writeInt(guard.number(name, type, value));
        return;
      case "long":
        writer.writeLong(guard.number(name, type, value));
        return;
      case "double":
        writer.writeDouble(guard.number(name, type, value));
        return;
      case "boolean":
        writer.writeBoolean(guard.boolean(name, value));
        return;
    }
  }
}
