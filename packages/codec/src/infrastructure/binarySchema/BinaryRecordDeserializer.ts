import { MalformedMessageError } from "../../domain/errors/MalformedMessageError";
import {
  isPrimitiveType,
  type FieldType,
  type FieldValue,
  type PrimitiveType,
  type PrimitiveValue,
} from "../../domain/schema/RecordSchema";
import type { BinaryReader } from "../binary/BinaryReader";
import type { ResolutionPlan } from "../resolution/ResolutionPlan";

export class BinaryRecordDeserializer {
  read(plan: ResolutionPlan, reader: BinaryReader): Record<string, unknown> {
    const entries: Array<[string, unknown]> = [];

    for (const step of plan.steps) {
      const { writerField, target, fallback, convert } = step;

      if (writerField.optional && !this.readPresence(reader, writerField.name)) {
        if (target !== undefined && fallback !== undefined) {
          entries.push([target, this.copyDefault(fallback)]);
        }
        continue;
      }

      const value = this.readValue(reader, writerField.name, writerField.type);
      if (target === undefined) continue;
      entries.push([target, convert ? convert(value) : value]);
    }

    for (const { name, value } of plan.defaults) {
      entries.push([name, this.copyDefault(value)]);
    }

    return Object.fromEntries(entries);
  }

  private readPresence(reader: BinaryReader, name: string): boolean {
    const start = reader.position;
    const tag = reader.readUInt8(`presence tag of ${name}`);
    if (tag > 1) {
      throw new MalformedMessageError(
        `Invalid presence tag 0x${tag.toString(16)} for field ${name}`,
        start
      );
    }
    return tag === 1;
  }

  private readValue(reader: BinaryReader, name: string, type: FieldType): unknown {
    if (isPrimitiveType(type)) return this.readPrimitive(reader, name, type);

    if (type.type === "enum") {
      const start = reader.position;
      const index = reader.readVarUint(name);
      const symbol = type.symbols[index];
      if (symbol === undefined) {
        throw new MalformedMessageError(
          `Enum index ${index} of field ${name} is outside ${type.name}`,
          start
        );
      }
      return symbol;
    }

    const count = reader.readVarUint(`${name} entry count`);
    const entries = new Map<string, PrimitiveValue>();
    for (let i = 0; i < count; i++) {
      const start = reader.position;
      const key = reader.readString(`${name} key`);
      if (entries.has(key)) {
        throw new MalformedMessageError(`Duplicate key "${key}" in field ${name}`, start);
      }
      entries.set(key, this.readPrimitive(reader, `${name}.${key}`, type.values));
    }
    return Object.fromEntries(entries);
  }

  private readPrimitive(
    reader: BinaryReader,
    name: string,
    type: PrimitiveType
  ): PrimitiveValue {
    switch (type) {
      case "string":
        return reader.readString(name);
      case "int":
        return reader.readInt(name);
      case "long":
        return reader.readLong(name);
      case "double":
        return reader.readDouble(name);
      case "boolean":
        return reader.readBoolean(name);
    }
  }

  private copyDefault(value: FieldValue): FieldValue {
    return typeof value === "object" ? { ...value } : value;
  }
}
