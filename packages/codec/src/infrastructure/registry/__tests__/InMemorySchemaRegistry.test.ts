import { describe, expect, it } from "vitest";
import { IncompatibleSchemaError } from "../../../domain/errors/IncompatibleSchemaError";
import { UnknownSchemaError } from "../../../domain/errors/UnknownSchemaError";
import type { FieldSchema, RecordSchema } from "../../../domain/schema/RecordSchema";
import { InMemorySchemaRegistry } from "../InMemorySchemaRegistry";

const sample = (...fields: FieldSchema[]): RecordSchema => ({
  type: "record",
  name: "Sample",
  fields,
});

const v1 = sample({ name: "a", type: "int" });
const v2 = sample({ name: "a", type: "int" }, { name: "b", type: "string", optional: true });
const breaking = sample({ name: "a", type: "int" }, { name: "c", type: "string" });

describe("InMemorySchemaRegistry", () => {
  it("assigns sequential ids and versions per subject", async () => {
    const registry = new InMemorySchemaRegistry();

    expect(await registry.register("samples-value", v1)).toBe(1);
    expect(await registry.register("samples-value", v2)).toBe(2);
    expect(registry.versions("samples-value")).toEqual([1, 2]);
    expect(registry.latest("samples-value")).toEqual({
      subject: "samples-value",
      version: 2,
      id: 2,
      schema: v2,
    });
  });

  it("returns the existing id when the same schema is registered again", async () => {
    const registry = new InMemorySchemaRegistry();
    const id = await registry.register("samples-value", v1);

    expect(await registry.register("samples-value", { ...v1, doc: "reworded" })).toBe(id);
    expect(registry.versions("samples-value")).toEqual([1]);
  });

  it("shares ids across subjects for identical schemas", async () => {
    const registry = new InMemorySchemaRegistry();

    const first = await registry.register("a-value", v1);
    const second = await registry.register("b-value", v1);

    expect(second).toBe(first);
    expect(registry.listSubjects()).toEqual(["a-value", "b-value"]);
  });

  it("refuses incompatible registrations under its mode", async () => {
    const registry = new InMemorySchemaRegistry("backward");
    await registry.register("samples-value", v1);

    await expect(registry.register("samples-value", breaking)).rejects.toBeInstanceOf(
      IncompatibleSchemaError
    );
    expect(registry.versions("samples-value")).toEqual([1]);
  });

  it("refuses dropping an enum symbol that stored data may hold", async () => {
    const level = (...symbols: string[]): RecordSchema =>
      sample({ name: "level", type: { type: "enum", name: "Level", symbols } });
    const registry = new InMemorySchemaRegistry("backward");
    await registry.register("levels-value", level("LOW", "HIGH", "CRITICAL"));

    await expect(registry.checkCompatibility("levels-value", level("LOW", "HIGH"))).resolves.toEqual({
      compatible: false,
      violations: [
        'backward: field "level" has no default for symbols CRITICAL missing from the reader enum',
      ],
    });
    await expect(registry.register("levels-value", level("LOW", "HIGH"))).rejects.toBeInstanceOf(
      IncompatibleSchemaError
    );
    expect(registry.versions("levels-value")).toEqual([1]);
  });

  it("refuses adding an enum symbol under forward mode", async () => {
    const level = (...symbols: string[]): RecordSchema =>
      sample({ name: "level", type: { type: "enum", name: "Level", symbols } });
    const registry = new InMemorySchemaRegistry("forward");
    await registry.register("levels-value", level("LOW", "HIGH"));

    await expect(
      registry.register("levels-value", level("LOW", "HIGH", "CRITICAL"))
    ).rejects.toBeInstanceOf(IncompatibleSchemaError);
  });

  it("accepts anything in mode none", async () => {
    const registry = new InMemorySchemaRegistry("none");
    await registry.register("samples-value", v1);

    await expect(registry.register("samples-value", breaking)).resolves.toBe(2);
  });

  it("looks up schemas by id", async () => {
    const registry = new InMemorySchemaRegistry();
    const id = await registry.register("samples-value", v1);

    await expect(registry.lookup(id)).resolves.toBe(v1);
    await expect(registry.lookup(42)).rejects.toThrow(new UnknownSchemaError(42));
  });

  it("checks candidates against the latest version", async () => {
    const registry = new InMemorySchemaRegistry();

    await expect(registry.checkCompatibility("samples-value", breaking)).resolves.toEqual({
      compatible: true,
      violations: [],
    });

    await registry.register("samples-value", v1);
    const report = await registry.checkCompatibility("samples-value", breaking);
    expect(report.compatible).toBe(false);
    expect(report.violations).toEqual([
      'backward: field "c" is required by the reader schema but missing from the writer schema and has no default',
    ]);
  });
});
