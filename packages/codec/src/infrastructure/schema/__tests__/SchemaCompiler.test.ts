import { describe, expect, it } from "vitest";
import { SchemaDefinitionError } from "../../../domain/errors/SchemaDefinitionError";
import { ValidationError } from "../../../domain/errors/ValidationError";
import type { RecordSchema } from "../../../domain/schema/RecordSchema";
import { canonicalForm, fingerprint } from "../CanonicalForm";
import { SchemaCompiler } from "../SchemaCompiler";
import { ValidatorCache } from "../ValidatorCache";

const compiler = new SchemaCompiler();

const meterDocument = {
  type: "record",
  name: "Meter",
  namespace: "test.meters",
  doc: "A meter reading",
  fields: [
    { name: "id", type: "string", doc: "Meter id" },
    { name: "count", type: "int" },
    { name: "total", type: "long" },
    { name: "note", type: "string", optional: true },
    {
      name: "color",
      type: { type: "enum", name: "Color", symbols: ["RED", "GREEN"] },
      default: "RED",
    },
    { name: "labels", type: { type: "map", values: "string" }, optional: true },
  ],
};

interface Meter {
  id: string;
  count: number;
  total: number;
  note?: string;
  color: "RED" | "GREEN";
  labels?: Record<string, string>;
}

function definitionError(document: unknown): SchemaDefinitionError {
  try {
    compiler.parse(document);
  } catch (err) {
    if (err instanceof SchemaDefinitionError) return err;
    throw err;
  }
  throw new Error("expected the definition to be rejected");
}

describe("SchemaCompiler.parse", () => {
  it("accepts a well-formed definition", () => {
    const schema = compiler.parse(meterDocument);
    expect(schema.name).toBe("Meter");
    expect(schema.fields.map((f) => f.name)).toEqual([
      "id",
      "count",
      "total",
      "note",
      "color",
      "labels",
    ]);
  });

  it("rejects documents that do not follow the definition format", () => {
    const error = definitionError({ type: "record", name: "Meter" });
    expect(error.code).toBe("SCHEMA_DEFINITION");
    expect(error.message).toContain("Invalid schema definition Meter");
  });

  it("rejects unknown field types and bad identifiers", () => {
    expect(
      definitionError({ type: "record", name: "M", fields: [{ name: "a", type: "float" }] })
    ).toBeInstanceOf(SchemaDefinitionError);
    expect(
      definitionError({ type: "record", name: "M", fields: [{ name: "a-b", type: "int" }] })
    ).toBeInstanceOf(SchemaDefinitionError);
  });

  it("rejects repeated enum symbols", () => {
    const error = definitionError({
      type: "record",
      name: "M",
      fields: [{ name: "e", type: { type: "enum", name: "E", symbols: ["A", "A"] } }],
    });
    expect(error).toBeInstanceOf(SchemaDefinitionError);
  });

  it("lists every semantic problem", () => {
    const error = definitionError({
      type: "record",
      name: "M",
      fields: [
        { name: "a", type: "int" },
        { name: "a", type: "string" },
        { name: "n", type: "int", default: "x" },
        { name: "o", type: "double", optional: true, default: 1 },
      ],
    });
    expect(error.problems).toEqual([
      'field "a" is declared more than once',
      'default of field "n" expected int but got string',
      'field "o" cannot be both optional and defaulted',
    ]);
  });
});

describe("SchemaCompiler.compile", () => {
  const meter = compiler.load<Meter>(meterDocument);
  const valid = { id: "m-1", count: 3, total: 2 ** 40, color: "GREEN" };

  it("accepts values that match the schema", () => {
    expect(meter.is(valid)).toBe(true);
    expect(meter.validate(valid)).toBe(valid);
    expect(meter.fullName).toBe("test.meters.Meter");
  });

  it("reports a missing required field", () => {
    expect(meter.issues({ count: 3, total: 1, color: "RED" })).toEqual([
      {
        field: "id",
        expected: "string",
        actual: "undefined",
        message: 'field "id" is required',
      },
    ]);
  });

  it("reports type mismatches with expected and actual type", () => {
    expect(meter.issues({ ...valid, count: "3" })).toEqual([
      {
        field: "count",
        expected: "int",
        actual: "string",
        message: 'field "count" expected int but got string',
      },
    ]);
  });

  it("rejects null for optional fields", () => {
    expect(meter.issues({ ...valid, note: null })[0]?.message).toBe(
      'field "note" expected string but got null'
    );
  });

  it("rejects ints outside the 32-bit range", () => {
    expect(meter.issues({ ...valid, count: 2 ** 31 })[0]?.message).toBe(
      'field "count" is out of range for int'
    );
  });

  it("rejects undeclared enum symbols", () => {
    expect(meter.issues({ ...valid, color: "BLUE" })[0]?.message).toBe(
      'field "color" must be one of RED, GREEN'
    );
  });

  it("rejects undeclared fields", () => {
    expect(meter.issues({ ...valid, extra: 1 })[0]?.message).toBe(
      'field "extra" is not declared by Meter'
    );
  });

  it("rejects strings holding an unpaired surrogate", () => {
    expect(meter.issues({ ...valid, note: "n\uDBFF" })).toEqual([
      {
        field: "note",
        expected: "string",
        actual: "malformed string",
        message: 'field "note" contains an unpaired UTF-16 surrogate',
      },
    ]);
    expect(meter.issues({ ...valid, labels: { "\uD800": "x" } })[0]?.message).toBe(
      'field "labels" contains an unpaired UTF-16 surrogate'
    );
    expect(meter.is({ ...valid, note: "\u{1F4A1}" })).toBe(true);
  });

  it("throws ValidationError from validate", () => {
    expect(() => meter.validate({ ...valid, total: 1.5 })).toThrow(ValidationError);
    expect(() => meter.validate({ ...valid, total: 1.5 })).toThrow(
      'Invalid Meter: field "total" expected long but got number'
    );
  });

  it("describes values that are not objects", () => {
    expect(meter.issues("meter")).toEqual([
      {
        field: "",
        expected: "object",
        actual: "string",
        message: "expected an object but got string",
      },
    ]);
  });
});

describe("ValidatorCache", () => {
  it("shares a validator between revisions that differ only in docs", () => {
    const validators = new ValidatorCache();
    const withDocs = new SchemaCompiler(validators);
    const schema = withDocs.parse(meterDocument);

    const first = withDocs.compile<Meter>(schema);
    const second = withDocs.compile<Meter>({ ...schema, doc: "Reworded" });

    expect(second.fingerprint).toBe(first.fingerprint);
    expect(validators.size).toBe(1);
  });

  it("keeps records with the same fields but different names apart", () => {
    const validators = new ValidatorCache();
    const schema = new SchemaCompiler(validators).parse(meterDocument);

    validators.forSchema(schema);
    validators.forSchema({ ...schema, name: "Gauge" });

    expect(validators.size).toBe(2);
  });
});

describe("canonical form", () => {
  const ping: RecordSchema = {
    type: "record",
    name: "Ping",
    doc: "ignored",
    fields: [{ name: "n", type: "int", doc: "ignored too" }],
  };

  it("drops docs and fixes key order", () => {
    expect(canonicalForm(ping)).toBe(
      '{"type":"record","name":"Ping","fields":[{"name":"n","type":"int"}]}'
    );
  });

  it("fingerprints only what affects the wire format", () => {
    const redocumented: RecordSchema = { ...ping, doc: "changed" };
    const extended: RecordSchema = {
      ...ping,
      fields: [...ping.fields, { name: "m", type: "long", optional: true }],
    };
    expect(fingerprint(redocumented)).toBe(fingerprint(ping));
    expect(fingerprint(extended)).not.toBe(fingerprint(ping));
    expect(Number.isInteger(fingerprint(ping)) && fingerprint(ping) >= 0).toBe(true);
  });
});
