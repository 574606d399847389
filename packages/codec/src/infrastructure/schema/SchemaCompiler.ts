import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import recordSchemaDefinition from "../../../schemas/record-schema.json";
import { SchemaDefinitionError } from "../../domain/errors/SchemaDefinitionError";
import type { ICompiledSchema } from "../../domain/interfaces/ICompiledSchema";
import {
  describeType,
  isPrimitiveType,
  type EnumType,
  type RecordSchema,
} from "../../domain/schema/RecordSchema";
import { describeValue, isPlainObject, matchesType } from "../../domain/schema/values";
import { CompiledRecordSchema } from "./CompiledRecordSchema";
import { ValidatorCache } from "./ValidatorCache";

/**
 * Turns schema definition documents into record schemas and record schemas
 * into compiled validators.
 */
export class SchemaCompiler {
  private readonly validateDocument: ValidateFunction<RecordSchema>;

  constructor(private readonly validators = new ValidatorCache()) {
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    this.validateDocument = ajv.compile<RecordSchema>(recordSchemaDefinition);
  }

  parse(document: unknown): RecordSchema {
    const name =
      isPlainObject(document) && typeof document.name === "string"
        ? document.name
        : undefined;

    if (!this.validateDocument(document)) {
      const problems = (this.validateDocument.errors ?? []).map(formatError);
      throw new SchemaDefinitionError(problems, name);
    }

    const problems = this.findProblems(document);
    if (problems.length > 0) {
      throw new SchemaDefinitionError(problems, name);
    }

    return document;
  }

  compile<T>(schema: RecordSchema): ICompiledSchema<T> {
    const { fingerprint, validate } = this.validators.forSchema(schema);
    return new CompiledRecordSchema<T>(schema, fingerprint, validate);
  }

  /** Parses and compiles a definition document in one step. */
  load<T>(document: unknown): ICompiledSchema<T> {
    return this.compile<T>(this.parse(document));
  }

  private findProblems(schema: RecordSchema): string[] {
    const problems: string[] = [];
    const seen = new Set<string>();
    const enums = new Map<string, EnumType>();

    for (const field of schema.fields) {
      if (seen.has(field.name)) {
        problems.push(`field "${field.name}" is declared more than once`);
      }
      seen.add(field.name);

      const { type } = field;
      if (!isPrimitiveType(type) && type.type === "enum") {
        const previous = enums.get(type.name);
        if (previous && previous.symbols.join() !== type.symbols.join()) {
          problems.push(`enum ${type.name} is declared twice with different symbols`);
        }
        enums.set(type.name, type);
      }

      if (field.default === undefined) continue;

      if (field.optional) {
        problems.push(`field "${field.name}" cannot be both optional and defaulted`);
      } else if (!matchesType(type, field.default)) {
        problems.push(
          `default of field "${field.name}" expected ${describeType(type)} but got ${describeValue(field.default)}`
        );
      }
    }

    return problems;
  }
}

function formatError(error: ErrorObject): string {
  return `${error.instancePath || "/"} ${error.message ?? error.keyword}`;
}
