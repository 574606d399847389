import Ajv, { type ValidateFunction } from "ajv";
import { fullName, type RecordSchema } from "../../domain/schema/RecordSchema";
import { fingerprint } from "./CanonicalForm";
import { JsonSchemaGenerator } from "./JsonSchemaGenerator";

export interface RecordValidator {
  fingerprint: number;
  validate: ValidateFunction;
}

/**
 * One ajv validator per record revision, keyed by full name and fingerprint.
 * Revisions that differ only in docs share a validator.
 */
export class ValidatorCache {
  private validators = new Map<string, RecordValidator>();
  private ajv = new Ajv({ allErrors: true, coerceTypes: false, useDefaults: false });

  constructor(private readonly generator = new JsonSchemaGenerator()) {}

  forSchema(schema: RecordSchema): RecordValidator {
    const print = fingerprint(schema);
    const key = `${fullName(schema)}@${print}`;

    const cached = this.validators.get(key);
    if (cached) return cached;

    const validator = {
      fingerprint: print,
      validate: this.ajv.compile(this.generator.generate(schema)),
    };
    this.validators.set(key, validator);
    return validator;
  }

  get size(): number {
    return this.validators.size;
  }
}
