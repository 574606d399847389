import type { FieldSchema, FieldValue, RecordSchema } from "../../domain/schema/RecordSchema";

export interface SchemaViolation {
  field: string;
  message: string;
}

export interface FieldStep {
  /** Field as declared by the writer; drives how bytes are read. */
  writerField: FieldSchema;
  /** Reader field name, or undefined when the reader drops the field. */
  target?: string;
  /** Value used when an optional writer field is absent. */
  fallback?: FieldValue;
  /** Maps a decoded writer value onto the reader's type. */
  convert?: (value: unknown) => unknown;
}

export interface ResolutionPlan {
  writer: RecordSchema;
  reader: RecordSchema;
  /** One step per writer field, in writer order. */
  steps: FieldStep[];
  /** Reader fields the writer does not declare, filled from defaults. */
  defaults: Array<{ name: string; value: FieldValue }>;
}

export type ResolutionResult =
  | { ok: true; plan: ResolutionPlan }
  | { ok: false; violations: SchemaViolation[] };
