import { IncompatibleSchemaError } from "../../domain/errors/IncompatibleSchemaError";
import { UnknownSchemaError } from "../../domain/errors/UnknownSchemaError";
import type {
  CompatibilityMode,
  ICompatibilityReport,
} from "../../domain/interfaces/ICompatibility";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import type { RecordSchema } from "../../domain/schema/RecordSchema";
import { CompatibilityChecker } from "../compatibility/CompatibilityChecker";
import { fingerprint } from "../schema/CanonicalForm";

export interface SubjectVersion {
  subject: string;
  version: number;
  id: number;
  schema: RecordSchema;
}

/**
 * Process-local registry with the same contract as the remote one. Ids are
 * global and sequential from 1; identical schemas share an id across subjects.
 */
export class InMemorySchemaRegistry implements ISchemaRegistryClient {
  private nextId = 1;
  private schemas = new Map<number, RecordSchema>();
  private idsByFingerprint = new Map<number, number>();
  private subjects = new Map<string, Array<SubjectVersion & { fingerprint: number }>>();

  constructor(
    private readonly mode: CompatibilityMode = "backward",
    private readonly checker = new CompatibilityChecker()
  ) {}

  async register(subject: string, definition: RecordSchema): Promise<number> {
    const print = fingerprint(definition);
    const versions = this.subjects.get(subject) ?? [];

    const existing = versions.find((v) => v.fingerprint === print);
    if (existing) return existing.id;

    const latest = versions.at(-1);
    if (latest && this.mode !== "none") {
      const report = this.checker.check(latest.schema, definition, this.mode);
      if (!report.compatible) {
        throw new IncompatibleSchemaError(subject, report.violations);
      }
    }

    let id = this.idsByFingerprint.get(print);
    if (id === undefined) {
      id = this.nextId++;
      this.idsByFingerprint.set(print, id);
      this.schemas.set(id, definition);
    }

    versions.push({
      subject,
      version: (latest?.version ?? 0) + 1,
      id,
      schema: definition,
      fingerprint: print,
    });
    this.subjects.set(subject, versions);

    return id;
  }

  async lookup(schemaId: number): Promise<RecordSchema> {
    const schema = this.schemas.get(schemaId);
    if (!schema) throw new UnknownSchemaError(schemaId);
    return schema;
  }

  async checkCompatibility(
    subject: string,
    candidate: RecordSchema
  ): Promise<ICompatibilityReport> {
    const latest = this.subjects.get(subject)?.at(-1);
    if (!latest) return { compatible: true, violations: [] };
    return this.checker.check(latest.schema, candidate, this.mode);
  }

  latest(subject: string): SubjectVersion | undefined {
    const latest = this.subjects.get(subject)?.at(-1);
    if (!latest) return undefined;
    const { fingerprint: _, ...version } = latest;
    return version;
  }

  versions(subject: string): number[] {
    return (this.subjects.get(subject) ?? []).map((v) => v.version);
  }

  listSubjects(): string[] {
    return [...this.subjects.keys()];
  }
}
