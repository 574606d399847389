import type { ISchemaCache } from "../../domain/interfaces/ISchemaCache";
import type { RecordSchema } from "../../domain/schema/RecordSchema";

/**
 * Caller-owned cache of writer schemas by id and of registered ids by key.
 * Concurrent lookups of one key share a single load; a failed load is
 * forgotten so the next call retries it.
 */
export class SchemaCache implements ISchemaCache {
  private schemas = new Map<number, Promise<RecordSchema>>();
  private ids = new Map<string, Promise<number>>();

  getSchema(
    schemaId: number,
    load: () => Promise<RecordSchema>
  ): Promise<RecordSchema> {
    return this.memoize(this.schemas, schemaId, load);
  }

  getId(key: string, load: () => Promise<number>): Promise<number> {
    return this.memoize(this.ids, key, load);
  }

  primeSchema(schemaId: number, schema: RecordSchema): void {
    this.schemas.set(schemaId, Promise.resolve(schema));
  }

  clear(): void {
    this.schemas.clear();
    this.ids.clear();
  }

  get size(): { schemas: number; ids: number } {
    return { schemas: this.schemas.size, ids: this.ids.size };
  }

  private memoize<K, V>(
    store: Map<K, Promise<V>>,
    key: K,
    load: () => Promise<V>
  ): Promise<V> {
    const cached = store.get(key);
    if (cached) return cached;

    const pending: Promise<V> = Promise.resolve()
      .then(load)
      .catch((err: unknown) => {
        if (store.get(key) === pending) store.delete(key);
        throw err;
      });

    store.set(key, pending);
    return pending;
  }
}
