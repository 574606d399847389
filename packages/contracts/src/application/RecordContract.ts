import {
  RecordBuilder,
  type BuildInput,
  type ICompiledSchema,
  type IContract,
  type Invariant,
} from "@sensorbus/codec";

export interface RecordContract<T extends object, D extends keyof T = never>
  extends IContract<T> {
  readonly builder: RecordBuilder<T, D>;
  build(fields: BuildInput<T, D>): Readonly<T>;
}

export function defineContract<T extends object, D extends keyof T = never>(
  name: string,
  destination: string,
  schema: ICompiledSchema<T>,
  invariants: Invariant<T>[] = []
): RecordContract<T, D> {
  const builder = new RecordBuilder<T, D>(schema, invariants);
  return {
    name,
    destination,
    schema,
    builder,
    build: (fields) => builder.build(fields),
  };
}
