import type { ICompiledSchema } from "./ICompiledSchema";

/** A record type bound to the destination its messages are published to. */
export interface IContract<T> {
  readonly name: string;
  readonly destination: string;
  readonly schema: ICompiledSchema<T>;
}
