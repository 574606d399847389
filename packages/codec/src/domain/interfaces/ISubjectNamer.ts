import type { IContract } from "./IContract";

/** `topic`: `<destination>-value`; `record`: `<namespace>.<name>`. */
export type SubjectStrategy = "topic" | "record";

export interface ISubjectNamer {
  subjectFor(contract: IContract<unknown>): string;
}
