import type { IContract } from "../../domain/interfaces/IContract";
import type { ISubjectNamer, SubjectStrategy } from "../../domain/interfaces/ISubjectNamer";

export class SubjectNamer implements ISubjectNamer {
  constructor(private readonly strategy: SubjectStrategy = "topic") {}

  subjectFor(contract: IContract<unknown>): string {
    if (this.strategy === "record") return contract.schema.fullName;
    return `${contract.destination}-value`;
  }
}
