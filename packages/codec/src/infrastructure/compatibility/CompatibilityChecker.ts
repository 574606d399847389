import type {
  CompatibilityMode,
  ICompatibilityReport,
} from "../../domain/interfaces/ICompatibility";
import type { RecordSchema } from "../../domain/schema/RecordSchema";
import { ResolutionPlanner } from "../resolution/ResolutionPlanner";

/**
 * Static compatibility between two revisions of a record, using the same
 * resolution rule the decoder applies.
 *
 * backward: the candidate reads data written with the previous schema.
 * forward: the previous schema reads data written with the candidate.
 */
export class CompatibilityChecker {
  constructor(private readonly planner = new ResolutionPlanner()) {}

  check(
    previous: RecordSchema,
    candidate: RecordSchema,
    mode: CompatibilityMode
  ): ICompatibilityReport {
    const violations: string[] = [];

    if (mode === "backward" || mode === "full") {
      violations.push(...this.collect("backward", previous, candidate));
    }
    if (mode === "forward" || mode === "full") {
      violations.push(...this.collect("forward", candidate, previous));
    }

    return { compatible: violations.length === 0, violations };
  }

  private collect(
    direction: "backward" | "forward",
    writer: RecordSchema,
    reader: RecordSchema
  ): string[] {
    const result = this.planner.plan(writer, reader);
    if (result.ok) return [];
    return result.violations.map((v) => `${direction}: ${v.message}`);
  }
}
