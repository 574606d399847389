import type { BinaryReader } from "../binary/BinaryReader";
import type { ResolutionPlan } from "../resolution/ResolutionPlan";
import { BinaryRecordDeserializer } from "./BinaryRecordDeserializer";

export class BinaryRecordDecoder {
  constructor(private readonly deserializer = new BinaryRecordDeserializer()) {}

  /** Decodes the payload that follows the wire header. */
  decode(plan: ResolutionPlan, reader: BinaryReader): Record<string, unknown> {
    const record = this.deserializer.read(plan, reader);
    reader.expectEnd();
    return record;
  }
}
