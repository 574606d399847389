import type { RecordSchema } from "../../domain/schema/RecordSchema";
import { BinaryWriter } from "../binary/BinaryWriter";
import { WireFrame } from "../binary/WireFrame";
import { BinaryRecordSerializer } from "./BinaryRecordSerializer";
import { BinaryRecordSizer } from "./BinaryRecordSizer";

export class BinaryRecordEncoder {
  constructor(
    private readonly sizer = new BinaryRecordSizer(),
    private readonly serializer = new BinaryRecordSerializer()
  ) {}

  encode(
    schema: RecordSchema,
    schemaId: number,
    fields: ReadonlyMap<string, unknown>
  ): Buffer {
    const size = WireFrame.HEADER_SIZE + this.sizer.calculate(schema, fields);
    const writer = BinaryWriter.alloc(size);

    WireFrame.writeHeader(writer, schemaId);
    this.serializer.write(schema, fields, writer);

    return writer.finish();
  }
}
