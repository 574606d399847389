import { MalformedMessageError } from "../../domain/errors/MalformedMessageError";
import { BinaryReader } from "./BinaryReader";
import type { BinaryWriter } from "./BinaryWriter";

/** `[magic u8][schema id u32 BE][payload]` */
export class WireFrame {
  static readonly MAGIC_BYTE = 0x00;
  static readonly HEADER_SIZE = 5;

  static writeHeader(writer: BinaryWriter, schemaId: number): void {
    writer.writeUInt8(WireFrame.MAGIC_BYTE);
    writer.writeUInt32BE(schemaId);
  }

  static readHeader(buffer: Buffer): { schemaId: number; reader: BinaryReader } {
    if (buffer.length < WireFrame.HEADER_SIZE) {
      throw new MalformedMessageError(
        `Message of ${buffer.length} bytes is shorter than the ${WireFrame.HEADER_SIZE} byte header`,
        0
      );
    }

    const reader = new BinaryReader(buffer);
    const magic = reader.readUInt8("magic byte");
    if (magic !== WireFrame.MAGIC_BYTE) {
      throw new MalformedMessageError(
        `Unknown magic byte 0x${magic.toString(16).padStart(2, "0")}`,
        0
      );
    }

    const schemaId = reader.readUInt32BE("schema id");
    return { schemaId, reader };
  }
}
