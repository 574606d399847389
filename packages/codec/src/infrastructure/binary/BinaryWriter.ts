import { zigZagInt, zigZagLong } from "./varint";

/** Writes into a buffer allocated up front with the exact message size. */
export class BinaryWriter {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  static alloc(size: number): BinaryWriter {
    return new BinaryWriter(Buffer.allocUnsafe(size));
  }

  get position(): number {
    return this.offset;
  }

  writeUInt8(value: number): void {
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeUInt32BE(value: number): void {
    this.buffer.writeUInt32BE(value, this.offset);
    this.offset += 4;
  }

  writeVarUint(value: number): void {
    while (value > 0x7f) {
      this.writeUInt8((value & 0x7f) | 0x80);
      value >>>= 7;
    }
    this.writeUInt8(value);
  }

  writeVarBigUint(value: bigint): void {
    while (value > 0x7fn) {
      this.writeUInt8(Number(value & 0x7fn) | 0x80);
      value >>= 7n;
    }
    this.writeUInt8(Number(value));
  }

  writeInt(value: number): void {
    this.writeVarUint(zigZagInt(value));
  }

  writeLong(value: number): void {
    this.writeVarBigUint(zigZagLong(value));
  }

  writeDouble(value: number): void {
    this.buffer.writeDoubleBE(value, this.offset);
    this.offset += 8;
  }

  writeBoolean(value: boolean): void {
    this.writeUInt8(value ? 1 : 0);
  }

  writeString(value: string): void {
    const length = Buffer.byteLength(value, "utf8");
    this.writeVarUint(length);
    this.buffer.write(value, this.offset, length, "utf8");
    this.offset += length;
  }

  finish(): Buffer {
    if (this.offset !== this.buffer.length) {
      throw new Error(
        `Encoded ${this.offset} bytes into a ${this.buffer.length} byte buffer`
      );
    }
    return this.buffer;
  }
}
