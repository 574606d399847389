import { TextDecoder } from "node:util";
import { MalformedMessageError } from "../../domain/errors/MalformedMessageError";
import { unZigZagInt, unZigZagLong } from "./varint";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

export class BinaryReader {
  private static readonly utf8 = new TextDecoder("utf-8", { fatal: true });

  constructor(
    private readonly buffer: Buffer,
    private offset = 0
  ) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUInt8(what: string): number {
    this.require(1, what);
    return this.buffer.readUInt8(this.offset++);
  }

  readUInt32BE(what: string): number {
    this.require(4, what);
    const value = this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readVarUint(what: string): number {
    const start = this.offset;
    let result = 0;

    for (let i = 0; i < 5; i++) {
      const byte = this.readUInt8(what);
      result += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) {
        if (result > 0xffffffff) break;
        return result;
      }
    }

    throw new MalformedMessageError(`Varint overflow reading ${what}`, start);
  }

  readVarBigUint(what: string): bigint {
    const start = this.offset;
    let result = 0n;

    for (let i = 0n; i < 10n; i++) {
      const byte = this.readUInt8(what);
      result |= BigInt(byte & 0x7f) << (7n * i);
      if ((byte & 0x80) === 0) return result;
    }

    throw new MalformedMessageError(`Varint overflow reading ${what}`, start);
  }

  readInt(what: string): number {
    return unZigZagInt(this.readVarUint(what));
  }

  readLong(what: string): number {
    const start = this.offset;
    const value = unZigZagLong(this.readVarBigUint(what));
    if (value > MAX_SAFE || value < MIN_SAFE) {
      throw new MalformedMessageError(
        `Long ${value} in ${what} exceeds the safe integer range`,
        start
      );
    }
    return Number(value);
  }

  readDouble(what: string): number {
    this.require(8, what);
    const value = this.buffer.readDoubleBE(this.offset);
    this.offset += 8;
    return value;
  }

  readBoolean(what: string): boolean {
    const start = this.offset;
    const byte = this.readUInt8(what);
    if (byte > 1) {
      throw new MalformedMessageError(
        `Invalid boolean byte 0x${byte.toString(16)} in ${what}`,
        start
      );
    }
    return byte === 1;
  }

  readString(what: string): string {
    const length = this.readVarUint(what);
    this.require(length, what);
    const start = this.offset;
    const bytes = this.buffer.subarray(start, start + length);
    this.offset += length;

    try {
      return BinaryReader.utf8.decode(bytes);
    } catch (cause) {
      throw new MalformedMessageError(`Invalid UTF-8 in ${what}`, start, cause);
    }
  }

  expectEnd(): void {
    if (this.remaining > 0) {
      throw new MalformedMessageError(
        `${this.remaining} unexpected trailing bytes`,
        this.offset
      );
    }
  }

  private require(length: number, what: string): void {
    if (this.offset + length > this.buffer.length) {
      throw new MalformedMessageError(
        `Unexpected end of message reading ${what}`,
        this.offset
      );
    }
  }
}
