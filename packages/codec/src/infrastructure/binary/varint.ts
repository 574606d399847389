export function zigZagInt(value: number): number {
  return ((value << 1) ^ (value >> 31)) >>> 0;
}

export function unZigZagInt(value: number): number {
  return (value >>> 1) ^ -(value & 1);
}

export function zigZagLong(value: number): bigint {
  const v = BigInt(value);
  return (v << 1n) ^ (v >> 63n);
}

export function unZigZagLong(value: bigint): bigint {
  return (value >> 1n) ^ -(value & 1n);
}

export function varUintSize(value: number): number {
  let size = 1;
  while (value > 0x7f) {
    value = Math.floor(value / 128);
    size++;
  }
  return size;
}

export function varBigUintSize(value: bigint): number {
  let size = 1;
  while (value > 0x7fn) {
    value >>= 7n;
    size++;
  }
  return size;
}
