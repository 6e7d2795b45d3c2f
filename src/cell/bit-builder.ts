import { EncodingError } from "../errors";
import { BitString } from "./bit-string";

export function toBigInt(value: bigint | number): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new EncodingError(
      "ValueOutOfRange",
      `${value} is not a safe integer`,
    );
  }
  return BigInt(value);
}

export class BitBuilder {
  private readonly buffer: Buffer;
  private _length = 0;

  constructor(readonly capacity = 1023) {
    this.buffer = Buffer.alloc(Math.ceil(capacity / 8));
  }

  get length(): number {
    return this._length;
  }

  get available(): number {
    return this.capacity - this._length;
  }

  writeBit(value: boolean | number) {
    this.ensure(1);
    if (value === true || (typeof value === "number" && value !== 0)) {
      this.buffer[this._length >> 3] |= 1 << (7 - (this._length & 7));
    }
    this._length++;
  }

  writeBits(src: BitString) {
    this.ensure(src.length);
    for (let i = 0; i < src.length; i++) {
      this.writeBit(src.at(i));
    }
  }

  writeBuffer(src: Buffer) {
    this.ensure(src.length * 8);
    if (this._length % 8 === 0) {
      src.copy(this.buffer, this._length >> 3);
      this._length += src.length * 8;
      return;
    }
    for (const byte of src) {
      this.writeUint(byte, 8);
    }
  }

  writeUint(value: bigint | number, bits: number) {
    const v = toBigInt(value);
    if (bits < 0 || !Number.isInteger(bits)) {
      throw new EncodingError("ValueOutOfRange", `invalid bit width ${bits}`);
    }
    if (v < 0n || v >= 1n << BigInt(bits)) {
      throw new EncodingError(
        "ValueOutOfRange",
        `${v} does not fit into uint${bits}`,
      );
    }
    this.ensure(bits);
    for (let i = bits - 1; i >= 0; i--) {
      this.writeBit(((v >> BigInt(i)) & 1n) === 1n);
    }
  }

  writeInt(value: bigint | number, bits: number) {
    let v = toBigInt(value);
    if (bits === 0) {
      if (v !== 0n) {
        throw new EncodingError("ValueOutOfRange", `${v} does not fit into int0`);
      }
      return;
    }
    const bound = 1n << BigInt(bits - 1);
    if (v < -bound || v >= bound) {
      throw new EncodingError(
        "ValueOutOfRange",
        `${v} does not fit into int${bits}`,
      );
    }
    if (v < 0n) {
      v += 1n << BigInt(bits);
    }
    this.writeUint(v, bits);
  }

  build(): BitString {
    return new BitString(
      Buffer.from(this.buffer.subarray(0, Math.ceil(this._length / 8))),
      0,
      this._length,
    );
  }

  private ensure(bits: number) {
    if (this._length + bits > this.capacity) {
      throw new EncodingError(
        "CapacityExceeded",
        `cannot write ${bits} bits, only ${this.available} of ${this.capacity} left`,
      );
    }
  }
}
