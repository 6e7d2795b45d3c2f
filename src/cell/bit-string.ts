import { DecodingError } from "../errors";

/**
 * Immutable view over a bit sequence, most significant bit first.
 */
export class BitString {
  static readonly EMPTY = new BitString(Buffer.alloc(0), 0, 0);

  constructor(
    private readonly data: Buffer,
    private readonly offset: number,
    readonly length: number,
  ) {
    if (offset < 0 || length < 0 || offset + length > data.length * 8) {
      throw new RangeError(
        `Bit view ${offset}+${length} is outside of ${data.length} bytes`,
      );
    }
  }

  /**
   * Bits stored with the standard completion tag: when `padded` is set, the
   * last byte ends with a single 1 followed by zeroes, which is stripped.
   */
  static fromPaddedBuffer(bytes: Buffer, padded: boolean): BitString {
    if (!padded || bytes.length === 0) {
      return new BitString(bytes, 0, bytes.length * 8);
    }
    const last = bytes[bytes.length - 1];
    if (last === 0) {
      throw new DecodingError(
        "MalformedCell",
        "cell data has no completion tag in its last byte",
      );
    }
    let trailing = 0;
    while (((last >> trailing) & 1) === 0) {
      trailing++;
    }
    return new BitString(bytes, 0, bytes.length * 8 - trailing - 1);
  }

  at(index: number): boolean {
    if (index < 0 || index >= this.length) {
      throw new RangeError(`Bit index ${index} is out of 0..${this.length}`);
    }
    const position = this.offset + index;
    return (this.data[position >> 3] & (1 << (7 - (position & 7)))) !== 0;
  }

  substring(offset: number, length: number): BitString {
    if (offset < 0 || length < 0 || offset + length > this.length) {
      throw new RangeError(
        `Substring ${offset}+${length} is out of 0..${this.length}`,
      );
    }
    return new BitString(this.data, this.offset + offset, length);
  }

  /** Byte-aligned bits as a fresh buffer; undefined when not a whole number of bytes. */
  toBuffer(): Buffer | undefined {
    if (this.length % 8 !== 0) {
      return undefined;
    }
    if (this.offset % 8 === 0) {
      const start = this.offset >> 3;
      return Buffer.from(this.data.subarray(start, start + this.length / 8));
    }
    return this.toPaddedBuffer();
  }

  /** Bits packed into ceil(length / 8) bytes with the completion tag appended. */
  toPaddedBuffer(): Buffer {
    const out = Buffer.alloc(Math.ceil(this.length / 8));
    for (let i = 0; i < this.length; i++) {
      if (this.at(i)) {
        out[i >> 3] |= 1 << (7 - (i & 7));
      }
    }
    if (this.length % 8 !== 0) {
      out[this.length >> 3] |= 1 << (7 - (this.length & 7));
    }
    return out;
  }

  equals(other: BitString): boolean {
    if (this.length !== other.length) {
      return false;
    }
    for (let i = 0; i < this.length; i++) {
      if (this.at(i) !== other.at(i)) {
        return false;
      }
    }
    return true;
  }

  /** Fift-style hex, with a trailing `_` when the completion tag is kept. */
  toString(): string {
    const padded = this.toPaddedBuffer();
    if (this.length % 4 === 0) {
      const hex = padded
        .subarray(0, Math.ceil(this.length / 8))
        .toString("hex")
        .toUpperCase();
      return this.length % 8 === 0 ? hex : hex.substring(0, hex.length - 1);
    }
    const hex = padded.toString("hex").toUpperCase();
    return this.length % 8 <= 4
      ? hex.substring(0, hex.length - 1) + "_"
      : hex + "_";
  }
}
