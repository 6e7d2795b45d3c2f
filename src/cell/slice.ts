import { Address } from "../address/address";
import { DecodingError } from "../errors";
import { BitString } from "./bit-string";
import type { Cell } from "./cell";

/**
 * Read cursor over a finalized cell. Loads advance the cursor, preloads don't.
 */
export class Slice {
  private bitOffset = 0;
  private refOffset = 0;

  constructor(private readonly cell: Cell) {}

  get remainingBits(): number {
    return this.cell.bits.length - this.bitOffset;
  }

  get remainingRefs(): number {
    return this.cell.refs.length - this.refOffset;
  }

  skip(bits: number): this {
    this.ensureBits(bits);
    this.bitOffset += bits;
    return this;
  }

  loadBit(): boolean {
    this.ensureBits(1);
    return this.cell.bits.at(this.bitOffset++);
  }

  preloadBit(): boolean {
    this.ensureBits(1);
    return this.cell.bits.at(this.bitOffset);
  }

  loadUintBig(bits: number): bigint {
    const value = this.preloadUintBig(bits);
    this.bitOffset += bits;
    return value;
  }

  preloadUintBig(bits: number): bigint {
    this.ensureBits(bits);
    let value = 0n;
    for (let i = 0; i < bits; i++) {
      value = (value << 1n) | (this.cell.bits.at(this.bitOffset + i) ? 1n : 0n);
    }
    return value;
  }

  loadUint(bits: number): number {
    return this.toSafeNumber(this.loadUintBig(bits));
  }

  preloadUint(bits: number): number {
    return this.toSafeNumber(this.preloadUintBig(bits));
  }

  loadIntBig(bits: number): bigint {
    const value = this.loadUintBig(bits);
    if (bits > 0 && value >> BigInt(bits - 1) === 1n) {
      return value - (1n << BigInt(bits));
    }
    return value;
  }

  loadInt(bits: number): number {
    return this.toSafeNumber(this.loadIntBig(bits));
  }

  loadVarUintBig(headerBits: number): bigint {
    const bytes = this.loadUint(headerBits);
    return this.loadUintBig(bytes * 8);
  }

  loadCoins(): bigint {
    return this.loadVarUintBig(4);
  }

  loadBits(bits: number): BitString {
    this.ensureBits(bits);
    const out = this.cell.bits.substring(this.bitOffset, bits);
    this.bitOffset += bits;
    return out;
  }

  loadBuffer(bytes: number): Buffer {
    return this.loadBits(bytes * 8).toPaddedBuffer();
  }

  loadMaybeAddress(): Address | null {
    const tag = this.loadUint(2);
    if (tag === 0) {
      return null;
    }
    if (tag !== 2) {
      throw new DecodingError(
        "UnsupportedAddress",
        `only internal standard addresses are supported, got tag ${tag}`,
      );
    }
    if (this.loadBit()) {
      throw new DecodingError(
        "UnsupportedAddress",
        "anycast addresses are not supported",
      );
    }
    const workChain = this.loadInt(8);
    return new Address(workChain, this.loadBuffer(32));
  }

  loadAddress(): Address {
    const address = this.loadMaybeAddress();
    if (!address) {
      throw new DecodingError("UnsupportedAddress", "expected an address, got addr_none");
    }
    return address;
  }

  loadRef(): Cell {
    if (this.remainingRefs <= 0) {
      throw new DecodingError(
        "NoSuchRef",
        `ref #${this.refOffset} requested, cell has ${this.cell.refs.length}`,
      );
    }
    return this.cell.refs[this.refOffset++];
  }

  preloadRef(index = 0): Cell {
    const position = this.refOffset + index;
    if (index < 0 || position >= this.cell.refs.length) {
      throw new DecodingError(
        "NoSuchRef",
        `ref #${position} requested, cell has ${this.cell.refs.length}`,
      );
    }
    return this.cell.refs[position];
  }

  loadMaybeRef(): Cell | null {
    return this.loadBit() ? this.loadRef() : null;
  }

  /** Snake-encoded UTF-8 string occupying the rest of the slice. */
  loadStringTail(): string {
    return this.loadSnakeBytes().toString("utf-8");
  }

  endParse() {
    if (this.remainingBits > 0 || this.remainingRefs > 0) {
      throw new DecodingError(
        "TrailingData",
        `slice has ${this.remainingBits} bits and ${this.remainingRefs} refs left`,
      );
    }
  }

  private loadSnakeBytes(): Buffer {
    if (this.remainingBits % 8 !== 0) {
      throw new DecodingError(
        "MalformedCell",
        `snake data is not byte aligned: ${this.remainingBits} bits`,
      );
    }
    if (this.remainingRefs > 1) {
      throw new DecodingError(
        "MalformedCell",
        `snake data continues into ${this.remainingRefs} refs`,
      );
    }
    const head = this.loadBuffer(this.remainingBits / 8);
    if (this.remainingRefs === 0) {
      return head;
    }
    return Buffer.concat([head, this.loadRef().beginParse().loadSnakeBytes()]);
  }

  private ensureBits(bits: number) {
    if (bits < 0 || bits > this.remainingBits) {
      throw new DecodingError(
        "BufferUnderrun",
        `${bits} bits requested, ${this.remainingBits} left`,
      );
    }
  }

  private toSafeNumber(value: bigint): number {
    if (
      value > BigInt(Number.MAX_SAFE_INTEGER) ||
      value < BigInt(Number.MIN_SAFE_INTEGER)
    ) {
      throw new DecodingError(
        "MalformedCell",
        `${value} does not fit into a number, use the bigint loader`,
      );
    }
    return Number(value);
  }
}
