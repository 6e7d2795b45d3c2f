import type { Address } from "../address/address";
import { EncodingError } from "../errors";
import { BitBuilder, toBigInt } from "./bit-builder";
import type { BitString } from "./bit-string";
import { Cell, MAX_CELL_BITS, MAX_CELL_REFS } from "./cell";
import type { Slice } from "./slice";

export type Writable = (builder: Builder) => void;

const MAX_COINS_BYTES = 15;

export function beginCell(): Builder {
  return new Builder();
}

/**
 * Mutable staging area for a cell; `endCell()` produces the immutable cell.
 */
export class Builder {
  private readonly bitsBuilder = new BitBuilder(MAX_CELL_BITS);
  private readonly refsList: Cell[] = [];

  get bits(): number {
    return this.bitsBuilder.length;
  }

  get refs(): number {
    return this.refsList.length;
  }

  get availableBits(): number {
    return this.bitsBuilder.available;
  }

  get availableRefs(): number {
    return MAX_CELL_REFS - this.refsList.length;
  }

  storeBit(value: boolean | number): this {
    this.bitsBuilder.writeBit(value);
    return this;
  }

  storeBits(src: BitString): this {
    this.bitsBuilder.writeBits(src);
    return this;
  }

  storeBuffer(src: Buffer, bytes?: number): this {
    if (bytes !== undefined && src.length !== bytes) {
      throw new EncodingError(
        "ValueOutOfRange",
        `expected ${bytes} bytes, got ${src.length}`,
      );
    }
    this.bitsBuilder.writeBuffer(src);
    return this;
  }

  storeUint(value: bigint | number, bits: number): this {
    this.bitsBuilder.writeUint(value, bits);
    return this;
  }

  storeInt(value: bigint | number, bits: number): this {
    this.bitsBuilder.writeInt(value, bits);
    return this;
  }

  /** Length-prefixed unsigned integer: byte count in `headerBits`, then the bytes. */
  storeVarUint(value: bigint | number, headerBits: number): this {
    const v = toBigInt(value);
    if (v < 0n) {
      throw new EncodingError("ValueOutOfRange", `${v} is negative`);
    }
    const bytes = v === 0n ? 0 : Math.ceil(v.toString(2).length / 8);
    if (bytes >= 1 << headerBits) {
      throw new EncodingError(
        "ValueOutOfRange",
        `${v} needs ${bytes} bytes, header of ${headerBits} bits allows less`,
      );
    }
    this.bitsBuilder.writeUint(bytes, headerBits);
    this.bitsBuilder.writeUint(v, bytes * 8);
    return this;
  }

  storeCoins(amount: bigint | number): this {
    const v = toBigInt(amount);
    if (v >= 1n << BigInt(MAX_COINS_BYTES * 8)) {
      throw new EncodingError("ValueOutOfRange", `${v} exceeds the coins range`);
    }
    return this.storeVarUint(v, 4);
  }

  /** Standard internal address, or `addr_none` for null. */
  storeAddress(address: Address | null | undefined): this {
    if (!address) {
      return this.storeUint(0, 2);
    }
    return this.storeUint(2, 2)
      .storeUint(0, 1)
      .storeInt(address.workChain, 8)
      .storeBuffer(address.hash, 32);
  }

  storeRef(cell: Cell | Builder): this {
    if (this.refsList.length >= MAX_CELL_REFS) {
      throw new EncodingError(
        "CapacityExceeded",
        `cell holds at most ${MAX_CELL_REFS} refs`,
      );
    }
    this.refsList.push(cell instanceof Builder ? cell.endCell() : cell);
    return this;
  }

  storeMaybeRef(cell: Cell | Builder | null | undefined): this {
    if (cell) {
      return this.storeBit(1).storeRef(cell);
    }
    return this.storeBit(0);
  }

  /** Dictionary root as `HashmapE`: absent bit, or present bit plus root ref. */
  storeDict(root: Cell | null | undefined): this {
    return this.storeMaybeRef(root);
  }

  storeSlice(src: Slice): this {
    const refs: Cell[] = [];
    const bits = src.loadBits(src.remainingBits);
    while (src.remainingRefs > 0) {
      refs.push(src.loadRef());
    }
    this.ensureRefs(refs.length);
    this.storeBits(bits);
    this.refsList.push(...refs);
    return this;
  }

  storeBuilder(src: Builder): this {
    return this.storeSlice(src.endCell().beginParse());
  }

  /** UTF-8 text in snake format: fill this cell, continue in a chain of refs. */
  storeStringTail(text: string): this {
    writeSnake(Buffer.from(text, "utf-8"), this);
    return this;
  }

  store(writer: Writable): this {
    writer(this);
    return this;
  }

  endCell(opts?: { exotic?: boolean }): Cell {
    return new Cell({
      exotic: opts?.exotic,
      bits: this.bitsBuilder.build(),
      refs: this.refsList,
    });
  }

  private ensureRefs(count: number) {
    if (this.refsList.length + count > MAX_CELL_REFS) {
      throw new EncodingError(
        "CapacityExceeded",
        `cannot add ${count} refs, only ${this.availableRefs} left`,
      );
    }
  }
}

function writeSnake(src: Buffer, builder: Builder) {
  if (src.length === 0) {
    return;
  }
  const fits = Math.floor(builder.availableBits / 8);
  if (src.length <= fits) {
    builder.storeBuffer(src);
    return;
  }
  builder.storeBuffer(src.subarray(0, fits));
  const tail = beginCell();
  writeSnake(src.subarray(fits), tail);
  builder.storeRef(tail.endCell());
}
