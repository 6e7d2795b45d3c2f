import { sha256_sync } from "@ton/crypto";
import { EncodingError } from "../errors";
import { BitString } from "./bit-string";
import { Slice } from "./slice";

export const MAX_CELL_BITS = 1023;
export const MAX_CELL_REFS = 4;
export const MAX_CELL_DEPTH = 1023;

export enum CellType {
  Ordinary = -1,
  PrunedBranch = 1,
  Library = 2,
  MerkleProof = 3,
  MerkleUpdate = 4,
}

const HASH_BITS = 256;
const DEPTH_BITS = 16;
const MAX_LEVEL = 3;

function popcount(mask: number): number {
  let count = 0;
  for (let m = mask; m !== 0; m >>= 1) {
    count += m & 1;
  }
  return count;
}

function readByte(bits: BitString, offset: number): number {
  let value = 0;
  for (let i = 0; i < 8; i++) {
    value = (value << 1) | (bits.at(offset + i) ? 1 : 0);
  }
  return value;
}

function readBytes(bits: BitString, offset: number, length: number): Buffer {
  return Buffer.from(
    Array.from({ length }, (_, i) => readByte(bits, offset + i * 8)),
  );
}

function readUint16(bits: BitString, offset: number): number {
  return (readByte(bits, offset) << 8) | readByte(bits, offset + 8);
}

/** Level mask restricted to the levels below `level`. */
function applyLevel(levelMask: number, level: number): number {
  return levelMask & ((1 << level) - 1);
}

function isSignificant(levelMask: number, level: number): boolean {
  return level === 0 || ((levelMask >> (level - 1)) & 1) === 1;
}

function invalidExotic(message: string): EncodingError {
  return new EncodingError("InvalidExoticCell", message);
}

function checkMerkleRef(
  bits: BitString,
  hashOffset: number,
  depthOffset: number,
  ref: Cell,
) {
  if (!readBytes(bits, hashOffset, 32).equals(ref.hash(0))) {
    throw invalidExotic("merkle cell stores a hash that differs from its ref");
  }
  if (readUint16(bits, depthOffset) !== ref.depth(0)) {
    throw invalidExotic("merkle cell stores a depth that differs from its ref");
  }
}

/**
 * Resolves the exotic kind from its leading type byte and checks the layout
 * the kind requires. Returns the cell's level mask.
 */
function exoticLevelMask(
  bits: BitString,
  refs: readonly Cell[],
): { type: CellType; levelMask: number } {
  if (bits.length < 8) {
    throw invalidExotic(`exotic cell needs a type byte, got ${bits.length} bits`);
  }
  const type = readByte(bits, 0);
  switch (type) {
    case CellType.PrunedBranch: {
      if (refs.length !== 0) {
        throw invalidExotic("pruned branch cell cannot have refs");
      }
      if (bits.length < 16) {
        throw invalidExotic("pruned branch cell has no level mask");
      }
      const levelMask = readByte(bits, 8);
      if (levelMask < 1 || levelMask > 7) {
        throw invalidExotic(`pruned branch level mask ${levelMask} is out of 1..7`);
      }
      const expected = 16 + popcount(levelMask) * (HASH_BITS + DEPTH_BITS);
      if (bits.length !== expected) {
        throw invalidExotic(
          `pruned branch must have ${expected} bits, got ${bits.length}`,
        );
      }
      return { type: CellType.PrunedBranch, levelMask };
    }
    case CellType.Library: {
      if (bits.length !== 8 + HASH_BITS || refs.length !== 0) {
        throw invalidExotic("library cell must have 264 bits and no refs");
      }
      return { type: CellType.Library, levelMask: 0 };
    }
    case CellType.MerkleProof: {
      if (bits.length !== 8 + HASH_BITS + DEPTH_BITS || refs.length !== 1) {
        throw invalidExotic("merkle proof cell must have 280 bits and one ref");
      }
      checkMerkleRef(bits, 8, 8 + HASH_BITS, refs[0]);
      return { type: CellType.MerkleProof, levelMask: refs[0].levelMask >> 1 };
    }
    case CellType.MerkleUpdate: {
      if (
        bits.length !== 8 + 2 * (HASH_BITS + DEPTH_BITS) ||
        refs.length !== 2
      ) {
        throw invalidExotic("merkle update cell must have 552 bits and two refs");
      }
      // old_hash new_hash old_depth new_depth
      checkMerkleRef(bits, 8, 8 + 2 * HASH_BITS, refs[0]);
      checkMerkleRef(bits, 8 + HASH_BITS, 8 + 2 * HASH_BITS + DEPTH_BITS, refs[1]);
      return {
        type: CellType.MerkleUpdate,
        levelMask: (refs[0].levelMask | refs[1].levelMask) >> 1,
      };
    }
    default:
      throw invalidExotic(`unknown exotic cell type ${type}`);
  }
}

export class Cell {
  static readonly EMPTY = new Cell();

  readonly type: CellType;
  readonly bits: BitString;
  readonly refs: readonly Cell[];
  readonly levelMask: number;

  /** indexed by level 0..3 */
  private readonly _hashes: Buffer[];
  private readonly _depths: number[];

  constructor(opts?: {
    exotic?: boolean;
    bits?: BitString;
    refs?: readonly Cell[];
  }) {
    const bits = opts?.bits ?? BitString.EMPTY;
    const refs = opts?.refs ? [...opts.refs] : [];

    if (bits.length > MAX_CELL_BITS) {
      throw new EncodingError(
        "CapacityExceeded",
        `cell holds at most ${MAX_CELL_BITS} bits, got ${bits.length}`,
      );
    }
    if (refs.length > MAX_CELL_REFS) {
      throw new EncodingError(
        "CapacityExceeded",
        `cell holds at most ${MAX_CELL_REFS} refs, got ${refs.length}`,
      );
    }

    if (opts?.exotic) {
      const { type, levelMask } = exoticLevelMask(bits, refs);
      this.type = type;
      this.levelMask = levelMask;
    } else {
      this.type = CellType.Ordinary;
      this.levelMask = refs.reduce((mask, ref) => mask | ref.levelMask, 0);
    }
    this.bits = bits;
    this.refs = Object.freeze(refs);

    const { hashes, depths } = this.computeLevels();
    const depth = Math.max(...depths);
    if (depth > MAX_CELL_DEPTH) {
      throw new EncodingError(
        "DepthExceeded",
        `cell depth ${depth} exceeds ${MAX_CELL_DEPTH}`,
      );
    }
    this._hashes = hashes;
    this._depths = depths;
  }

  get isExotic(): boolean {
    return this.type !== CellType.Ordinary;
  }

  get level(): number {
    return 32 - Math.clz32(this.levelMask);
  }

  /** Depth at `level`; the default is the cell's highest level. */
  depth(level = MAX_LEVEL): number {
    return this._depths[Math.min(level, MAX_LEVEL)];
  }

  /** Representation hash at `level`; the default is the cell's highest level. */
  hash(level = MAX_LEVEL): Buffer {
    return Buffer.from(this._hashes[Math.min(level, MAX_LEVEL)]);
  }

  /** `d1` and `d2` descriptor bytes. */
  descriptors(): Buffer {
    return Buffer.from([this.refsDescriptor(this.levelMask), this.bitsDescriptor()]);
  }

  beginParse(allowExotic = false): Slice {
    if (this.isExotic && !allowExotic) {
      throw new EncodingError(
        "InvalidExoticCell",
        `cannot parse exotic cell of type ${CellType[this.type]}`,
      );
    }
    return new Slice(this);
  }

  equals(other: Cell): boolean {
    return this._hashes[MAX_LEVEL].equals(other._hashes[MAX_LEVEL]);
  }

  toString(indent = ""): string {
    const tag = this.isExotic
      ? this.type === CellType.MerkleUpdate
        ? "u"
        : "p"
      : "x";
    let out = `${indent}${tag}{${this.bits.toString()}}`;
    for (const ref of this.refs) {
      out += "\n" + ref.toString(indent + " ");
    }
    return out;
  }

  private refsDescriptor(levelMask: number): number {
    return this.refs.length + (this.isExotic ? 8 : 0) + levelMask * 32;
  }

  private bitsDescriptor(): number {
    return Math.floor(this.bits.length / 8) + Math.ceil(this.bits.length / 8);
  }

  /**
   * Hashes and depths for every level. Each significant level hashes the
   * previous level's hash in place of the data bits. A pruned branch computes
   * only its own level and reports the stored values below it.
   */
  private computeLevels(): { hashes: Buffer[]; depths: number[] } {
    const merkle =
      this.type === CellType.MerkleProof || this.type === CellType.MerkleUpdate;
    const pruned = this.type === CellType.PrunedBranch;
    const top = this.level;

    const own: { hash: Buffer; depth: number }[] = [];
    for (let level = 0; level <= top; level++) {
      if (!isSignificant(this.levelMask, level) || (pruned && level < top)) {
        continue;
      }
      const childLevel = merkle ? level + 1 : level;
      const depth =
        this.refs.length === 0
          ? 0
          : 1 + Math.max(...this.refs.map((ref) => ref.depth(childLevel)));
      const data =
        own.length === 0
          ? this.bits.toPaddedBuffer()
          : own[own.length - 1].hash;
      const depths = Buffer.alloc(this.refs.length * 2);
      this.refs.forEach((ref, i) => depths.writeUInt16BE(ref.depth(childLevel), i * 2));
      const hash = sha256_sync(
        Buffer.concat([
          Buffer.from([
            this.refsDescriptor(applyLevel(this.levelMask, level)),
            this.bitsDescriptor(),
          ]),
          data,
          depths,
          ...this.refs.map((ref) => ref.hash(childLevel)),
        ]),
      );
      own.push({ hash, depth });
    }

    const stored = pruned ? popcount(this.levelMask) : 0;
    const hashes: Buffer[] = [];
    const depths: number[] = [];
    for (let level = 0; level <= MAX_LEVEL; level++) {
      const index = popcount(applyLevel(this.levelMask, level));
      if (index < stored) {
        // pruned data: type:8 mask:8 hashes:(256 * n) depths:(16 * n)
        hashes.push(readBytes(this.bits, 16 + index * HASH_BITS, 32));
        depths.push(readUint16(this.bits, 16 + stored * HASH_BITS + index * DEPTH_BITS));
      } else {
        const entry = own[index - stored];
        hashes.push(entry.hash);
        depths.push(entry.depth);
      }
    }
    return { hashes, depths };
  }
}
