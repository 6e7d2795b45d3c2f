import { DecodingError, EncodingError } from "../errors";
import { beginCell, type Builder } from "./builder";
import type { Cell } from "./cell";
import type { Slice } from "./slice";

export type TDictValue<V> = {
  serialize: (src: V, builder: Builder) => void;
  parse: (src: Slice) => V;
};

export const DictValues = {
  uint(bits: number): TDictValue<bigint> {
    return {
      serialize: (src, builder) => {
        builder.storeUint(src, bits);
      },
      parse: (src) => src.loadUintBig(bits),
    };
  },
  cell(): TDictValue<Cell> {
    return {
      serialize: (src, builder) => {
        builder.storeRef(src);
      },
      parse: (src) => src.loadRef(),
    };
  },
};

type LabelKind = "short" | "long" | "same";

function lengthBits(n: number): number {
  return n.toString(2).length;
}

function isSame(label: string): boolean {
  return label.length <= 1 || /^(0+|1+)$/.test(label);
}

function detectLabelKind(label: string, n: number): LabelKind {
  let kind: LabelKind = "short";
  let size = 2 + 2 * label.length;
  const longSize = 2 + lengthBits(n) + label.length;
  if (longSize < size) {
    kind = "long";
    size = longSize;
  }
  if (isSame(label)) {
    const sameSize = 3 + lengthBits(n);
    if (sameSize < size) {
      kind = "same";
    }
  }
  return kind;
}

function writeLabel(label: string, n: number, builder: Builder) {
  const writeBits = () => {
    for (const bit of label) {
      builder.storeBit(bit === "1");
    }
  };
  switch (detectLabelKind(label, n)) {
    case "short":
      builder.storeBit(0);
      for (let i = 0; i < label.length; i++) {
        builder.storeBit(1);
      }
      builder.storeBit(0);
      writeBits();
      break;
    case "long":
      builder.storeBit(1).storeBit(0);
      builder.storeUint(label.length, lengthBits(n));
      writeBits();
      break;
    case "same":
      builder.storeBit(1).storeBit(1);
      builder.storeBit(label[0] === "1");
      builder.storeUint(label.length, lengthBits(n));
      break;
  }
}

function readLabel(slice: Slice, n: number): string {
  if (!slice.loadBit()) {
    let length = 0;
    while (slice.loadBit()) {
      length++;
    }
    return readBits(slice, length);
  }
  if (!slice.loadBit()) {
    return readBits(slice, slice.loadUint(lengthBits(n)));
  }
  const bit = slice.loadBit() ? "1" : "0";
  return bit.repeat(slice.loadUint(lengthBits(n)));
}

function readBits(slice: Slice, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += slice.loadBit() ? "1" : "0";
  }
  return out;
}

function commonPrefix(keys: string[]): string {
  let prefix = keys[0];
  for (const key of keys) {
    let i = 0;
    while (i < prefix.length && prefix[i] === key[i]) {
      i++;
    }
    prefix = prefix.substring(0, i);
  }
  return prefix;
}

function buildEdge<V>(
  entries: Map<string, V>,
  n: number,
  value: TDictValue<V>,
): Cell {
  const keys = [...entries.keys()];
  const label = commonPrefix(keys);
  const builder = beginCell();
  writeLabel(label, n, builder);

  const rest = n - label.length;
  if (rest === 0) {
    for (const leaf of entries.values()) {
      value.serialize(leaf, builder);
    }
    return builder.endCell();
  }

  const left = new Map<string, V>();
  const right = new Map<string, V>();
  for (const [key, leaf] of entries) {
    const tail = key.substring(label.length + 1);
    if (key[label.length] === "0") {
      left.set(tail, leaf);
    } else {
      right.set(tail, leaf);
    }
  }
  return builder
    .storeRef(buildEdge(left, rest - 1, value))
    .storeRef(buildEdge(right, rest - 1, value))
    .endCell();
}

/**
 * Serializes an unsigned-key dictionary into its root edge cell, or null for
 * an empty dictionary (store with `Builder.storeDict`).
 */
export function serializeDict<V>(
  entries: Map<bigint, V>,
  keyBits: number,
  value: TDictValue<V>,
): Cell | null {
  if (keyBits < 1 || keyBits > 1023) {
    throw new EncodingError("ValueOutOfRange", `invalid key size ${keyBits}`);
  }
  if (entries.size === 0) {
    return null;
  }
  const keyed = new Map<string, V>();
  for (const [key, leaf] of entries) {
    if (key < 0n || key >= 1n << BigInt(keyBits)) {
      throw new EncodingError(
        "ValueOutOfRange",
        `key ${key} does not fit into ${keyBits} bits`,
      );
    }
    keyed.set(key.toString(2).padStart(keyBits, "0"), leaf);
  }
  return buildEdge(keyed, keyBits, value);
}

export function parseDict<V>(
  root: Cell | null,
  keyBits: number,
  value: TDictValue<V>,
): Map<bigint, V> {
  const out = new Map<bigint, V>();
  if (!root) {
    return out;
  }
  const visit = (cell: Cell, n: number, prefix: string) => {
    const slice = cell.beginParse();
    const label = readLabel(slice, n);
    if (label.length > n) {
      throw new DecodingError(
        "MalformedCell",
        `dictionary label of ${label.length} bits exceeds ${n}`,
      );
    }
    const key = prefix + label;
    const rest = n - label.length;
    if (rest === 0) {
      out.set(BigInt("0b" + key), value.parse(slice));
      return;
    }
    const left = slice.loadRef();
    const right = slice.loadRef();
    visit(left, rest - 1, key + "0");
    visit(right, rest - 1, key + "1");
  };
  visit(root, keyBits, "");
  return out;
}
