import { Cell } from "../cell/cell";
import { crc32cBytes } from "../cell/crc";
import { EncodingError } from "../errors";

export const BOC_GENERIC_MAGIC = 0xb5ee9c72;

export type TSerializeOptions = {
  hasCrc?: boolean;
  hasIndex?: boolean;
};

type TIndexedCell = {
  cell: Cell;
  refs: number[];
};

/**
 * Deduplicates the graph by hash and orders it so that every reference points
 * to a cell with a greater index (reverse DFS post-order).
 */
function topologicalSort(roots: readonly Cell[]): {
  cells: TIndexedCell[];
  rootIndexes: number[];
} {
  const all = new Map<string, { cell: Cell; refs: string[] }>();
  const unvisited = new Set<string>();

  let pending = [...roots];
  while (pending.length > 0) {
    const next: Cell[] = [];
    for (const cell of pending) {
      const hash = cell.hash().toString("hex");
      if (all.has(hash)) {
        continue;
      }
      unvisited.add(hash);
      all.set(hash, {
        cell,
        refs: cell.refs.map((ref) => ref.hash().toString("hex")),
      });
      next.push(...cell.refs);
    }
    pending = next;
  }

  const sorted: string[] = [];
  const inProgress = new Set<string>();
  const visit = (hash: string) => {
    if (!unvisited.has(hash)) {
      return;
    }
    if (inProgress.has(hash)) {
      throw new EncodingError("CycleDetected", `cell ${hash} is its own ancestor`);
    }
    inProgress.add(hash);
    const refs = all.get(hash)?.refs ?? [];
    for (let i = refs.length - 1; i >= 0; i--) {
      visit(refs[i]);
    }
    sorted.push(hash);
    inProgress.delete(hash);
    unvisited.delete(hash);
  };
  for (const root of roots) {
    visit(root.hash().toString("hex"));
  }

  const order = sorted.reverse();
  const indexes = new Map(order.map((hash, i) => [hash, i]));
  const indexOf = (hash: string): number => {
    const index = indexes.get(hash);
    if (index === undefined) {
      throw new EncodingError("CycleDetected", `cell ${hash} was not ordered`);
    }
    return index;
  };

  const cells = order.map((hash) => {
    const entry = all.get(hash);
    if (!entry) {
      throw new EncodingError("CycleDetected", `cell ${hash} was not collected`);
    }
    return { cell: entry.cell, refs: entry.refs.map(indexOf) };
  });
  const rootIndexes = roots.map((root) => indexOf(root.hash().toString("hex")));
  return { cells, rootIndexes };
}

function bytesFor(value: number): number {
  return Math.max(Math.ceil(value.toString(2).length / 8), 1);
}

function uintBytes(value: number, bytes: number): Buffer {
  const out = Buffer.alloc(bytes);
  let rest = value;
  for (let i = bytes - 1; i >= 0; i--) {
    out[i] = rest % 256;
    rest = Math.floor(rest / 256);
  }
  return out;
}

function serializeCell(entry: TIndexedCell, sizeBytes: number): Buffer {
  return Buffer.concat([
    entry.cell.descriptors(),
    entry.cell.bits.toPaddedBuffer(),
    ...entry.refs.map((ref) => uintBytes(ref, sizeBytes)),
  ]);
}

/**
 * Serializes a forest of cells into the generic BOC envelope
 * (`b5ee9c72`), choosing the narrowest index and offset widths.
 */
export function serializeBoc(
  roots: Cell | readonly Cell[],
  opts: TSerializeOptions = {},
): Buffer {
  const { hasCrc = true, hasIndex = false } = opts;
  const rootList = roots instanceof Cell ? [roots] : [...roots];
  if (rootList.length === 0) {
    throw new EncodingError("ValueOutOfRange", "BOC needs at least one root");
  }

  const { cells, rootIndexes } = topologicalSort(rootList);
  const sizeBytes = bytesFor(cells.length);

  const cellData = cells.map((entry) => serializeCell(entry, sizeBytes));
  const offsets: number[] = [];
  let totalCellSize = 0;
  for (const data of cellData) {
    totalCellSize += data.length;
    offsets.push(totalCellSize);
  }
  const offsetBytes = bytesFor(totalCellSize);

  const flags =
    (hasIndex ? 0x80 : 0) | (hasCrc ? 0x40 : 0) | (sizeBytes & 0x07);

  const header = Buffer.concat([
    uintBytes(BOC_GENERIC_MAGIC, 4),
    Buffer.from([flags, offsetBytes]),
    uintBytes(cells.length, sizeBytes),
    uintBytes(rootIndexes.length, sizeBytes),
    uintBytes(0, sizeBytes),
    uintBytes(totalCellSize, offsetBytes),
    ...rootIndexes.map((index) => uintBytes(index, sizeBytes)),
    ...(hasIndex ? offsets.map((offset) => uintBytes(offset, offsetBytes)) : []),
  ]);

  const body = Buffer.concat([header, ...cellData]);
  return hasCrc ? Buffer.concat([body, crc32cBytes(body)]) : body;
}
