import { BitString } from "../cell/bit-string";
import { Cell } from "../cell/cell";
import { crc32c } from "../cell/crc";
import { DecodingError, EncodingError } from "../errors";
import { BOC_GENERIC_MAGIC } from "./serialize";

const BOC_LEGACY_MAGIC = 0x68ff65f3;
const BOC_LEGACY_CRC_MAGIC = 0xacc3a728;

type TRawCell = {
  exotic: boolean;
  levelMask: number;
  bits: BitString;
  refs: number[];
};

class ByteReader {
  private position = 0;

  constructor(private readonly src: Buffer) {}

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.src.length - this.position;
  }

  uint(bytes: number): number {
    this.need(bytes);
    let value = 0;
    for (let i = 0; i < bytes; i++) {
      value = value * 256 + this.src[this.position++];
    }
    return value;
  }

  bytes(count: number): Buffer {
    this.need(count);
    const out = this.src.subarray(this.position, this.position + count);
    this.position += count;
    return out;
  }

  private need(count: number) {
    if (count > this.remaining) {
      throw new DecodingError(
        "TruncatedInput",
        `${count} bytes needed at offset ${this.position}, ${this.remaining} left`,
      );
    }
  }
}

type THeader = {
  sizeBytes: number;
  offsetBytes: number;
  cellsNum: number;
  roots: number[];
  hasCrc: boolean;
  cellData: Buffer;
};

function readHeader(src: Buffer): THeader {
  const reader = new ByteReader(src);
  const magic = reader.uint(4);

  let hasIndex: boolean;
  let hasCrc: boolean;
  let sizeBytes: number;
  if (magic === BOC_GENERIC_MAGIC) {
    const flags = reader.uint(1);
    hasIndex = (flags & 0x80) !== 0;
    hasCrc = (flags & 0x40) !== 0;
    sizeBytes = flags & 0x07;
  } else if (magic === BOC_LEGACY_MAGIC || magic === BOC_LEGACY_CRC_MAGIC) {
    hasIndex = true;
    hasCrc = magic === BOC_LEGACY_CRC_MAGIC;
    sizeBytes = reader.uint(1);
  } else {
    throw new DecodingError(
      "InvalidMagic",
      `unknown BOC magic 0x${magic.toString(16).padStart(8, "0")}`,
    );
  }

  const offsetBytes = reader.uint(1);
  if (sizeBytes < 1 || sizeBytes > 4 || offsetBytes < 1 || offsetBytes > 8) {
    throw new DecodingError(
      "MalformedCell",
      `unsupported BOC widths: size ${sizeBytes}, offset ${offsetBytes}`,
    );
  }

  const cellsNum = reader.uint(sizeBytes);
  const rootsNum = reader.uint(sizeBytes);
  const absentNum = reader.uint(sizeBytes);
  const totalCellSize = reader.uint(offsetBytes);
  if (rootsNum < 1 || rootsNum > cellsNum || absentNum > cellsNum) {
    throw new DecodingError(
      "MalformedCell",
      `${cellsNum} cells cannot hold ${rootsNum} roots and ${absentNum} absent cells`,
    );
  }

  const roots: number[] = [];
  if (magic === BOC_GENERIC_MAGIC) {
    for (let i = 0; i < rootsNum; i++) {
      const root = reader.uint(sizeBytes);
      if (root >= cellsNum) {
        throw new DecodingError(
          "MalformedReference",
          `root index ${root} is out of ${cellsNum} cells`,
        );
      }
      roots.push(root);
    }
  } else {
    roots.push(0);
  }

  if (hasIndex) {
    reader.bytes(cellsNum * offsetBytes);
  }
  const cellData = reader.bytes(totalCellSize);

  if (hasCrc) {
    const bodyLength = reader.offset;
    const expected = reader.bytes(4).readUInt32LE(0);
    const actual = crc32c(src.subarray(0, bodyLength));
    if (expected !== actual) {
      throw new DecodingError(
        "ChecksumMismatch",
        `CRC32C is 0x${actual.toString(16)}, envelope carries 0x${expected.toString(16)}`,
      );
    }
  }
  if (reader.remaining > 0) {
    throw new DecodingError(
      "TrailingData",
      `${reader.remaining} bytes follow the BOC envelope`,
    );
  }

  return { sizeBytes, offsetBytes, cellsNum, roots, hasCrc, cellData };
}

function readCell(
  reader: ByteReader,
  index: number,
  cellsNum: number,
  sizeBytes: number,
): TRawCell {
  const d1 = reader.uint(1);
  const d2 = reader.uint(1);
  const refsCount = d1 & 0x07;
  const exotic = (d1 & 0x08) !== 0;
  const withHashes = (d1 & 0x10) !== 0;
  const levelMask = d1 >> 5;
  if (refsCount > 4) {
    throw new DecodingError(
      "MalformedCell",
      `cell #${index} declares ${refsCount} refs`,
    );
  }
  if (withHashes) {
    let hashes = 1;
    for (let m = levelMask; m !== 0; m >>= 1) {
      hashes += m & 1;
    }
    reader.bytes(hashes * (32 + 2));
  }

  const data = Buffer.from(reader.bytes(Math.ceil(d2 / 2)));
  const bits = BitString.fromPaddedBuffer(data, (d2 & 1) !== 0);

  const refs: number[] = [];
  for (let i = 0; i < refsCount; i++) {
    const ref = reader.uint(sizeBytes);
    if (ref <= index || ref >= cellsNum) {
      throw new DecodingError(
        "MalformedReference",
        `cell #${index} refers to #${ref}, expected ${index + 1}..${cellsNum - 1}`,
      );
    }
    refs.push(ref);
  }
  return { exotic, levelMask, bits, refs };
}

function buildCell(raw: TRawCell, index: number, built: Cell[]): Cell {
  let cell: Cell;
  try {
    cell = new Cell({
      exotic: raw.exotic,
      bits: raw.bits,
      refs: raw.refs.map((ref) => built[ref]),
    });
  } catch (e) {
    if (e instanceof EncodingError) {
      throw new DecodingError("MalformedCell", `cell #${index} is invalid`, {
        cause: e,
      });
    }
    throw e;
  }
  if (cell.levelMask !== raw.levelMask) {
    throw new DecodingError(
      "MalformedCell",
      `cell #${index} declares level mask ${raw.levelMask}, computed ${cell.levelMask}`,
    );
  }
  return cell;
}

/**
 * Parses a bag of cells into its root cells. Accepts the generic envelope
 * and both legacy ones; any defect rejects the whole input.
 */
export function deserializeBoc(src: Buffer): Cell[] {
  const { sizeBytes, cellsNum, roots, cellData } = readHeader(src);

  const reader = new ByteReader(cellData);
  const raw: TRawCell[] = [];
  for (let i = 0; i < cellsNum; i++) {
    raw.push(readCell(reader, i, cellsNum, sizeBytes));
  }
  if (reader.remaining > 0) {
    throw new DecodingError(
      "MalformedCell",
      `${reader.remaining} bytes of cell data are not used by any cell`,
    );
  }

  const built: Cell[] = new Array<Cell>(cellsNum);
  for (let i = cellsNum - 1; i >= 0; i--) {
    built[i] = buildCell(raw[i], i, built);
  }
  return roots.map((root) => built[root]);
}
