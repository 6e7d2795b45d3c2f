import {
  Address as CoreAddress,
  Cell as CoreCell,
  beginCell as coreBeginCell,
  convertToMerkleProof,
} from "@ton/core";
import { cellFromBoc, serializeBoc } from "../src/boc";
import { BitString } from "../src/cell/bit-string";
import { beginCell } from "../src/cell/builder";
import { Cell, CellType, MAX_CELL_DEPTH } from "../src/cell/cell";
import { DecodingError, EncodingError } from "../src/errors";
import { expectCode, fromCore, testAddress } from "./utils";

const EMPTY_CELL_HASH =
  "96a296d224f285c67bee93c30f8a309157f0daa35dc5b87e410b78630a09cfc7";

function expectSameLevels(ours: Cell, theirs: CoreCell) {
  for (const level of [0, 1, 2, 3]) {
    expect(ours.hash(level).toString("hex")).toBe(theirs.hash(level).toString("hex"));
    expect(ours.depth(level)).toBe(theirs.depth(level));
  }
}

function prunedBranch(): Cell {
  return beginCell()
    .storeUint(CellType.PrunedBranch, 8)
    .storeUint(1, 8)
    .storeBuffer(Buffer.alloc(32, 7))
    .storeUint(3, 16)
    .endCell({ exotic: true });
}

describe("Cell", () => {
  it("hashes the empty cell", () => {
    expect(Cell.EMPTY.hash().toString("hex")).toBe(EMPTY_CELL_HASH);
    expect(beginCell().endCell().equals(Cell.EMPTY)).toBe(true);
    expect(Cell.EMPTY.depth()).toBe(0);
  });

  it("hashes like @ton/core", () => {
    const destination = testAddress(9);
    const text = "snake ".repeat(60);
    const ours = beginCell()
      .storeUint(0xdeadbeef, 32)
      .storeInt(-5, 7)
      .storeCoins(123456789n)
      .storeAddress(destination)
      .storeBit(true)
      .storeRef(beginCell().storeStringTail(text))
      .endCell();
    const theirs = coreBeginCell()
      .storeUint(0xdeadbeef, 32)
      .storeInt(-5, 7)
      .storeCoins(123456789n)
      .storeAddress(CoreAddress.parseRaw(destination.toRawString()))
      .storeBit(true)
      .storeRef(coreBeginCell().storeStringTail(text))
      .endCell();

    expect(ours.hash().toString("hex")).toBe(theirs.hash().toString("hex"));
    expect(ours.depth()).toBe(theirs.depth());
  });

  it("tracks depth and rejects graphs deeper than the limit", () => {
    let cell = Cell.EMPTY;
    for (let i = 0; i < MAX_CELL_DEPTH; i++) {
      cell = beginCell().storeRef(cell).endCell();
    }
    expect(cell.depth()).toBe(MAX_CELL_DEPTH);

    const deepest = cell;
    expectCode(
      () => beginCell().storeRef(deepest).endCell(),
      EncodingError,
      "DepthExceeded",
    );
  });

  it("rejects more than 1023 bits or 4 refs", () => {
    expectCode(
      () => new Cell({ bits: new BitString(Buffer.alloc(128), 0, 1024) }),
      EncodingError,
      "CapacityExceeded",
    );
    const refs = [1, 2, 3, 4, 5].map(() => Cell.EMPTY);
    expectCode(() => new Cell({ refs }), EncodingError, "CapacityExceeded");
  });

  it("prints cells in fift notation", () => {
    const cell = beginCell()
      .storeUint(0xab, 8)
      .storeRef(beginCell().storeUint(1, 4))
      .endCell();
    expect(cell.toString()).toBe("x{AB}\n x{1}");
    expect(beginCell().storeUint(5, 3).endCell().toString()).toBe("x{B_}");
  });

  describe("exotic cells", () => {
    it("computes the level of a pruned branch and its parents", () => {
      const pruned = prunedBranch();
      expect(pruned.type).toBe(CellType.PrunedBranch);
      expect(pruned.isExotic).toBe(true);
      expect(pruned.levelMask).toBe(1);
      expect(pruned.level).toBe(1);

      const parent = beginCell().storeRef(pruned).endCell();
      expect(parent.isExotic).toBe(false);
      expect(parent.levelMask).toBe(1);
      expect(parent.descriptors().toString("hex")).toBe("2100");
    });

    it("reports the stored hash and depth below a pruned branch", () => {
      const pruned = prunedBranch();
      expect(pruned.hash(0)).toEqual(Buffer.alloc(32, 7));
      expect(pruned.depth(0)).toBe(3);
      expect(pruned.depth(1)).toBe(0);
      expect(pruned.hash(1).equals(pruned.hash())).toBe(true);

      const parent = beginCell().storeUint(0xab, 8).storeRef(pruned).endCell();
      expect(parent.depth(0)).toBe(4);
      expect(parent.depth(1)).toBe(1);
      expect(parent.hash(0).equals(parent.hash(1))).toBe(false);
    });

    it("hashes pruned subtrees and merkle proofs like @ton/core", () => {
      const pruned = coreBeginCell()
        .storeUint(CellType.PrunedBranch, 8)
        .storeUint(1, 8)
        .storeBuffer(Buffer.alloc(32, 7))
        .storeUint(3, 16)
        .endCell({ exotic: true });
      const parent = coreBeginCell()
        .storeUint(0xab, 8)
        .storeRef(pruned)
        .storeRef(coreBeginCell().storeUint(1, 32))
        .endCell();
      const proof = convertToMerkleProof(parent);

      for (const theirs of [pruned, parent, proof]) {
        const ours = fromCore(theirs);
        expectSameLevels(ours, theirs);
        expect(cellFromBoc(serializeBoc(ours)).equals(ours)).toBe(true);
      }
      expect(fromCore(proof).levelMask).toBe(0);
    });

    it("hashes merkle updates like @ton/core", () => {
      const before = beginCell().storeUint(0xab, 8).storeRef(prunedBranch()).endCell();
      const after = beginCell().storeUint(0xcd, 8).storeRef(prunedBranch()).endCell();
      const update = beginCell()
        .storeUint(CellType.MerkleUpdate, 8)
        .storeBuffer(before.hash(0))
        .storeBuffer(after.hash(0))
        .storeUint(before.depth(0), 16)
        .storeUint(after.depth(0), 16)
        .storeRef(before)
        .storeRef(after)
        .endCell({ exotic: true });

      expect(update.type).toBe(CellType.MerkleUpdate);
      expect(update.levelMask).toBe(0);
      expectSameLevels(update, CoreCell.fromBoc(serializeBoc(update))[0]);
    });

    it("rejects merkle proofs that misstate their ref", () => {
      const inner = beginCell().storeUint(1, 8).endCell();
      expectCode(
        () =>
          beginCell()
            .storeUint(CellType.MerkleProof, 8)
            .storeBuffer(Buffer.alloc(32))
            .storeUint(inner.depth(0), 16)
            .storeRef(inner)
            .endCell({ exotic: true }),
        EncodingError,
        "InvalidExoticCell",
      );
      expectCode(
        () =>
          beginCell()
            .storeUint(CellType.MerkleProof, 8)
            .storeBuffer(inner.hash(0))
            .storeUint(5, 16)
            .storeRef(inner)
            .endCell({ exotic: true }),
        EncodingError,
        "InvalidExoticCell",
      );
    });

    it("accepts library cells", () => {
      const library = beginCell()
        .storeUint(CellType.Library, 8)
        .storeBuffer(Buffer.alloc(32, 1))
        .endCell({ exotic: true });
      expect(library.type).toBe(CellType.Library);
      expect(library.levelMask).toBe(0);
    });

    it("rejects malformed layouts", () => {
      expectCode(
        () =>
          beginCell().storeUint(1, 8).storeUint(0, 8).endCell({ exotic: true }),
        EncodingError,
        "InvalidExoticCell",
      );
      expectCode(
        () => beginCell().storeUint(9, 8).endCell({ exotic: true }),
        EncodingError,
        "InvalidExoticCell",
      );
      expectCode(
        () => beginCell().storeUint(2, 8).endCell({ exotic: true }),
        EncodingError,
        "InvalidExoticCell",
      );
    });

    it("is parsed only on request", () => {
      const pruned = prunedBranch();
      expectCode(() => pruned.beginParse(), EncodingError, "InvalidExoticCell");
      expect(pruned.beginParse(true).loadUint(8)).toBe(CellType.PrunedBranch);
    });
  });
});

describe("Builder", () => {
  it("checks value widths", () => {
    expectCode(() => beginCell().storeUint(256, 8), EncodingError, "ValueOutOfRange");
    expectCode(() => beginCell().storeUint(-1, 8), EncodingError, "ValueOutOfRange");
    expectCode(() => beginCell().storeInt(128, 8), EncodingError, "ValueOutOfRange");
    expectCode(() => beginCell().storeInt(-129, 8), EncodingError, "ValueOutOfRange");
    expectCode(
      () => beginCell().storeUint(2 ** 60, 64),
      EncodingError,
      "ValueOutOfRange",
    );
    expect(beginCell().storeInt(-128, 8).storeInt(127, 8).bits).toBe(16);
  });

  it("stops at the bit and ref capacity", () => {
    const full = beginCell().storeUint(0, 1023);
    expect(full.availableBits).toBe(0);
    expectCode(() => full.storeBit(1), EncodingError, "CapacityExceeded");

    const refs = beginCell();
    for (let i = 0; i < 4; i++) {
      refs.storeRef(Cell.EMPTY);
    }
    expectCode(() => refs.storeRef(Cell.EMPTY), EncodingError, "CapacityExceeded");
  });

  it("encodes coins as a length-prefixed value", () => {
    expect(beginCell().storeCoins(0).bits).toBe(4);
    expect(beginCell().storeCoins(1000).bits).toBe(4 + 16);
    const max = (1n << 120n) - 1n;
    expect(beginCell().storeCoins(max).endCell().beginParse().loadCoins()).toBe(max);
    expectCode(() => beginCell().storeCoins(1n << 120n), EncodingError, "ValueOutOfRange");
    expectCode(() => beginCell().storeCoins(-1n), EncodingError, "ValueOutOfRange");
  });

  it("checks fixed-size buffers", () => {
    expectCode(
      () => beginCell().storeBuffer(Buffer.alloc(31), 32),
      EncodingError,
      "ValueOutOfRange",
    );
  });

  it("splits long strings into a chain of refs", () => {
    const text = "a".repeat(300);
    const cell = beginCell().storeStringTail(text).endCell();
    expect(cell.bits.length).toBe(127 * 8);
    expect(cell.refs).toHaveLength(1);
    expect(cell.refs[0].bits.length).toBe(127 * 8);
    expect(cell.refs[0].refs[0].bits.length).toBe(46 * 8);
    expect(cell.beginParse().loadStringTail()).toBe(text);
  });

  it("keeps multi-byte text intact across cells", () => {
    const text = "привет, мир ".repeat(20);
    const cell = beginCell().storeUint(0, 32).storeStringTail(text).endCell();
    const slice = cell.beginParse();
    slice.skip(32);
    expect(slice.loadStringTail()).toBe(text);
  });

  it("appends slices and builders with their refs", () => {
    const inner = beginCell().storeUint(0xf, 4).storeRef(Cell.EMPTY);
    const cell = beginCell().storeUint(1, 4).storeBuilder(inner).endCell();
    expect(cell.bits.length).toBe(8);
    expect(cell.refs).toHaveLength(1);
    expect(cell.beginParse().loadUint(8)).toBe(0x1f);
  });
});

describe("Slice", () => {
  it("reads back what was written", () => {
    const address = testAddress(3, -1);
    const slice = beginCell()
      .storeInt(-5, 8)
      .storeUint(42, 16)
      .storeCoins(10n ** 18n)
      .storeAddress(address)
      .storeAddress(null)
      .storeMaybeRef(null)
      .storeMaybeRef(Cell.EMPTY)
      .endCell()
      .beginParse();

    expect(slice.loadInt(8)).toBe(-5);
    expect(slice.preloadUint(16)).toBe(42);
    expect(slice.loadUint(16)).toBe(42);
    expect(slice.loadCoins()).toBe(10n ** 18n);
    expect(slice.loadAddress().equals(address)).toBe(true);
    expect(slice.loadMaybeAddress()).toBeNull();
    expect(slice.loadMaybeRef()).toBeNull();
    expect(slice.loadMaybeRef()?.equals(Cell.EMPTY)).toBe(true);
    slice.endParse();
  });

  it("fails on reads past the end", () => {
    const slice = beginCell().storeUint(1, 32).endCell().beginParse();
    expectCode(() => slice.loadUint(33), DecodingError, "BufferUnderrun");
    expectCode(() => slice.loadRef(), DecodingError, "NoSuchRef");
    expectCode(() => slice.preloadRef(0), DecodingError, "NoSuchRef");
    expect(slice.remainingBits).toBe(32);
  });

  it("refuses to finish with unread data", () => {
    const slice = beginCell().storeUint(1, 8).endCell().beginParse();
    expectCode(() => slice.endParse(), DecodingError, "TrailingData");
  });
});
