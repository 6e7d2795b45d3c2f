import { WalletContractV3R2, WalletContractV4, WalletContractV5R1 } from "@ton/ton";
import { beginCell } from "../src/cell/builder";
import { VariantError } from "../src/errors";
import { internalMessageToCell, storeOutList } from "../src/messages/message";
import { Op } from "../src/messages/op-codes";
import { SendMode, type TTransferMessage } from "../src/messages/types";
import {
  HIGHLOAD_DEFAULT_SUBWALLET_ID,
  HIGHLOAD_DEFAULT_TIMEOUT,
  HighloadQueryId,
  QueryIdWindow,
  TESTNET_GLOBAL_ID,
  type TSequence,
  WalletVariant,
  createWalletState,
  getWalletContract,
  walletIdV5R1,
} from "../src/wallets";
import { toOutAction } from "../src/wallets/wallet.utils";
import { expectCode, golden, testAddress, testKeyPair } from "./utils";

const { publicKey } = testKeyPair();

describe("wallet contracts", () => {
  it("ships the reference code cells", () => {
    const hash = (variant: WalletVariant) =>
      getWalletContract(variant).code().hash().toString("hex");
    expect(hash(WalletVariant.V3R2)).toBe(golden.scenarioB.hash);
    expect(hash(WalletVariant.V4R2)).toBe(golden.codeHashes.v4r2);
    expect(hash(WalletVariant.HighloadV3)).toBe(golden.codeHashes.highloadV3);
    expect(hash(WalletVariant.PreprocessedV2)).toBe(golden.codeHashes.preprocessedV2);
    expect(hash(WalletVariant.V5R1)).toBe(
      WalletContractV5R1.create({ publicKey }).init.code.hash().toString("hex"),
    );
  });

  it.each([
    [WalletVariant.V3R2, WalletContractV3R2.create({ workchain: 0, publicKey })],
    [WalletVariant.V4R2, WalletContractV4.create({ workchain: 0, publicKey })],
    [WalletVariant.V5R1, WalletContractV5R1.create({ publicKey })],
  ])("derives the same %s data and address as @ton/ton", (variant, reference) => {
    const contract = getWalletContract(variant);
    const params = { publicKey, workchain: 0 };
    expect(contract.buildData(params).hash().equals(reference.init.data.hash())).toBe(true);
    expect(contract.deriveAddress(params).toRawString()).toBe(reference.address.toRawString());
  });

  it("derives known addresses", () => {
    const address = (variant: WalletVariant) =>
      createWalletState(variant, { publicKey }).address.toRawString();
    expect(address(WalletVariant.V3R2)).toBe(golden.addresses.v3r2);
    expect(address(WalletVariant.HighloadV3)).toBe(golden.addresses.highloadV3);
    expect(address(WalletVariant.PreprocessedV2)).toBe(golden.addresses.preprocessedV2);
  });

  it("computes V5R1 wallet ids", () => {
    expect(walletIdV5R1({ workchain: 0 })).toBe(2147483409);
    expect(walletIdV5R1({ workchain: 0, networkGlobalId: TESTNET_GLOBAL_ID })).toBe(
      2147483645,
    );
    expect(getWalletContract(WalletVariant.V5R1).defaultSubwalletId(0)).toBe(2147483409);
  });

  it("parses the data it builds", () => {
    for (const variant of Object.values(WalletVariant)) {
      const contract = getWalletContract(variant);
      const data = contract.parseData(contract.buildData({ publicKey, workchain: 0 }));
      expect(data.publicKey.equals(publicKey)).toBe(true);
    }

    const v4 = getWalletContract(WalletVariant.V4R2).parseData(
      beginCell()
        .storeUint(7, 32)
        .storeUint(698983191, 32)
        .storeBuffer(publicKey)
        .storeBit(0)
        .endCell(),
    );
    expect(v4).toEqual({ seqno: 7, subwalletId: 698983191, publicKey });

    const highload = getWalletContract(WalletVariant.HighloadV3).parseData(
      getWalletContract(WalletVariant.HighloadV3).buildData({
        publicKey,
        workchain: 0,
        timeout: 120,
      }),
    );
    expect(highload.subwalletId).toBe(HIGHLOAD_DEFAULT_SUBWALLET_ID);
    expect(highload.timeout).toBe(120);
  });

  it("rejects highload timeouts outside 22 bits", () => {
    const contract = getWalletContract(WalletVariant.HighloadV3);
    expectCode(
      () => contract.buildData({ publicKey, workchain: 0, timeout: 0 }),
      VariantError,
      "InvalidValidityWindow",
    );
    expectCode(
      () => contract.buildData({ publicKey, workchain: 0, timeout: 1 << 22 }),
      VariantError,
      "InvalidValidityWindow",
    );
  });
});

describe("signing payloads", () => {
  const wallet = testAddress(0xee);
  const first: TTransferMessage = { to: testAddress(1), value: 100n };
  const second: TTransferMessage = { to: testAddress(2), value: 200n, mode: SendMode.IGNORE_ERRORS };
  const seqno = (value: number): TSequence => ({ kind: "seqno", seqno: value });

  it("lays out V3R2", () => {
    const slice = getWalletContract(WalletVariant.V3R2)
      .buildSigningPayload({
        address: wallet,
        subwalletId: 698983191,
        messages: [first, second],
        sequence: seqno(3),
        validUntil: 1700000060,
      })
      .beginParse();
    expect(slice.loadUint(32)).toBe(698983191);
    expect(slice.loadUint(32)).toBe(1700000060);
    expect(slice.loadUint(32)).toBe(3);
    expect(slice.loadUint(8)).toBe(SendMode.PAY_GAS_SEPARATELY | SendMode.IGNORE_ERRORS);
    expect(slice.loadRef().equals(internalMessageToCell(first))).toBe(true);
    expect(slice.loadUint(8)).toBe(SendMode.IGNORE_ERRORS);
    expect(slice.loadRef().equals(internalMessageToCell(second))).toBe(true);
    slice.endParse();
  });

  it("writes no deadline while seqno is 0", () => {
    const slice = getWalletContract(WalletVariant.V4R2)
      .buildSigningPayload({
        address: wallet,
        subwalletId: 698983191,
        messages: [first],
        sequence: seqno(0),
        validUntil: 1700000060,
      })
      .beginParse();
    slice.skip(32);
    expect(slice.loadUint(32)).toBe(0xffffffff);
    expect(slice.loadUint(32)).toBe(0);
    expect(slice.loadUint(8)).toBe(0);
  });

  it("lays out V5R1 with the out list in reverse", () => {
    const payload = getWalletContract(WalletVariant.V5R1).buildSigningPayload({
      address: wallet,
      subwalletId: 2147483409,
      messages: [first, second],
      sequence: seqno(4),
      validUntil: 1700000060,
    });
    const slice = payload.beginParse();
    expect(slice.loadUint(32)).toBe(Op.walletV5Signed);
    expect(slice.loadInt(32)).toBe(2147483409);
    expect(slice.loadUint(32)).toBe(1700000060);
    expect(slice.loadUint(32)).toBe(4);
    const outList = slice.loadMaybeRef();
    expect(slice.loadBit()).toBe(false);
    slice.endParse();

    expect(outList?.equals(storeOutList([toOutAction(second), toOutAction(first)]))).toBe(true);
  });

  it("rejects the wrong kind of sequence", () => {
    expectCode(
      () =>
        getWalletContract(WalletVariant.V3R2).buildSigningPayload({
          address: wallet,
          subwalletId: 1,
          messages: [first],
          sequence: {
            kind: "query-id",
            queryId: HighloadQueryId.fromQueryId(1),
            createdAt: 1,
            timeout: 10,
          },
          validUntil: 11,
        }),
      VariantError,
      "InvalidSequence",
    );
  });

  describe("highload v3", () => {
    const contract = getWalletContract(WalletVariant.HighloadV3);
    const sequence: TSequence = {
      kind: "query-id",
      queryId: HighloadQueryId.fromQueryId(100),
      createdAt: 1700000000,
      timeout: HIGHLOAD_DEFAULT_TIMEOUT,
    };

    it("sends a single message directly", () => {
      const slice = contract
        .buildSigningPayload({
          address: wallet,
          subwalletId: HIGHLOAD_DEFAULT_SUBWALLET_ID,
          messages: [first],
          sequence,
          validUntil: 1700003600,
        })
        .beginParse();
      expect(slice.loadUint(32)).toBe(HIGHLOAD_DEFAULT_SUBWALLET_ID);
      expect(slice.loadRef().equals(internalMessageToCell(first))).toBe(true);
      expect(slice.loadUint(8)).toBe(SendMode.PAY_GAS_SEPARATELY | SendMode.IGNORE_ERRORS);
      expect(slice.loadUint(23)).toBe(100);
      expect(slice.loadUint(64)).toBe(1700000000);
      expect(slice.loadUint(22)).toBe(HIGHLOAD_DEFAULT_TIMEOUT);
      slice.endParse();
    });

    it("wraps a batch into an internal transfer to itself", () => {
      const args = {
        address: wallet,
        subwalletId: HIGHLOAD_DEFAULT_SUBWALLET_ID,
        messages: [first, second],
        sequence,
        validUntil: 1700003600,
      };
      const transfer = (value: bigint) =>
        internalMessageToCell({
          to: wallet,
          value,
          body: beginCell()
            .storeUint(Op.highloadInternalTransfer, 32)
            .storeUint(100, 64)
            .storeRef(storeOutList([toOutAction(first), toOutAction(second)]))
            .endCell(),
        });

      const free = contract.buildSigningPayload(args).beginParse();
      free.skip(32);
      expect(free.loadRef().equals(transfer(0n))).toBe(true);
      expect(free.loadUint(8)).toBe(SendMode.CARRY_ALL_REMAINING_BALANCE);

      const paid = contract
        .buildSigningPayload({ ...args, internalValue: 10_000_000n })
        .beginParse();
      paid.skip(32);
      expect(paid.loadRef().equals(transfer(10_000_000n))).toBe(true);
      expect(paid.loadUint(8)).toBe(SendMode.PAY_GAS_SEPARATELY);
    });
  });

  describe("preprocessed v2", () => {
    const contract = getWalletContract(WalletVariant.PreprocessedV2);

    it("signs a standalone payload cell", () => {
      const payload = contract.buildSigningPayload({
        address: wallet,
        subwalletId: 0,
        messages: [first],
        sequence: seqno(9),
        validUntil: 1700000060,
      });
      const slice = payload.beginParse();
      expect(slice.loadUint(64)).toBe(1700000060);
      expect(slice.loadUint(16)).toBe(9);
      expect(slice.loadRef().equals(storeOutList([toOutAction(first)]))).toBe(true);
      slice.endParse();

      const body = contract.packSignedBody(Buffer.alloc(64, 1), payload);
      expect(body.bits.length).toBe(512);
      expect(body.refs[0].equals(payload)).toBe(true);
    });

    it("keeps seqno within 16 bits", () => {
      expectCode(
        () =>
          contract.buildSigningPayload({
            address: wallet,
            subwalletId: 0,
            messages: [first],
            sequence: seqno(0x10000),
            validUntil: 1700000060,
          }),
        VariantError,
        "InvalidSequence",
      );
    });
  });
});

describe("HighloadQueryId", () => {
  it("splits ids into shift and bit number", () => {
    const id = HighloadQueryId.fromQueryId(100);
    expect(id.shift).toBe(0);
    expect(id.bitNumber).toBe(100);

    const rolled = HighloadQueryId.fromSeqno(1023);
    expect(rolled.shift).toBe(1);
    expect(rolled.bitNumber).toBe(0);
    expect(rolled.queryId).toBe(1024);
    expect(rolled.toSeqno()).toBe(1023);
  });

  it("walks the id space in order", () => {
    const next = HighloadQueryId.fromShiftAndBitNumber(0, 1022).next();
    expect(next.equals(HighloadQueryId.fromShiftAndBitNumber(1, 0))).toBe(true);

    const last = HighloadQueryId.fromShiftAndBitNumber(8191, 1022);
    expect(last.hasNext()).toBe(false);
    expectCode(() => last.next(), VariantError, "InvalidSequence");
  });

  it("rejects bit number 1023", () => {
    expectCode(() => HighloadQueryId.fromQueryId(1023), VariantError, "InvalidSequence");
  });
});

describe("QueryIdWindow", () => {
  it("holds ids until expiry or confirmation", () => {
    const window = new QueryIdWindow();
    const id = HighloadQueryId.fromQueryId(0);
    window.reserve(id, 1010, 1000);

    expect(window.isAvailable(id, 1009)).toBe(false);
    expect(window.next(1000).queryId).toBe(1);
    expectCode(() => window.reserve(id, 1020, 1005), VariantError, "QueryIdInUse");

    expect(window.isAvailable(id, 1010)).toBe(true);
    window.reserve(id, 1030, 1010);
    window.confirm(id);
    expect(window.isAvailable(id, 1011)).toBe(true);
  });

  it("prunes expired reservations", () => {
    const window = new QueryIdWindow();
    window.reserve(HighloadQueryId.fromQueryId(1), 100, 0);
    window.reserve(HighloadQueryId.fromQueryId(2), 200, 0);
    window.prune(150);
    expect(window.size).toBe(1);
    window.release(HighloadQueryId.fromQueryId(2));
    expect(window.size).toBe(0);
  });
});
