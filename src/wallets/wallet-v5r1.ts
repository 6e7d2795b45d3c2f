import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { contractAddress, storeOutList } from "../messages/message";
import { Op } from "../messages/op-codes";
import type { TStateInit } from "../messages/types";
import { walletCode } from "./codes";
import {
  type IWalletContract,
  type TSigningArgs,
  type TWalletData,
  type TWalletInitParams,
  WalletVariant,
} from "./types";
import { requireSeqno, storeValidUntil, toOutAction } from "./wallet.utils";

export const MAINNET_GLOBAL_ID = -239;
export const TESTNET_GLOBAL_ID = -3;

const WALLET_VERSION = 0;

export type TWalletIdV5R1 = {
  networkGlobalId?: number;
  workchain: number;
  subwalletNumber?: number;
};

/**
 * `network_global_id XOR context`, where the client context packs
 * `1 ‖ workchain:int8 ‖ version:uint8 ‖ subwallet_number:uint15` into an int32.
 */
export function walletIdV5R1(id: TWalletIdV5R1): number {
  const context = beginCell()
    .storeUint(1, 1)
    .storeInt(id.workchain, 8)
    .storeUint(WALLET_VERSION, 8)
    .storeUint(id.subwalletNumber ?? 0, 15)
    .endCell()
    .beginParse()
    .loadInt(32);
  return (id.networkGlobalId ?? MAINNET_GLOBAL_ID) ^ context;
}

export class WalletV5R1 implements IWalletContract {
  readonly variant: WalletVariant = WalletVariant.V5R1;
  readonly maxMessages = 255;
  readonly sequencing = "seqno";

  /** Mainnet wallet id; testnet wallets pass `walletIdV5R1` explicitly. */
  defaultSubwalletId(workchain: number): number {
    return walletIdV5R1({ workchain });
  }

  code(): Cell {
    return walletCode(this.variant);
  }

  buildData(params: TWalletInitParams): Cell {
    return beginCell()
      .storeBit(1) // signature allowed
      .storeUint(0, 32)
      .storeInt(params.subwalletId ?? this.defaultSubwalletId(params.workchain), 32)
      .storeBuffer(params.publicKey, 32)
      .storeDict(null)
      .endCell();
  }

  stateInit(params: TWalletInitParams): TStateInit {
    return { code: this.code(), data: this.buildData(params) };
  }

  deriveAddress(params: TWalletInitParams): Address {
    return contractAddress(params.workchain, this.stateInit(params));
  }

  buildSigningPayload(args: TSigningArgs): Cell {
    const seqno = requireSeqno(args);
    const builder = beginCell()
      .storeUint(Op.walletV5Signed, 32)
      .storeInt(args.subwalletId, 32);
    storeValidUntil(builder, seqno, args.validUntil);
    builder.storeUint(seqno, 32);

    const actions = args.messages.map(toOutAction).reverse();
    return builder
      .storeMaybeRef(actions.length > 0 ? storeOutList(actions) : null)
      .storeBit(0) // no extended actions
      .endCell();
  }

  packSignedBody(signature: Buffer, payload: Cell): Cell {
    return beginCell()
      .storeSlice(payload.beginParse())
      .storeBuffer(signature, 64)
      .endCell();
  }

  parseData(data: Cell): TWalletData {
    const slice = data.beginParse();
    slice.skip(1);
    const seqno = slice.loadUint(32);
    const subwalletId = slice.loadInt(32);
    const publicKey = slice.loadBuffer(32);
    slice.loadMaybeRef(); // extensions
    slice.endParse();
    return { seqno, subwalletId, publicKey };
  }
}
