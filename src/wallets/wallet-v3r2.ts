import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { contractAddress } from "../messages/message";
import type { TStateInit } from "../messages/types";
import { walletCode } from "./codes";
import {
  type IWalletContract,
  type TSigningArgs,
  type TWalletData,
  type TWalletInitParams,
  WalletVariant,
} from "./types";
import {
  requireSeqno,
  signatureThenPayload,
  storeValidUntil,
  toOutAction,
} from "./wallet.utils";

export const DEFAULT_WALLET_ID = 698983191;

export class WalletV3R2 implements IWalletContract {
  readonly variant: WalletVariant = WalletVariant.V3R2;
  readonly maxMessages = 4;
  readonly sequencing = "seqno";

  defaultSubwalletId(workchain: number): number {
    return DEFAULT_WALLET_ID + workchain;
  }

  code(): Cell {
    return walletCode(this.variant);
  }

  buildData(params: TWalletInitParams): Cell {
    return beginCell()
      .storeUint(0, 32)
      .storeUint(params.subwalletId ?? this.defaultSubwalletId(params.workchain), 32)
      .storeBuffer(params.publicKey, 32)
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
    const builder = beginCell().storeUint(args.subwalletId, 32);
    storeValidUntil(builder, seqno, args.validUntil);
    builder.storeUint(seqno, 32);
    for (const action of args.messages.map(toOutAction)) {
      builder.storeUint(action.mode, 8).storeRef(action.message);
    }
    return builder.endCell();
  }

  packSignedBody(signature: Buffer, payload: Cell): Cell {
    return signatureThenPayload(signature, payload);
  }

  parseData(data: Cell): TWalletData {
    const slice = data.beginParse();
    const seqno = slice.loadUint(32);
    const subwalletId = slice.loadUint(32);
    const publicKey = slice.loadBuffer(32);
    slice.endParse();
    return { seqno, subwalletId, publicKey };
  }
}
