import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { VariantError } from "../errors";
import { contractAddress, storeOutList } from "../messages/message";
import type { TStateInit } from "../messages/types";
import { walletCode } from "./codes";
import {
  type IWalletContract,
  type TSigningArgs,
  type TWalletData,
  type TWalletInitParams,
  WalletVariant,
} from "./types";
import { requireSeqno, signatureWithPayloadRef, toOutAction } from "./wallet.utils";

const MAX_SEQNO = 0xffff;

/**
 * Minimal wallet with a 16-bit seqno and no subwallet id. The signed payload
 * is a standalone cell, so it can be prepared and signed offline.
 */
export class PreprocessedWalletV2 implements IWalletContract {
  readonly variant: WalletVariant = WalletVariant.PreprocessedV2;
  readonly maxMessages = 255;
  readonly sequencing = "seqno";

  defaultSubwalletId(): number {
    return 0;
  }

  code(): Cell {
    return walletCode(this.variant);
  }

  buildData(params: TWalletInitParams): Cell {
    return beginCell()
      .storeBuffer(params.publicKey, 32)
      .storeUint(0, 16)
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
    if (seqno > MAX_SEQNO) {
      throw new VariantError("InvalidSequence", `seqno ${seqno} does not fit 16 bits`);
    }
    return beginCell()
      .storeUint(args.validUntil, 64)
      .storeUint(seqno, 16)
      .storeRef(storeOutList(args.messages.map(toOutAction)))
      .endCell();
  }

  packSignedBody(signature: Buffer, payload: Cell): Cell {
    return signatureWithPayloadRef(signature, payload);
  }

  parseData(data: Cell): TWalletData {
    const slice = data.beginParse();
    const publicKey = slice.loadBuffer(32);
    const seqno = slice.loadUint(16);
    slice.endParse();
    return { publicKey, seqno };
  }
}
