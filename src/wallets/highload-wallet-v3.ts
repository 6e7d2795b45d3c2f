import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { VariantError } from "../errors";
import {
  contractAddress,
  internalMessageToCell,
  storeOutList,
} from "../messages/message";
import { Op } from "../messages/op-codes";
import { SendMode, type TStateInit, type TTransferMessage } from "../messages/types";
import { walletCode } from "./codes";
import {
  type IWalletContract,
  type TSigningArgs,
  type TWalletData,
  type TWalletInitParams,
  WalletVariant,
} from "./types";
import {
  requireQueryId,
  signatureWithPayloadRef,
  toOutAction,
} from "./wallet.utils";

export const HIGHLOAD_DEFAULT_SUBWALLET_ID = 0x10ad;
export const HIGHLOAD_DEFAULT_TIMEOUT = 3600;

const MAX_TIMEOUT = (1 << 22) - 1;

/**
 * Highload wallet v3: replay protection through query ids that stay
 * reserved for `timeout` seconds after `created_at`. A batch is delivered by
 * an internal_transfer the wallet sends to itself.
 */
export class HighloadWalletV3 implements IWalletContract {
  readonly variant: WalletVariant = WalletVariant.HighloadV3;
  readonly maxMessages = 254;
  readonly sequencing = "query-id";

  defaultSubwalletId(): number {
    return HIGHLOAD_DEFAULT_SUBWALLET_ID;
  }

  code(): Cell {
    return walletCode(this.variant);
  }

  buildData(params: TWalletInitParams): Cell {
    const timeout = params.timeout ?? HIGHLOAD_DEFAULT_TIMEOUT;
    if (!Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_TIMEOUT) {
      throw new VariantError(
        "InvalidValidityWindow",
        `timeout ${timeout} is out of 1..${MAX_TIMEOUT}`,
      );
    }
    return beginCell()
      .storeBuffer(params.publicKey, 32)
      .storeUint(params.subwalletId ?? this.defaultSubwalletId(), 32)
      .storeDict(null) // old queries
      .storeDict(null) // queries
      .storeUint(0, 64) // last clean time
      .storeUint(timeout, 22)
      .endCell();
  }

  stateInit(params: TWalletInitParams): TStateInit {
    return { code: this.code(), data: this.buildData(params) };
  }

  deriveAddress(params: TWalletInitParams): Address {
    return contractAddress(params.workchain, this.stateInit(params));
  }

  buildSigningPayload(args: TSigningArgs): Cell {
    const { queryId, createdAt, timeout } = requireQueryId(args);
    const { message, mode } = this.packMessages(args);
    return beginCell()
      .storeUint(args.subwalletId, 32)
      .storeRef(message)
      .storeUint(mode, 8)
      .storeUint(queryId.queryId, 23)
      .storeUint(createdAt, 64)
      .storeUint(timeout, 22)
      .endCell();
  }

  packSignedBody(signature: Buffer, payload: Cell): Cell {
    return signatureWithPayloadRef(signature, payload);
  }

  parseData(data: Cell): TWalletData {
    const slice = data.beginParse();
    const publicKey = slice.loadBuffer(32);
    const subwalletId = slice.loadUint(32);
    slice.loadMaybeRef();
    slice.loadMaybeRef();
    slice.skip(64);
    const timeout = slice.loadUint(22);
    slice.endParse();
    return { publicKey, subwalletId, timeout };
  }

  private packMessages(args: TSigningArgs): { message: Cell; mode: number } {
    if (args.messages.length === 1) {
      const action = toOutAction(args.messages[0]);
      return { message: action.message, mode: action.mode };
    }

    const { queryId } = requireQueryId(args);
    const value = args.internalValue ?? 0n;
    const transfer: TTransferMessage = {
      to: args.address,
      value,
      body: beginCell()
        .storeUint(Op.highloadInternalTransfer, 32)
        .storeUint(queryId.queryId, 64)
        .storeRef(storeOutList(args.messages.map(toOutAction)))
        .endCell(),
    };
    return {
      message: internalMessageToCell(transfer),
      mode: value > 0n ? SendMode.PAY_GAS_SEPARATELY : SendMode.CARRY_ALL_REMAINING_BALANCE,
    };
  }
}
