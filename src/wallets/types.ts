import type { Address } from "../address/address";
import type { Cell } from "../cell/cell";
import type { TStateInit, TTransferMessage } from "../messages/types";
import type { HighloadQueryId, QueryIdWindow } from "./highload-query-id";

export enum WalletVariant {
  V3R2 = "v3r2",
  V4R2 = "v4r2",
  V5R1 = "v5r1",
  HighloadV3 = "highload-v3",
  PreprocessedV2 = "preprocessed-v2",
}

export type TSequencing = "seqno" | "query-id";

export type TSequence =
  | { kind: "seqno"; seqno: number }
  | {
      kind: "query-id";
      queryId: HighloadQueryId;
      createdAt: number;
      timeout: number;
    };

export type TWalletInitParams = {
  publicKey: Buffer;
  workchain: number;
  subwalletId?: number;
  /** highload only, seconds */
  timeout?: number;
};

export type TSigningArgs = {
  address: Address;
  subwalletId: number;
  messages: readonly TTransferMessage[];
  sequence: TSequence;
  /** unix seconds */
  validUntil: number;
  /** highload only: value attached to the internal_transfer wrapping a batch */
  internalValue?: bigint;
};

export type TWalletData = {
  publicKey: Buffer;
  seqno?: number;
  subwalletId?: number;
  timeout?: number;
};

/**
 * Layout of one wallet contract version. Implementations are stateless and
 * selected by `WalletVariant` through the registry.
 */
export interface IWalletContract {
  readonly variant: WalletVariant;
  readonly maxMessages: number;
  readonly sequencing: TSequencing;

  defaultSubwalletId(workchain: number): number;
  code(): Cell;
  buildData(params: TWalletInitParams): Cell;
  stateInit(params: TWalletInitParams): TStateInit;
  deriveAddress(params: TWalletInitParams): Address;

  /** The cell whose hash is signed. */
  buildSigningPayload(args: TSigningArgs): Cell;
  packSignedBody(signature: Buffer, payload: Cell): Cell;

  parseData(data: Cell): TWalletData;
}

export type TWalletState = {
  variant: WalletVariant;
  address: Address;
  publicKey: Buffer;
  workchain: number;
  subwalletId: number;
  /** last known value, may be stale */
  seqno: number;
  deployed?: boolean;
  codeHash?: Buffer;
  balance?: bigint;
  timeout?: number;
  queryWindow?: QueryIdWindow;
};
