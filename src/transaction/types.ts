import type { Address } from "../address/address";
import type { Cell } from "../cell/cell";
import type { TStateInit } from "../messages/types";
import type { HighloadQueryId, QueryIdWindow } from "../wallets/highload-query-id";
import type { TSequence, WalletVariant } from "../wallets/types";

export type TAssembleOptions = {
  /** caller's clock, unix seconds */
  now: number;
  /** seqno wallets; defaults to `now + DEFAULT_TTL` */
  validUntil?: number;
  /** highload; defaults to the smallest free id of the wallet's window */
  queryId?: HighloadQueryId | number;
  /** highload; defaults to `now` */
  createdAt?: number;
  /** highload batches */
  internalValue?: bigint;
};

export type TReservation = {
  window: QueryIdWindow;
  queryId: HighloadQueryId;
  expiresAt: number;
};

export type TPreparedTransaction = {
  variant: WalletVariant;
  address: Address;
  publicKey: Buffer;
  sequence: TSequence;
  validUntil: number;
  /** cell whose hash is signed */
  payload: Cell;
  /** signing hash */
  hash: Buffer;
  init?: TStateInit;
  reservation?: TReservation;
};

export type TSignedTransaction = {
  variant: WalletVariant;
  address: Address;
  sequence: TSequence;
  validUntil: number;
  payload: Cell;
  body: Cell;
  /** external message */
  message: Cell;
  boc: Buffer;
  /** external message hash */
  hash: Buffer;
};
