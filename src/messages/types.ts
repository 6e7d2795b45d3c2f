import type { Address } from "../address/address";
import type { Cell } from "../cell/cell";

export const SendMode = {
  NONE: 0,
  PAY_GAS_SEPARATELY: 1,
  IGNORE_ERRORS: 2,
  DESTROY_ACCOUNT_IF_ZERO: 32,
  CARRY_ALL_REMAINING_INCOMING_VALUE: 64,
  CARRY_ALL_REMAINING_BALANCE: 128,
} as const;

export const DEFAULT_SEND_MODE =
  SendMode.PAY_GAS_SEPARATELY | SendMode.IGNORE_ERRORS;

export type TStateInit = {
  code: Cell;
  data: Cell;
};

export type TTransferMessage = {
  to: Address;
  /** nanotons */
  value: bigint;
  bounce?: boolean;
  body?: Cell;
  init?: TStateInit;
  mode?: number;
};

export type TOutAction = {
  mode: number;
  message: Cell;
};
