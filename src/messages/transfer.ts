import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { Op } from "./op-codes";
import { type TStateInit, type TTransferMessage } from "./types";

export function commentToCell(text: string): Cell {
  return beginCell()
    .storeUint(Op.comment, 32)
    .storeStringTail(text)
    .endCell();
}

/** Reads a text comment body; null when the body is not a comment. */
export function parseComment(body: Cell): string | null {
  const slice = body.beginParse();
  if (slice.remainingBits < 32 || slice.loadUint(32) !== Op.comment) {
    return null;
  }
  return slice.loadStringTail();
}

export type TTonTransfer = {
  to: Address;
  value: bigint;
  comment?: string;
  bounce?: boolean;
  mode?: number;
  init?: TStateInit;
};

export function tonTransfer(params: TTonTransfer): TTransferMessage {
  return {
    to: params.to,
    value: params.value,
    bounce: params.bounce,
    mode: params.mode,
    init: params.init,
    body: params.comment !== undefined ? commentToCell(params.comment) : undefined,
  };
}
