import { type Builder, beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { VariantError } from "../errors";
import { internalMessageToCell } from "../messages/message";
import { DEFAULT_SEND_MODE, type TOutAction, type TTransferMessage } from "../messages/types";
import type { TSequence, TSigningArgs } from "./types";

/** Written instead of a deadline while the wallet is not yet deployed. */
export const NO_EXPIRATION = 0xffffffff;

export function requireSeqno(args: TSigningArgs): number {
  if (args.sequence.kind !== "seqno") {
    throw new VariantError("InvalidSequence", "this wallet is sequenced by seqno");
  }
  return args.sequence.seqno;
}

export function requireQueryId(
  args: TSigningArgs,
): Extract<TSequence, { kind: "query-id" }> {
  if (args.sequence.kind !== "query-id") {
    throw new VariantError("InvalidSequence", "this wallet is sequenced by query id");
  }
  return args.sequence;
}

export function storeValidUntil(builder: Builder, seqno: number, validUntil: number) {
  builder.storeUint(seqno === 0 ? NO_EXPIRATION : validUntil, 32);
}

export function toOutAction(message: TTransferMessage): TOutAction {
  return {
    mode: message.mode ?? DEFAULT_SEND_MODE,
    message: internalMessageToCell(message),
  };
}

/** Signature first, then the payload bits and refs inline. */
export function signatureThenPayload(signature: Buffer, payload: Cell): Cell {
  return beginCell()
    .storeBuffer(signature, 64)
    .storeSlice(payload.beginParse())
    .endCell();
}

/** Signature inline, payload behind a ref. */
export function signatureWithPayloadRef(signature: Buffer, payload: Cell): Cell {
  return beginCell().storeBuffer(signature, 64).storeRef(payload).endCell();
}
