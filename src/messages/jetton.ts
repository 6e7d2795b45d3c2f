import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { Op } from "./op-codes";

export type TJettonTransfer = {
  queryId?: bigint;
  amount: bigint;
  destination: Address;
  responseDestination?: Address | null;
  customPayload?: Cell | null;
  forwardTonAmount?: bigint;
  forwardPayload?: Cell | null;
};

/** Body sent to the sender's own jetton wallet. */
export function jettonTransferToCell(params: TJettonTransfer): Cell {
  return beginCell()
    .storeUint(Op.jettonTransfer, 32)
    .storeUint(params.queryId ?? 0n, 64)
    .storeCoins(params.amount)
    .storeAddress(params.destination)
    .storeAddress(params.responseDestination ?? null)
    .storeMaybeRef(params.customPayload)
    .storeCoins(params.forwardTonAmount ?? 0n)
    .storeMaybeRef(params.forwardPayload)
    .endCell();
}

export type TJettonBurn = {
  queryId?: bigint;
  amount: bigint;
  responseDestination?: Address | null;
  customPayload?: Cell | null;
};

export function jettonBurnToCell(params: TJettonBurn): Cell {
  return beginCell()
    .storeUint(Op.jettonBurn, 32)
    .storeUint(params.queryId ?? 0n, 64)
    .storeCoins(params.amount)
    .storeAddress(params.responseDestination ?? null)
    .storeMaybeRef(params.customPayload)
    .endCell();
}
