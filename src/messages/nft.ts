import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { Op } from "./op-codes";

export type TNftTransfer = {
  queryId?: bigint;
  newOwner: Address;
  responseDestination?: Address | null;
  customPayload?: Cell | null;
  forwardAmount?: bigint;
  forwardPayload?: Cell | null;
};

export function nftTransferToCell(params: TNftTransfer): Cell {
  return beginCell()
    .storeUint(Op.nftTransfer, 32)
    .storeUint(params.queryId ?? 0n, 64)
    .storeAddress(params.newOwner)
    .storeAddress(params.responseDestination ?? null)
    .storeMaybeRef(params.customPayload)
    .storeCoins(params.forwardAmount ?? 0n)
    .storeMaybeRef(params.forwardPayload)
    .endCell();
}
