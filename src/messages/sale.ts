import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { EncodingError } from "../errors";
import { Op } from "./op-codes";

export type TFixedPriceSale = {
  isComplete?: boolean;
  createdAt: number;
  marketplace: Address;
  nft: Address;
  owner: Address | null;
  fullPrice: bigint;
  marketplaceFeeAddress: Address;
  marketplaceFee: bigint;
  royaltyAddress: Address;
  royaltyAmount: bigint;
  soldAt?: number;
  queryId?: bigint;
};

/** Initial data of a fixed-price sale contract. */
export function fixedPriceSaleDataToCell(sale: TFixedPriceSale): Cell {
  if (sale.marketplaceFee + sale.royaltyAmount > sale.fullPrice) {
    throw new EncodingError(
      "ValueOutOfRange",
      `fees ${sale.marketplaceFee + sale.royaltyAmount} exceed the price ${sale.fullPrice}`,
    );
  }
  const fees = beginCell()
    .storeAddress(sale.marketplaceFeeAddress)
    .storeCoins(sale.marketplaceFee)
    .storeAddress(sale.royaltyAddress)
    .storeCoins(sale.royaltyAmount)
    .endCell();

  return beginCell()
    .storeBit(sale.isComplete ?? false)
    .storeUint(sale.createdAt, 32)
    .storeAddress(sale.marketplace)
    .storeAddress(sale.nft)
    .storeAddress(sale.owner)
    .storeCoins(sale.fullPrice)
    .storeRef(fees)
    .storeUint(sale.soldAt ?? 0, 32)
    .storeUint(sale.queryId ?? 0n, 64)
    .endCell();
}

export function cancelSaleToCell(queryId = 0n): Cell {
  return beginCell()
    .storeUint(Op.saleCancel, 32)
    .storeUint(queryId, 64)
    .endCell();
}
