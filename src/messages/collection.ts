import type { Address } from "../address/address";
import { type Builder, beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { type TDictValue, serializeDict } from "../cell/dictionary";
import type { Slice } from "../cell/slice";
import { EncodingError } from "../errors";
import { Op } from "./op-codes";

const OFFCHAIN_CONTENT_PREFIX = 0x01;
const MAX_BATCH_SIZE = 250;

export type TNftMintItem = {
  index: bigint;
  /** nanotons forwarded to the item on deploy */
  amount: bigint;
  owner: Address;
  content: Cell;
};

export type TMintEntry = Omit<TNftMintItem, "index">;

function itemInitToCell(item: TMintEntry): Cell {
  return beginCell().storeAddress(item.owner).storeRef(item.content).endCell();
}

/** Batch mint dictionary value: forwarded amount and the item init cell. */
export const mintEntryValue: TDictValue<TMintEntry> = {
  serialize: (src: TMintEntry, builder: Builder) => {
    builder.storeCoins(src.amount).storeRef(itemInitToCell(src));
  },
  parse: (src: Slice): TMintEntry => {
    const amount = src.loadCoins();
    const init = src.loadRef().beginParse();
    return {
      amount,
      owner: init.loadAddress(),
      content: init.loadRef(),
    };
  },
};

/** Individual item content: URI suffix appended to the collection's common prefix. */
export function nftItemContentToCell(uri: string): Cell {
  return beginCell().storeStringTail(uri).endCell();
}

/** Off-chain metadata cell: 0x01 prefix followed by a snake URI. */
export function offchainContentToCell(uri: string): Cell {
  return beginCell()
    .storeUint(OFFCHAIN_CONTENT_PREFIX, 8)
    .storeStringTail(uri)
    .endCell();
}

export function mintNftToCell(item: TNftMintItem, queryId = 0n): Cell {
  return beginCell()
    .storeUint(Op.collectionMint, 32)
    .storeUint(queryId, 64)
    .storeUint(item.index, 64)
    .storeCoins(item.amount)
    .storeRef(itemInitToCell(item))
    .endCell();
}

export function batchMintNftToCell(
  items: readonly TNftMintItem[],
  queryId = 0n,
): Cell {
  if (items.length === 0 || items.length > MAX_BATCH_SIZE) {
    throw new EncodingError(
      "ValueOutOfRange",
      `batch mint takes 1..${MAX_BATCH_SIZE} items, got ${items.length}`,
    );
  }
  const entries = new Map<bigint, TMintEntry>();
  for (const item of items) {
    if (entries.has(item.index)) {
      throw new EncodingError(
        "ValueOutOfRange",
        `item index ${item.index} appears twice in the batch`,
      );
    }
    entries.set(item.index, item);
  }
  return beginCell()
    .storeUint(Op.collectionBatchMint, 32)
    .storeUint(queryId, 64)
    .storeDict(serializeDict(entries, 64, mintEntryValue))
    .endCell();
}

export function changeCollectionOwnerToCell(
  newOwner: Address,
  queryId = 0n,
): Cell {
  return beginCell()
    .storeUint(Op.collectionChangeOwner, 32)
    .storeUint(queryId, 64)
    .storeAddress(newOwner)
    .endCell();
}

export type TRoyaltyParams = {
  numerator: number;
  denominator: number;
  destination: Address;
};

export function royaltyParamsToCell(params: TRoyaltyParams): Cell {
  if (params.denominator === 0 || params.numerator > params.denominator) {
    throw new EncodingError(
      "ValueOutOfRange",
      `royalty ${params.numerator}/${params.denominator} is not a fraction of 1`,
    );
  }
  return beginCell()
    .storeUint(params.numerator, 16)
    .storeUint(params.denominator, 16)
    .storeAddress(params.destination)
    .endCell();
}

export type TEditCollectionContent = {
  queryId?: bigint;
  collectionContent: Cell;
  commonContent: Cell;
  royalty: TRoyaltyParams;
};

export function editCollectionContentToCell(
  params: TEditCollectionContent,
): Cell {
  return beginCell()
    .storeUint(Op.collectionEditContent, 32)
    .storeUint(params.queryId ?? 0n, 64)
    .storeRef(
      beginCell()
        .storeRef(params.collectionContent)
        .storeRef(params.commonContent)
        .endCell(),
    )
    .storeRef(royaltyParamsToCell(params.royalty))
    .endCell();
}

/** Sent by the authority to a soulbound item. */
export function revokeSbtToCell(queryId = 0n): Cell {
  return beginCell()
    .storeUint(Op.sbtRevoke, 32)
    .storeUint(queryId, 64)
    .endCell();
}
