import { sha256_sync } from "@ton/crypto";
import type { Address } from "../address/address";
import { type Builder, beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { AdnlProtocolTag, DnsRecordPrefix, Op, SmcCapabilityTag } from "./op-codes";

export type TDnsCategory = "wallet" | "site" | "storage" | "dns_next_resolver";

export type TSmcCapability = keyof typeof SmcCapabilityTag;
export type TAdnlProtocol = keyof typeof AdnlProtocolTag;

/**
 * A wallet or site record carries its capability or protocol list only when
 * one is given; `flags` is 1 then and 0 otherwise.
 */
export type TDnsRecord =
  | { category: "wallet"; address: Address; capabilities?: TSmcCapability[] }
  | { category: "site"; adnl: Buffer; protocols?: TAdnlProtocol[] }
  | { category: "storage"; bagId: Buffer }
  | { category: "dns_next_resolver"; address: Address };

/** `flags:(## 8)` followed by the `flags . 0?` list of 16-bit tags. */
function storeFlaggedList(builder: Builder, tags: readonly number[] | undefined) {
  if (tags === undefined) {
    builder.storeUint(0, 8);
    return;
  }
  builder.storeUint(1, 8);
  for (const tag of tags) {
    builder.storeBit(1).storeUint(tag, 16);
  }
  builder.storeBit(0);
}

/** Record key: SHA-256 of the category name. */
export function dnsCategoryKey(category: TDnsCategory): bigint {
  return BigInt("0x" + sha256_sync(Buffer.from(category, "utf-8")).toString("hex"));
}

export function dnsRecordToCell(record: TDnsRecord): Cell {
  const builder = beginCell();
  switch (record.category) {
    case "wallet":
      builder
        .storeUint(DnsRecordPrefix.wallet, 16)
        .storeAddress(record.address);
      storeFlaggedList(
        builder,
        record.capabilities?.map((capability) => SmcCapabilityTag[capability]),
      );
      return builder.endCell();
    case "site":
      builder.storeUint(DnsRecordPrefix.site, 16).storeBuffer(record.adnl, 32);
      storeFlaggedList(
        builder,
        record.protocols?.map((protocol) => AdnlProtocolTag[protocol]),
      );
      return builder.endCell();
    case "storage":
      return builder
        .storeUint(DnsRecordPrefix.storage, 16)
        .storeBuffer(record.bagId, 32)
        .endCell();
    case "dns_next_resolver":
      return builder
        .storeUint(DnsRecordPrefix.nextResolver, 16)
        .storeAddress(record.address)
        .endCell();
  }
}

export type TDnsChangeRecord = {
  queryId?: bigint;
  category: TDnsCategory;
  /** null deletes the record */
  value: Cell | null;
};

export function dnsChangeRecordToCell(params: TDnsChangeRecord): Cell {
  return beginCell()
    .storeUint(Op.dnsChangeRecord, 32)
    .storeUint(params.queryId ?? 0n, 64)
    .storeUint(dnsCategoryKey(params.category), 256)
    .storeMaybeRef(params.value)
    .endCell();
}

export function setDnsRecordToCell(record: TDnsRecord, queryId?: bigint): Cell {
  return dnsChangeRecordToCell({
    queryId,
    category: record.category,
    value: dnsRecordToCell(record),
  });
}

export function deleteDnsRecordToCell(
  category: TDnsCategory,
  queryId?: bigint,
): Cell {
  return dnsChangeRecordToCell({ queryId, category, value: null });
}
