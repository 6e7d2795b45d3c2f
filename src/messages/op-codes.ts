export const Op = {
  comment: 0x00000000,
  jettonTransfer: 0x0f8a7ea5,
  jettonBurn: 0x595f07bc,
  nftTransfer: 0x5fcc3d14,
  dnsChangeRecord: 0x4eb1f0f9,
  collectionMint: 1,
  collectionBatchMint: 2,
  collectionChangeOwner: 3,
  collectionEditContent: 4,
  sbtRevoke: 0x6f89f5e3,
  saleCancel: 3,
  stonfiSwapV2: 0x6664de2a,
  outActionSendMsg: 0x0ec3c86d,
  highloadInternalTransfer: 0xae42e5a4,
  walletV5Signed: 0x7369676e,
} as const;

export const DnsRecordPrefix = {
  wallet: 0x9fd3,
  site: 0xad01,
  storage: 0x7473,
  nextResolver: 0xba93,
} as const;

export const SmcCapabilityTag = {
  seqno: 0x5371,
  pubkey: 0x71f4,
  wallet: 0x2177,
} as const;

export const AdnlProtocolTag = {
  http: 0x4854,
} as const;
