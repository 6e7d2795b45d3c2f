export * from "./collection";
export * from "./dns";
export * from "./jetton";
export * from "./message";
export * from "./nft";
export * from "./op-codes";
export * from "./sale";
export * from "./stonfi";
export * from "./transfer";
export * from "./types";
