export { fromNano, toNano } from "@ton/core";
export { Address, type TAddressFormat, type TFriendlyAddress } from "./address/address";
export { ConfigService } from "./base/config.service";
export { Logger } from "./base/logger.service";
export * from "./boc";
export * from "./cell";
export * from "./errors";
export * from "./keystore";
export * from "./messages";
export * from "./providers";
export { KeyPairSigner, signHash } from "./signers/key-pair-signer";
export type { ISigner } from "./signers/types";
export * from "./transaction";
export { type TOpenOptions, type TTransferResult, WalletService } from "./wallet/wallet.service";
export * from "./wallets";
