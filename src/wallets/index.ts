import { QueryIdWindow } from "./highload-query-id";
import { HIGHLOAD_DEFAULT_TIMEOUT, HighloadWalletV3 } from "./highload-wallet-v3";
import { PreprocessedWalletV2 } from "./preprocessed-wallet-v2";
import { type IWalletContract, type TWalletState, WalletVariant } from "./types";
import { WalletV3R2 } from "./wallet-v3r2";
import { WalletV4R2 } from "./wallet-v4r2";
import { WalletV5R1 } from "./wallet-v5r1";

const registry: Record<WalletVariant, IWalletContract> = {
  [WalletVariant.V3R2]: new WalletV3R2(),
  [WalletVariant.V4R2]: new WalletV4R2(),
  [WalletVariant.V5R1]: new WalletV5R1(),
  [WalletVariant.HighloadV3]: new HighloadWalletV3(),
  [WalletVariant.PreprocessedV2]: new PreprocessedWalletV2(),
};

export function getWalletContract(variant: WalletVariant): IWalletContract {
  return registry[variant];
}

export type TCreateWalletState = {
  publicKey: Buffer;
  workchain?: number;
  subwalletId?: number;
  timeout?: number;
};

/** State of a wallet derived from its key, before anything is known on chain. */
export function createWalletState(
  variant: WalletVariant,
  params: TCreateWalletState,
): TWalletState {
  const contract = getWalletContract(variant);
  const workchain = params.workchain ?? 0;
  const subwalletId = params.subwalletId ?? contract.defaultSubwalletId(workchain);
  const highload = contract.sequencing === "query-id";
  const timeout = highload ? params.timeout ?? HIGHLOAD_DEFAULT_TIMEOUT : undefined;
  return {
    variant,
    address: contract.deriveAddress({
      publicKey: params.publicKey,
      workchain,
      subwalletId,
      timeout,
    }),
    publicKey: Buffer.from(params.publicKey),
    workchain,
    subwalletId,
    seqno: 0,
    codeHash: contract.code().hash(),
    timeout,
    queryWindow: highload ? new QueryIdWindow() : undefined,
  };
}

export * from "./highload-query-id";
export {
  HIGHLOAD_DEFAULT_SUBWALLET_ID,
  HIGHLOAD_DEFAULT_TIMEOUT,
  HighloadWalletV3,
} from "./highload-wallet-v3";
export { PreprocessedWalletV2 } from "./preprocessed-wallet-v2";
export * from "./types";
export { DEFAULT_WALLET_ID, WalletV3R2 } from "./wallet-v3r2";
export { WalletV4R2 } from "./wallet-v4r2";
export {
  MAINNET_GLOBAL_ID,
  TESTNET_GLOBAL_ID,
  type TWalletIdV5R1,
  WalletV5R1,
  walletIdV5R1,
} from "./wallet-v5r1";
