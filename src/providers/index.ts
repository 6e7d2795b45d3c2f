export { createProvider, providerConfigFromEnv } from "./provider.factory";
export { withRetry } from "./retry";
export { type ITonV4Client, TonV4Provider } from "./tonapi-v4.provider";
export { type IToncenterClient, ToncenterProvider } from "./toncenter.provider";
export * from "./types";
export { readWalletState } from "./wallet-state";
