import type { Address } from "../address/address";
import type { Cell } from "../cell/cell";

export type TAccountStatus = "active" | "uninit" | "frozen";

export type TAccountState = {
  balance: bigint;
  deployed: boolean;
  status: TAccountStatus;
  code?: Cell;
  data?: Cell;
};

export type TSendResult = {
  /** hex hash of the submitted external message */
  hash: string;
};

export interface IProvider {
  getAccountState(address: Address): Promise<TAccountState>;
  sendBoc(boc: Buffer): Promise<TSendResult>;
}

export type TRetryConfig = {
  retries: number;
  retryDelayMs: number;
};

export type TProviderConfig =
  | ({ kind: "toncenter"; endpoint: string; apiKey?: string } & TRetryConfig)
  | ({ kind: "tonapi-v4"; endpoint: string } & TRetryConfig);
