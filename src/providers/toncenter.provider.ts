import { Address as CoreAddress } from "@ton/core";
import type { Address } from "../address/address";
import { Logger } from "../base/logger.service";
import { cellFromBoc } from "../boc";
import { withRetry } from "./retry";
import type {
  IProvider,
  TAccountState,
  TRetryConfig,
  TSendResult,
} from "./types";

/** The part of `@ton/ton`'s `TonClient` this adapter relies on. */
export interface IToncenterClient {
  getContractState(address: CoreAddress): Promise<{
    balance: bigint;
    state: "active" | "uninitialized" | "frozen";
    code: Buffer | null;
    data: Buffer | null;
  }>;
  sendFile(src: Buffer): Promise<void>;
}

export class ToncenterProvider implements IProvider {
  protected readonly logger = new Logger(ToncenterProvider.name);

  constructor(
    private readonly client: IToncenterClient,
    private readonly retry: TRetryConfig,
  ) {}

  async getAccountState(address: Address): Promise<TAccountState> {
    const state = await withRetry(
      "getContractState",
      () =>
        this.client.getContractState(
          new CoreAddress(address.workChain, address.hash),
        ),
      this.retry,
      this.logger,
    );
    const status =
      state.state === "uninitialized" ? "uninit" : state.state;
    return {
      balance: state.balance,
      deployed: status === "active",
      status,
      code: state.code ? cellFromBoc(state.code) : undefined,
      data: state.data ? cellFromBoc(state.data) : undefined,
    };
  }

  async sendBoc(boc: Buffer): Promise<TSendResult> {
    const hash = cellFromBoc(boc).hash().toString("hex");
    await withRetry("sendFile", () => this.client.sendFile(boc), this.retry, this.logger);
    this.logger.log(`sent external message ${hash}`);
    return { hash };
  }
}
