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

type TV4AccountState =
  | { type: "uninit" }
  | { type: "active"; code: string | null; data: string | null }
  | { type: "frozen"; stateHash: string };

/** The part of `@ton/ton`'s `TonClient4` this adapter relies on. */
export interface ITonV4Client {
  getLastBlock(): Promise<{ last: { seqno: number } }>;
  getAccount(
    seqno: number,
    address: CoreAddress,
  ): Promise<{
    account: { balance: { coins: string }; state: TV4AccountState };
  }>;
  sendMessage(message: Buffer): Promise<{ status: number }>;
}

export class TonV4Provider implements IProvider {
  protected readonly logger = new Logger(TonV4Provider.name);

  constructor(
    private readonly client: ITonV4Client,
    private readonly retry: TRetryConfig,
  ) {}

  async getAccountState(address: Address): Promise<TAccountState> {
    const { account } = await withRetry(
      "getAccount",
      async () => {
        const block = await this.client.getLastBlock();
        return this.client.getAccount(
          block.last.seqno,
          new CoreAddress(address.workChain, address.hash),
        );
      },
      this.retry,
      this.logger,
    );

    const balance = BigInt(account.balance.coins);
    switch (account.state.type) {
      case "uninit":
        return { balance, deployed: false, status: "uninit" };
      case "frozen":
        return { balance, deployed: false, status: "frozen" };
      case "active":
        return {
          balance,
          deployed: true,
          status: "active",
          code: account.state.code ? cellFromBoc(Buffer.from(account.state.code, "base64")) : undefined,
          data: account.state.data ? cellFromBoc(Buffer.from(account.state.data, "base64")) : undefined,
        };
    }
  }

  async sendBoc(boc: Buffer): Promise<TSendResult> {
    const hash = cellFromBoc(boc).hash().toString("hex");
    const { status } = await withRetry(
      "sendMessage",
      () => this.client.sendMessage(boc),
      this.retry,
      this.logger,
    );
    this.logger.log(`sent external message ${hash}`, { status });
    return { hash };
  }
}
