import type { KeyPair } from "@ton/crypto";
import { Logger } from "../base/logger.service";
import type { TTransferMessage } from "../messages/types";
import type { IProvider, TSendResult } from "../providers/types";
import { readWalletState } from "../providers/wallet-state";
import { TransactionAssembler } from "../transaction/transaction.assembler";
import type { TAssembleOptions, TSignedTransaction } from "../transaction/types";
import { getWalletContract } from "../wallets";
import { HIGHLOAD_DEFAULT_TIMEOUT } from "../wallets/highload-wallet-v3";
import type { QueryIdWindow } from "../wallets/highload-query-id";
import type { TWalletState, WalletVariant } from "../wallets/types";

export type TOpenOptions = {
  workchain?: number;
  subwalletId?: number;
  timeout?: number;
};

export type TTransferResult = TSendResult & {
  transaction: TSignedTransaction;
};

const unixNow = () => Math.floor(Date.now() / 1000);

export class WalletService {
  protected readonly logger = new Logger(WalletService.name);

  /** by raw address, so reopening a highload wallet keeps its pending ids */
  private readonly queryWindows = new Map<string, QueryIdWindow>();

  constructor(
    private readonly provider: IProvider,
    private readonly assembler = new TransactionAssembler(),
    private readonly clock: () => number = unixNow,
  ) {}

  /** Derives the wallet address from the key and reads its state on chain. */
  async open(
    variant: WalletVariant,
    publicKey: Buffer,
    opts: TOpenOptions = {},
  ): Promise<TWalletState> {
    const contract = getWalletContract(variant);
    const workchain = opts.workchain ?? 0;
    const subwalletId = opts.subwalletId ?? contract.defaultSubwalletId(workchain);
    const timeout =
      contract.sequencing === "query-id"
        ? opts.timeout ?? HIGHLOAD_DEFAULT_TIMEOUT
        : undefined;
    const address = contract.deriveAddress({
      publicKey,
      workchain,
      subwalletId,
      timeout,
    });

    const key = address.toRawString();
    const state = await readWalletState(this.provider, variant, address, {
      publicKey,
      subwalletId,
      timeout,
      queryWindow: this.queryWindows.get(key),
    });
    if (state.queryWindow) {
      this.queryWindows.set(key, state.queryWindow);
    }
    if (state.codeHash && !state.codeHash.equals(contract.code().hash())) {
      this.logger.warn(
        `account ${address.toString()} does not run ${variant} code`,
      );
    }
    return state;
  }

  /**
   * Assembles with the service clock and submits. The caller refreshes the
   * state (seqno) once the transaction is confirmed.
   */
  async transfer(
    state: TWalletState,
    keyPair: KeyPair,
    messages: readonly TTransferMessage[],
    opts: Omit<TAssembleOptions, "now"> = {},
  ): Promise<TTransferResult> {
    const transaction = this.assembler.assemble(
      state,
      state.variant,
      messages,
      keyPair,
      { ...opts, now: this.clock() },
    );
    const result = await this.provider.sendBoc(transaction.boc);
    this.logger.log(
      `submitted ${messages.length} message(s) from ${state.address.toString()}`,
      { hash: result.hash },
    );
    return { ...result, transaction };
  }
}
