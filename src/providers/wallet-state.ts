import type { Address } from "../address/address";
import { ProviderError } from "../errors";
import { getWalletContract } from "../wallets";
import { QueryIdWindow } from "../wallets/highload-query-id";
import type { TWalletState, WalletVariant } from "../wallets/types";
import type { IProvider } from "./types";

/**
 * Reads a wallet's account and decodes its seqno, key and subwallet id from
 * the account data. An undeployed account yields `seqno` 0 and the key the
 * caller expects. `codeHash` is the deployed code, so the assembler can
 * refuse a mismatching variant. A highload wallet keeps the caller's query-id
 * window when one is passed.
 */
export async function readWalletState(
  provider: IProvider,
  variant: WalletVariant,
  address: Address,
  expected: {
    publicKey: Buffer;
    subwalletId: number;
    timeout?: number;
    /** pending query ids of a highload wallet opened before */
    queryWindow?: QueryIdWindow;
  },
): Promise<TWalletState & { codeHash: Buffer }> {
  const contract = getWalletContract(variant);
  const account = await provider.getAccountState(address);
  const highload = contract.sequencing === "query-id";
  const base = {
    variant,
    address,
    workchain: address.workChain,
    balance: account.balance,
    queryWindow: highload ? expected.queryWindow ?? new QueryIdWindow() : undefined,
  };

  if (account.status === "frozen") {
    throw new ProviderError(
      "AccountNotFound",
      `account ${address.toString()} is frozen`,
    );
  }
  if (!account.deployed) {
    return {
      ...base,
      publicKey: expected.publicKey,
      subwalletId: expected.subwalletId,
      seqno: 0,
      deployed: false,
      codeHash: contract.code().hash(),
      timeout: expected.timeout,
    };
  }
  if (!account.code || !account.data) {
    throw new ProviderError(
      "AccountNotFound",
      `active account ${address.toString()} has no code or data`,
    );
  }

  const codeHash = account.code.hash();
  if (!codeHash.equals(contract.code().hash())) {
    // let the assembler report the mismatch
    return {
      ...base,
      publicKey: expected.publicKey,
      subwalletId: expected.subwalletId,
      seqno: 0,
      deployed: true,
      codeHash,
      timeout: expected.timeout,
    };
  }

  const data = contract.parseData(account.data);
  return {
    ...base,
    publicKey: data.publicKey,
    subwalletId: data.subwalletId ?? expected.subwalletId,
    seqno: data.seqno ?? 0,
    deployed: true,
    codeHash,
    timeout: data.timeout ?? expected.timeout,
  };
}
