import type { Address } from "../address/address";
import { beginCell } from "../cell/builder";
import type { Cell } from "../cell/cell";
import { EncodingError } from "../errors";
import { jettonTransferToCell } from "./jetton";
import { Op } from "./op-codes";
import type { TTransferMessage } from "./types";

/** Router v2 defaults for a jetton to TON swap, nanotons. */
export const STONFI_V2_SWAP_GAS = {
  gasAmount: 300_000_000n,
  forwardGasAmount: 240_000_000n,
} as const;

/** Referral fee in basis points; the router caps it at 1%. */
export const STONFI_DEFAULT_REFERRAL_VALUE = 10;
const MAX_REFERRAL_VALUE = 100;

export type TStonfiSwap = {
  /** the router's wallet of the asked jetton; its pTON wallet for TON */
  askJettonWallet: Address;
  receiver: Address;
  minAskAmount: bigint;
  refundAddress: Address;
  excessesAddress?: Address;
  /** unix seconds */
  deadline: number;
  dexCustomPayload?: Cell | null;
  dexCustomPayloadForwardGasAmount?: bigint;
  refundPayload?: Cell | null;
  refundForwardGasAmount?: bigint;
  referralAddress?: Address | null;
  referralValue?: number;
};

/** Swap request the router reads from the jetton transfer's forward payload. */
export function stonfiSwapBodyToCell(params: TStonfiSwap): Cell {
  const referralValue = params.referralValue ?? STONFI_DEFAULT_REFERRAL_VALUE;
  if (
    !Number.isInteger(referralValue) ||
    referralValue < 0 ||
    referralValue > MAX_REFERRAL_VALUE
  ) {
    throw new EncodingError(
      "ValueOutOfRange",
      `referral value ${referralValue} is out of 0..${MAX_REFERRAL_VALUE}`,
    );
  }
  return beginCell()
    .storeUint(Op.stonfiSwapV2, 32)
    .storeAddress(params.askJettonWallet)
    .storeAddress(params.refundAddress)
    .storeAddress(params.excessesAddress ?? params.refundAddress)
    .storeUint(params.deadline, 64)
    .storeRef(
      beginCell()
        .storeCoins(params.minAskAmount)
        .storeAddress(params.receiver)
        .storeCoins(params.dexCustomPayloadForwardGasAmount ?? 0n)
        .storeMaybeRef(params.dexCustomPayload)
        .storeCoins(params.refundForwardGasAmount ?? 0n)
        .storeMaybeRef(params.refundPayload)
        .storeUint(referralValue, 16)
        .storeAddress(params.referralAddress ?? null),
    )
    .endCell();
}

export type TStonfiSwapJettonToTon = {
  router: Address;
  /** the user's wallet of the offered jetton */
  offerJettonWallet: Address;
  /** the router's pTON wallet */
  proxyTonWallet: Address;
  userWallet: Address;
  offerAmount: bigint;
  minAskAmount: bigint;
  deadline: number;
  receiver?: Address;
  refundAddress?: Address;
  queryId?: bigint;
  gasAmount?: bigint;
  forwardGasAmount?: bigint;
  referralAddress?: Address | null;
  referralValue?: number;
};

/**
 * Wallet message for a jetton to TON swap: a jetton transfer of the offered
 * amount to the router, carrying the swap request as forward payload.
 */
export function stonfiSwapJettonToTon(params: TStonfiSwapJettonToTon): TTransferMessage {
  const forwardGasAmount = params.forwardGasAmount ?? STONFI_V2_SWAP_GAS.forwardGasAmount;
  const swap = stonfiSwapBodyToCell({
    askJettonWallet: params.proxyTonWallet,
    receiver: params.receiver ?? params.userWallet,
    minAskAmount: params.minAskAmount,
    refundAddress: params.refundAddress ?? params.userWallet,
    deadline: params.deadline,
    referralAddress: params.referralAddress,
    referralValue: params.referralValue,
  });
  return {
    to: params.offerJettonWallet,
    value: params.gasAmount ?? STONFI_V2_SWAP_GAS.gasAmount,
    body: jettonTransferToCell({
      queryId: params.queryId,
      amount: params.offerAmount,
      destination: params.router,
      responseDestination: params.userWallet,
      forwardTonAmount: forwardGasAmount,
      forwardPayload: swap,
    }),
  };
}
