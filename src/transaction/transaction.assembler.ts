import { type KeyPair, signVerify } from "@ton/crypto";
import { Logger } from "../base/logger.service";
import { serializeBoc } from "../boc/serialize";
import { SigningError, VariantError } from "../errors";
import { externalMessageToCell } from "../messages/message";
import type { TTransferMessage } from "../messages/types";
import { signHash } from "../signers/key-pair-signer";
import type { ISigner } from "../signers/types";
import { getWalletContract } from "../wallets";
import { HIGHLOAD_DEFAULT_TIMEOUT } from "../wallets/highload-wallet-v3";
import { HighloadQueryId } from "../wallets/highload-query-id";
import type {
  IWalletContract,
  TSequence,
  TWalletState,
  WalletVariant,
} from "../wallets/types";
import type {
  TAssembleOptions,
  TPreparedTransaction,
  TSignedTransaction,
} from "./types";

/** Lifetime of a seqno transaction when the caller gives no deadline. */
export const DEFAULT_TTL = 60;

const MAX_SEQNO = 0xffffffff;

type TPlan = Omit<TPreparedTransaction, "payload" | "hash"> & {
  contract: IWalletContract;
  now: number;
  messages: readonly TTransferMessage[];
  subwalletId: number;
  internalValue?: bigint;
};

/**
 * Wraps outgoing messages into a signed external message for a wallet.
 * Never changes the wallet's seqno; a highload query id is reserved in the
 * wallet's window only once every check has passed.
 */
export class TransactionAssembler {
  protected logger = new Logger(TransactionAssembler.name);

  assemble(
    state: TWalletState,
    variant: WalletVariant,
    messages: readonly TTransferMessage[],
    keyPair: KeyPair,
    options: TAssembleOptions,
  ): TSignedTransaction {
    const plan = this.plan(state, variant, messages, options);
    this.checkKey(state, keyPair.publicKey);
    if (!keyPair.secretKey.subarray(32).equals(keyPair.publicKey)) {
      throw new SigningError(
        "SigningFailure",
        "secret key does not belong to the public key",
      );
    }
    const prepared = this.reserve(plan);
    const signature = this.withRelease(prepared, () =>
      signHash(prepared.hash, keyPair.secretKey),
    );
    return this.finalize(prepared, signature);
  }

  /** Unsigned payload for signing elsewhere; complete it with `finalize`. */
  prepare(
    state: TWalletState,
    variant: WalletVariant,
    messages: readonly TTransferMessage[],
    options: TAssembleOptions,
  ): TPreparedTransaction {
    return this.reserve(this.plan(state, variant, messages, options));
  }

  finalize(prepared: TPreparedTransaction, signature: Buffer): TSignedTransaction {
    this.withRelease(prepared, () => {
      if (
        signature.length !== 64 ||
        !signVerify(prepared.hash, signature, prepared.publicKey)
      ) {
        throw new SigningError(
          "SigningFailure",
          "signature does not verify against the wallet public key",
        );
      }
    });

    const contract = getWalletContract(prepared.variant);
    const body = contract.packSignedBody(signature, prepared.payload);
    const message = externalMessageToCell({
      to: prepared.address,
      body,
      init: prepared.init,
    });
    const signed: TSignedTransaction = {
      variant: prepared.variant,
      address: prepared.address,
      sequence: prepared.sequence,
      validUntil: prepared.validUntil,
      payload: prepared.payload,
      body,
      message,
      boc: serializeBoc(message),
      hash: message.hash(),
    };
    this.logger.debug(
      `assembled ${prepared.variant} transaction for ${prepared.address.toString()}`,
      { hash: signed.hash.toString("hex"), validUntil: signed.validUntil },
    );
    return signed;
  }

  async sign(
    state: TWalletState,
    variant: WalletVariant,
    messages: readonly TTransferMessage[],
    signer: ISigner,
    options: TAssembleOptions,
  ): Promise<TSignedTransaction> {
    const plan = this.plan(state, variant, messages, options);
    this.checkKey(state, signer.publicKey);
    const prepared = this.reserve(plan);
    let signature: Buffer;
    try {
      signature = await signer.signCell(prepared.payload);
    } catch (e) {
      this.release(prepared);
      if (e instanceof SigningError) {
        throw e;
      }
      throw new SigningError("SigningFailure", "signer failed", { cause: e });
    }
    return this.finalize(prepared, signature);
  }

  private plan(
    state: TWalletState,
    variant: WalletVariant,
    messages: readonly TTransferMessage[],
    options: TAssembleOptions,
  ): TPlan {
    const contract = getWalletContract(variant);
    if (state.variant !== variant) {
      throw new VariantError(
        "VariantMismatch",
        `wallet state is ${state.variant}, requested ${variant}`,
      );
    }
    if (state.codeHash && !state.codeHash.equals(contract.code().hash())) {
      throw new VariantError(
        "VariantMismatch",
        `account code ${state.codeHash.toString("hex")} is not ${variant}`,
      );
    }

    const attachInit =
      state.deployed === false ||
      (state.deployed === undefined && state.seqno === 0);

    if (messages.length === 0) {
      const deploying =
        contract.sequencing === "seqno" && state.seqno === 0 && attachInit;
      if (!deploying) {
        throw new VariantError(
          "NoMessages",
          "a transaction needs at least one message unless it deploys the wallet",
        );
      }
    }
    if (messages.length > contract.maxMessages) {
      throw new VariantError(
        "TooManyMessages",
        `${variant} sends at most ${contract.maxMessages} messages, got ${messages.length}`,
      );
    }
    messages.forEach((message, i) => {
      if (message.value < 0n) {
        throw new VariantError(
          "NegativeValue",
          `message #${i} carries a negative value ${message.value}`,
        );
      }
    });

    const base = {
      contract,
      now: options.now,
      variant,
      address: state.address,
      publicKey: state.publicKey,
      messages,
      subwalletId: state.subwalletId,
      internalValue: options.internalValue,
      init: attachInit
        ? contract.stateInit({
            publicKey: state.publicKey,
            workchain: state.workchain,
            subwalletId: state.subwalletId,
            timeout: state.timeout,
          })
        : undefined,
    };

    if (contract.sequencing === "seqno") {
      if (!Number.isInteger(state.seqno) || state.seqno < 0 || state.seqno > MAX_SEQNO) {
        throw new VariantError("InvalidSequence", `seqno ${state.seqno} is not a uint32`);
      }
      const validUntil = options.validUntil ?? options.now + DEFAULT_TTL;
      if (validUntil <= options.now) {
        throw new VariantError(
          "InvalidValidityWindow",
          `valid until ${validUntil} is not after now ${options.now}`,
        );
      }
      return {
        ...base,
        validUntil,
        sequence: { kind: "seqno", seqno: state.seqno },
      };
    }

    const window = state.queryWindow;
    if (!window) {
      throw new VariantError(
        "InvalidSequence",
        "highload wallet state carries no query id window",
      );
    }
    const queryId =
      options.queryId === undefined
        ? window.next(options.now)
        : typeof options.queryId === "number"
          ? HighloadQueryId.fromQueryId(options.queryId)
          : options.queryId;
    const timeout = state.timeout ?? HIGHLOAD_DEFAULT_TIMEOUT;
    const createdAt = options.createdAt ?? options.now;
    const validUntil = createdAt + timeout;
    if (createdAt > options.now || validUntil <= options.now) {
      throw new VariantError(
        "InvalidValidityWindow",
        `created at ${createdAt} with timeout ${timeout} is not live at ${options.now}`,
      );
    }
    const sequence: TSequence = { kind: "query-id", queryId, createdAt, timeout };
    return {
      ...base,
      validUntil,
      sequence,
      reservation: { window, queryId, expiresAt: validUntil },
    };
  }

  private checkKey(state: TWalletState, publicKey: Buffer) {
    if (!publicKey.equals(state.publicKey)) {
      throw new SigningError(
        "SigningFailure",
        "signing key does not match the wallet public key",
      );
    }
  }

  private reserve(plan: TPlan): TPreparedTransaction {
    const payload = plan.contract.buildSigningPayload({
      address: plan.address,
      subwalletId: plan.subwalletId,
      messages: plan.messages,
      sequence: plan.sequence,
      validUntil: plan.validUntil,
      internalValue: plan.internalValue,
    });
    if (plan.reservation) {
      plan.reservation.window.reserve(
        plan.reservation.queryId,
        plan.reservation.expiresAt,
        plan.now,
      );
    }
    return {
      variant: plan.variant,
      address: plan.address,
      publicKey: plan.publicKey,
      sequence: plan.sequence,
      validUntil: plan.validUntil,
      payload,
      hash: payload.hash(),
      init: plan.init,
      reservation: plan.reservation,
    };
  }

  private release(prepared: TPreparedTransaction) {
    prepared.reservation?.window.release(prepared.reservation.queryId);
  }

  private withRelease<T>(prepared: TPreparedTransaction, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      this.release(prepared);
      throw e;
    }
  }
}
