export type EncodingErrorCode =
  | "CapacityExceeded"
  | "ValueOutOfRange"
  | "DepthExceeded"
  | "InvalidExoticCell"
  | "CycleDetected";

export type DecodingErrorCode =
  | "BufferUnderrun"
  | "NoSuchRef"
  | "TruncatedInput"
  | "InvalidMagic"
  | "MalformedReference"
  | "MalformedCell"
  | "ChecksumMismatch"
  | "TrailingData"
  | "UnsupportedAddress";

export type AddressErrorCode = "InvalidAddress";

export type VariantErrorCode =
  | "TooManyMessages"
  | "NoMessages"
  | "NegativeValue"
  | "InvalidValidityWindow"
  | "InvalidSequence"
  | "QueryIdInUse"
  | "VariantMismatch";

export type SigningErrorCode = "SigningFailure";

export type ProviderErrorCode = "RequestFailed" | "AccountNotFound";

export abstract class TonSdkError<C extends string = string> extends Error {
  constructor(
    readonly code: C,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${code}: ${message}`, options);
    this.name = new.target.name;
  }
}

/** Bit or ref capacity, value width or depth limits violated while building. */
export class EncodingError extends TonSdkError<EncodingErrorCode> {}

/** Malformed cell data or BOC envelope; never yields a partial graph. */
export class DecodingError extends TonSdkError<DecodingErrorCode> {}

export class AddressError extends TonSdkError<AddressErrorCode> {}

/**
 * Rejected transaction assembly. Callers are expected to refresh the wallet
 * state and retry at a higher layer.
 */
export class VariantError extends TonSdkError<VariantErrorCode> {}

export class SigningError extends TonSdkError<SigningErrorCode> {}

export class ProviderError extends TonSdkError<ProviderErrorCode> {}
