import { crc16Bytes } from "../cell/crc";
import { AddressError } from "../errors";

const BOUNCEABLE_TAG = 0x11;
const NON_BOUNCEABLE_TAG = 0x51;
const TEST_FLAG = 0x80;

const FRIENDLY_PATTERN = /^[A-Za-z0-9+/_-]{48}$/;
const RAW_PATTERN = /^(-?\d+):([0-9a-fA-F]{64})$/;

export type TAddressFormat = {
  urlSafe?: boolean;
  bounceable?: boolean;
  testOnly?: boolean;
};

export type TFriendlyAddress = {
  isBounceable: boolean;
  isTestOnly: boolean;
  address: Address;
};

/**
 * Account identifier: signed 8-bit workchain and 256-bit account id.
 */
export class Address {
  readonly workChain: number;
  readonly hash: Buffer;

  constructor(workChain: number, hash: Buffer) {
    if (!Number.isInteger(workChain) || workChain < -128 || workChain > 127) {
      throw new AddressError(
        "InvalidAddress",
        `workchain ${workChain} is not a signed 8-bit integer`,
      );
    }
    if (hash.length !== 32) {
      throw new AddressError(
        "InvalidAddress",
        `account id must be 32 bytes, got ${hash.length}`,
      );
    }
    this.workChain = workChain;
    this.hash = Buffer.from(hash);
  }

  static isRaw(source: string): boolean {
    return RAW_PATTERN.test(source);
  }

  static isFriendly(source: string): boolean {
    if (!FRIENDLY_PATTERN.test(source)) {
      return false;
    }
    try {
      Address.parseFriendly(source);
      return true;
    } catch (e) {
      if (e instanceof AddressError) {
        return false;
      }
      throw e;
    }
  }

  static parse(source: string): Address {
    if (Address.isRaw(source)) {
      return Address.parseRaw(source);
    }
    return Address.parseFriendly(source).address;
  }

  static parseRaw(source: string): Address {
    const match = RAW_PATTERN.exec(source);
    if (!match) {
      throw new AddressError("InvalidAddress", `not a raw address: ${source}`);
    }
    return new Address(Number(match[1]), Buffer.from(match[2], "hex"));
  }

  static parseFriendly(source: string): TFriendlyAddress {
    if (!FRIENDLY_PATTERN.test(source)) {
      throw new AddressError(
        "InvalidAddress",
        `friendly address must be 48 base64 characters: ${source}`,
      );
    }
    const data = Buffer.from(
      source.replace(/-/g, "+").replace(/_/g, "/"),
      "base64",
    );
    if (data.length !== 36) {
      throw new AddressError(
        "InvalidAddress",
        `friendly address must decode to 36 bytes, got ${data.length}`,
      );
    }

    const checksum = crc16Bytes(data.subarray(0, 34));
    if (!checksum.equals(data.subarray(34, 36))) {
      throw new AddressError(
        "InvalidAddress",
        `checksum mismatch in ${source}`,
      );
    }

    let tag = data[0];
    const isTestOnly = (tag & TEST_FLAG) !== 0;
    tag &= ~TEST_FLAG;
    if (tag !== BOUNCEABLE_TAG && tag !== NON_BOUNCEABLE_TAG) {
      throw new AddressError(
        "InvalidAddress",
        `unknown address tag 0x${data[0].toString(16)}`,
      );
    }

    return {
      isBounceable: tag === BOUNCEABLE_TAG,
      isTestOnly,
      address: new Address(data.readInt8(1), data.subarray(2, 34)),
    };
  }

  /** Workchains other than basechain and masterchain are carried but flagged. */
  get isStandardWorkchain(): boolean {
    return this.workChain === 0 || this.workChain === -1;
  }

  toRawString(): string {
    return `${this.workChain}:${this.hash.toString("hex")}`;
  }

  toString(format: TAddressFormat = {}): string {
    const { urlSafe = true, bounceable = true, testOnly = false } = format;

    let tag = bounceable ? BOUNCEABLE_TAG : NON_BOUNCEABLE_TAG;
    if (testOnly) {
      tag |= TEST_FLAG;
    }

    const head = Buffer.alloc(34);
    head[0] = tag;
    head.writeInt8(this.workChain, 1);
    this.hash.copy(head, 2);

    const encoded = Buffer.concat([head, crc16Bytes(head)]).toString("base64");
    return urlSafe ? encoded.replace(/\+/g, "-").replace(/\//g, "_") : encoded;
  }

  equals(other: Address): boolean {
    return this.workChain === other.workChain && this.hash.equals(other.hash);
  }
}
