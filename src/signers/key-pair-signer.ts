import {
  type KeyPair,
  mnemonicNew,
  mnemonicToPrivateKey,
  sign,
} from "@ton/crypto";
import type { Cell } from "../cell/cell";
import { SigningError } from "../errors";
import { type ISigner } from "./types";

export class KeyPairSigner implements ISigner {
  constructor(private readonly keyPair: KeyPair) {}

  get publicKey(): Buffer {
    return this.keyPair.publicKey;
  }

  async signCell(cell: Cell): Promise<Buffer> {
    return signHash(cell.hash(), this.keyPair.secretKey);
  }

  static async createFromMnemonic(mnemonic: string[], password?: string) {
    if (password) {
      return new KeyPairSigner(await mnemonicToPrivateKey(mnemonic, password));
    }
    return new KeyPairSigner(await mnemonicToPrivateKey(mnemonic));
  }

  static async generateRandomKeyPair(): Promise<KeyPair> {
    const mnemonic = await mnemonicNew(24);
    return await mnemonicToPrivateKey(mnemonic);
  }
}

/** Signs a 32-byte hash with a 64-byte Ed25519 secret key. */
export function signHash(hash: Buffer, secretKey: Buffer): Buffer {
  if (secretKey.length !== 64) {
    throw new SigningError(
      "SigningFailure",
      `secret key must be 64 bytes, got ${secretKey.length}`,
    );
  }
  try {
    return sign(hash, secretKey);
  } catch (e) {
    throw new SigningError("SigningFailure", "Ed25519 signing failed", {
      cause: e,
    });
  }
}
