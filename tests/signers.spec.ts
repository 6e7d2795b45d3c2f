import { mnemonicToPrivateKey, signVerify } from "@ton/crypto";
import { beginCell } from "../src/cell/builder";
import { SigningError } from "../src/errors";
import { KeyPairSigner, signHash } from "../src/signers/key-pair-signer";
import { expectCode, testKeyPair } from "./utils";

describe("KeyPairSigner", () => {
  const keyPair = testKeyPair();
  const cell = beginCell().storeUint(0xfeed, 16).endCell();

  it("signs the cell hash", async () => {
    const signer = new KeyPairSigner(keyPair);
    const signature = await signer.signCell(cell);
    expect(signature.length).toBe(64);
    expect(signVerify(cell.hash(), signature, keyPair.publicKey)).toBe(true);
    expect(signer.publicKey.equals(keyPair.publicKey)).toBe(true);
  });

  it("rejects secret keys of the wrong size", () => {
    expectCode(
      () => signHash(cell.hash(), keyPair.secretKey.subarray(0, 32)),
      SigningError,
      "SigningFailure",
    );
  });

  it("derives the same key from a mnemonic", async () => {
    const mnemonic = Array.from({ length: 24 }, () => "abandon");
    const expected = await mnemonicToPrivateKey(mnemonic);
    const signer = await KeyPairSigner.createFromMnemonic(mnemonic);
    expect(signer.publicKey.equals(expected.publicKey)).toBe(true);
  }, 30_000);

  it("generates fresh key pairs", async () => {
    const first = await KeyPairSigner.generateRandomKeyPair();
    const second = await KeyPairSigner.generateRandomKeyPair();
    expect(first.secretKey.length).toBe(64);
    expect(first.publicKey.equals(second.publicKey)).toBe(false);
  }, 30_000);
});
