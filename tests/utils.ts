import { Cell as CoreCell } from "@ton/core";
import { type KeyPair, keyPairFromSeed } from "@ton/crypto";
import { Address } from "../src/address/address";
import { cellFromBoc, serializeBoc } from "../src/boc";
import type { Cell } from "../src/cell/cell";
import golden from "./fixtures/golden.json";

export { golden };

export function testKeyPair(seedByte = golden.keySeedByte): KeyPair {
  return keyPairFromSeed(Buffer.alloc(32, seedByte));
}

export function testAddress(last: number, workChain = 0): Address {
  const hash = Buffer.alloc(32);
  hash[31] = last;
  return new Address(workChain, hash);
}

export function toCore(cell: Cell): CoreCell {
  return CoreCell.fromBoc(serializeBoc(cell))[0];
}

export function fromCore(cell: CoreCell): Cell {
  return cellFromBoc(cell.toBoc());
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected the call to throw");
}

export function expectCode(
  fn: () => unknown,
  type: abstract new (...args: never[]) => Error,
  code: string,
) {
  const error = catchError(fn);
  expect(error).toBeInstanceOf(type);
  expect(error).toHaveProperty("code", code);
}
