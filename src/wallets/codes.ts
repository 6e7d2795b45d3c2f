import { WalletContractV5R1 } from "@ton/ton";
import { cellFromBoc } from "../boc";
import type { Cell } from "../cell/cell";
import codes from "./wallet-codes.json";
import { WalletVariant } from "./types";

const cache = new Map<WalletVariant, Cell>();

function decode(variant: WalletVariant): Cell {
  switch (variant) {
    case WalletVariant.V3R2:
      return cellFromBoc(codes.v3r2);
    case WalletVariant.V4R2:
      return cellFromBoc(codes.v4r2);
    case WalletVariant.HighloadV3:
      return cellFromBoc(codes.highloadV3);
    case WalletVariant.PreprocessedV2:
      return cellFromBoc(codes.preprocessedV2);
    case WalletVariant.V5R1:
      // the code cell does not depend on the key
      return cellFromBoc(
        WalletContractV5R1.create({ publicKey: Buffer.alloc(32) }).init.code.toBoc(),
      );
  }
}

export function walletCode(variant: WalletVariant): Cell {
  let code = cache.get(variant);
  if (!code) {
    code = decode(variant);
    cache.set(variant, code);
  }
  return code;
}
