import type { Cell } from "../cell/cell";
import { DecodingError } from "../errors";
import { deserializeBoc } from "./deserialize";
import { serializeBoc, type TSerializeOptions } from "./serialize";

export { deserializeBoc } from "./deserialize";
export { BOC_GENERIC_MAGIC, serializeBoc, type TSerializeOptions } from "./serialize";

const HEX_PATTERN = /^([0-9a-fA-F]{2})+$/;

/** Single-root BOC from raw bytes, a hex string or a base64 string. */
export function cellFromBoc(src: Buffer | string): Cell {
  const bytes =
    typeof src !== "string"
      ? src
      : HEX_PATTERN.test(src)
        ? Buffer.from(src, "hex")
        : Buffer.from(src, "base64");
  const roots = deserializeBoc(bytes);
  if (roots.length !== 1) {
    throw new DecodingError(
      "MalformedCell",
      `expected a single root, BOC has ${roots.length}`,
    );
  }
  return roots[0];
}

export function cellToBoc(cell: Cell, opts?: TSerializeOptions): Buffer {
  return serializeBoc(cell, opts);
}
