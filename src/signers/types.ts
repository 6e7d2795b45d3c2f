import type { Cell } from "../cell/cell";

export interface ISigner {
  readonly publicKey: Buffer;
  /** Ed25519 signature over the cell's representation hash. */
  signCell(cell: Cell): Promise<Buffer>;
}
