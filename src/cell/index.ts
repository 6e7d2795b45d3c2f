export { BitBuilder } from "./bit-builder";
export { BitString } from "./bit-string";
export { Builder, beginCell, type Writable } from "./builder";
export {
  Cell,
  CellType,
  MAX_CELL_BITS,
  MAX_CELL_DEPTH,
  MAX_CELL_REFS,
} from "./cell";
export { crc16, crc32c } from "./crc";
export { DictValues, parseDict, serializeDict, type TDictValue } from "./dictionary";
export { Slice } from "./slice";
