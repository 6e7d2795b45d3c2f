export { DEFAULT_TTL, TransactionAssembler } from "./transaction.assembler";
export type {
  TAssembleOptions,
  TPreparedTransaction,
  TReservation,
  TSignedTransaction,
} from "./types";
