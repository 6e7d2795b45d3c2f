import { VariantError } from "../errors";

const BIT_NUMBER_SIZE = 10;
const MAX_BIT_NUMBER = 1022;
const MAX_SHIFT = 8191;

/**
 * 23-bit highload query id: `shift:13 ‖ bit_number:10`. Bit numbers run to
 * 1022, so one shift covers 1023 ids.
 */
export class HighloadQueryId {
  private constructor(
    readonly shift: number,
    readonly bitNumber: number,
  ) {}

  static fromShiftAndBitNumber(shift: number, bitNumber: number): HighloadQueryId {
    if (!Number.isInteger(shift) || shift < 0 || shift > MAX_SHIFT) {
      throw new VariantError("InvalidSequence", `query shift ${shift} is out of 0..${MAX_SHIFT}`);
    }
    if (!Number.isInteger(bitNumber) || bitNumber < 0 || bitNumber > MAX_BIT_NUMBER) {
      throw new VariantError(
        "InvalidSequence",
        `query bit number ${bitNumber} is out of 0..${MAX_BIT_NUMBER}`,
      );
    }
    return new HighloadQueryId(shift, bitNumber);
  }

  static fromQueryId(queryId: number): HighloadQueryId {
    return HighloadQueryId.fromShiftAndBitNumber(
      Math.floor(queryId / (1 << BIT_NUMBER_SIZE)),
      queryId % (1 << BIT_NUMBER_SIZE),
    );
  }

  /** n-th id in issue order. */
  static fromSeqno(seqno: number): HighloadQueryId {
    return HighloadQueryId.fromShiftAndBitNumber(
      Math.floor(seqno / (MAX_BIT_NUMBER + 1)),
      seqno % (MAX_BIT_NUMBER + 1),
    );
  }

  get queryId(): number {
    return this.shift * (1 << BIT_NUMBER_SIZE) + this.bitNumber;
  }

  toSeqno(): number {
    return this.shift * (MAX_BIT_NUMBER + 1) + this.bitNumber;
  }

  hasNext(): boolean {
    return this.shift < MAX_SHIFT || this.bitNumber < MAX_BIT_NUMBER;
  }

  next(): HighloadQueryId {
    if (!this.hasNext()) {
      throw new VariantError("InvalidSequence", "query id space is exhausted");
    }
    if (this.bitNumber === MAX_BIT_NUMBER) {
      return new HighloadQueryId(this.shift + 1, 0);
    }
    return new HighloadQueryId(this.shift, this.bitNumber + 1);
  }

  equals(other: HighloadQueryId): boolean {
    return this.queryId === other.queryId;
  }
}

/**
 * Per-wallet record of query ids awaiting confirmation. An id is pending from
 * reservation until its expiry (`created_at + timeout`) or confirmation,
 * whichever comes first; afterwards it may be issued again.
 */
export class QueryIdWindow {
  private readonly pending = new Map<number, number>();

  get size(): number {
    return this.pending.size;
  }

  isAvailable(queryId: HighloadQueryId, now: number): boolean {
    const expiresAt = this.pending.get(queryId.queryId);
    return expiresAt === undefined || expiresAt <= now;
  }

  reserve(queryId: HighloadQueryId, expiresAt: number, now: number) {
    if (!this.isAvailable(queryId, now)) {
      throw new VariantError(
        "QueryIdInUse",
        `query id ${queryId.queryId} is pending until ${this.pending.get(queryId.queryId)}`,
      );
    }
    this.pending.set(queryId.queryId, expiresAt);
  }

  /** The wallet processed the query; the id may be issued again. */
  confirm(queryId: HighloadQueryId) {
    this.pending.delete(queryId.queryId);
  }

  /** The query was never submitted. */
  release(queryId: HighloadQueryId) {
    this.pending.delete(queryId.queryId);
  }

  /** Drops every expired reservation. */
  prune(now: number) {
    for (const [queryId, expiresAt] of this.pending) {
      if (expiresAt <= now) {
        this.pending.delete(queryId);
      }
    }
  }

  /** Smallest id in issue order that is not pending at `now`. */
  next(now: number): HighloadQueryId {
    let candidate = HighloadQueryId.fromSeqno(0);
    while (!this.isAvailable(candidate, now)) {
      candidate = candidate.next();
    }
    return candidate;
  }
}
