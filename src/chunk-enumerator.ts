import { MEMBER_SIZE_FIELD } from './shader-constants.js';

export type ChunkValidation =
  | { ok: true; count: number }
  | { ok: false; chunkIndex: number; offset: number };

/**
 * Cursor over a run of `[uint32 LE size][size bytes]` members.
 *
 * The cursor only ever moves forward; create a new enumerator to start over.
 */
export class ChunkEnumerator implements Iterable<Buffer> {
  private readonly range: Buffer;
  private position = 0;
  private advanced = 0;

  constructor(range: Buffer) {
    this.range = range;
  }

  /** Byte offset of the cursor within the enumerated range. */
  get offset(): number {
    return this.position;
  }

  /** Number of members the cursor has moved past. */
  get index(): number {
    return this.advanced;
  }

  get remaining(): number {
    return this.range.length - this.position;
  }

  isAtEnd(): boolean {
    return this.remaining === 0;
  }

  /**
   * True when the member at the cursor cannot be read: its size field is cut
   * off, or its data would run past the end of the range.
   * Never true at the end.
   */
  hasError(): boolean {
    if (this.isAtEnd()) {
      return false;
    }
    if (this.remaining < MEMBER_SIZE_FIELD) {
      return true;
    }
    return this.currentSize() + MEMBER_SIZE_FIELD > this.remaining;
  }

  finished(): boolean {
    return this.isAtEnd() || this.hasError();
  }

  /**
   * Data of the member at the cursor, or an empty buffer once finished.
   * The result is a view into the enumerated range, not a copy.
   */
  current(): Buffer {
    if (this.finished()) {
      return this.range.subarray(0, 0);
    }
    const start = this.position + MEMBER_SIZE_FIELD;
    return this.range.subarray(start, start + this.currentSize());
  }

  /** Moves past the current member. Does nothing once finished. */
  advance(): this {
    if (!this.finished()) {
      this.position += MEMBER_SIZE_FIELD + this.currentSize();
      this.advanced++;
    }
    return this;
  }

  *[Symbol.iterator](): Iterator<Buffer> {
    for (; !this.finished(); this.advance()) {
      yield this.current();
    }
  }

  private currentSize(): number {
    return this.range.readUInt32LE(this.position);
  }
}

/**
 * Walks every member of `region`. On failure, `chunkIndex` is the 1-based
 * position of the first unreadable member and `offset` where it starts.
 */
export function validateChunks(region: Buffer): ChunkValidation {
  const enumerator = new ChunkEnumerator(region);
  while (!enumerator.finished()) {
    enumerator.advance();
  }

  if (enumerator.hasError()) {
    return { ok: false, chunkIndex: enumerator.index + 1, offset: enumerator.offset };
  }
  return { ok: true, count: enumerator.index };
}
