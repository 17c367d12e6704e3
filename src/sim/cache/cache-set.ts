/**
 * cache-set.ts — One set: E lines plus the cold-fill cursor.
 *
 * Lines are allocated once and only ever overwritten in place.
 */

export interface CacheLine {
  valid: boolean;
  dirty: boolean;
  tag: bigint;
  /** Clock value at the last hit or fill */
  lru: bigint;
}

export class CacheSet {
  readonly lines: CacheLine[];
  private cursor = 0;

  constructor(readonly capacity: number) {
    this.lines = Array.from({ length: capacity }, () => ({
      valid: false,
      dirty: false,
      tag: 0n,
      lru: 0n,
    }));
  }

  /** Lines filled since construction; never exceeds capacity. */
  get fillCursor(): number {
    return this.cursor;
  }

  get isFull(): boolean {
    return this.cursor >= this.capacity;
  }

  /** First valid line holding `tag`, scanning from index 0. */
  findLine(tag: bigint): CacheLine | undefined {
    for (const line of this.lines) {
      if (line.valid && line.tag === tag) return line;
    }
    return undefined;
  }

  /** Take the next never-filled line. Only legal while the set is not full. */
  claimColdLine(): CacheLine {
    if (this.isFull) {
      throw new RangeError("claimColdLine called on a full set");
    }
    const line = this.lines[this.cursor];
    this.cursor += 1;
    return line;
  }

  /**
   * Index of the line with the smallest lru. The comparison is strict, so
   * ties resolve to the lowest index.
   */
  victimIndex(): number {
    let victim = 0;
    let minLru = this.lines[0].lru;
    for (let i = 1; i < this.lines.length; i++) {
      if (minLru > this.lines[i].lru) {
        minLru = this.lines[i].lru;
        victim = i;
      }
    }
    return victim;
  }
}
