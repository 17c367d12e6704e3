/**
 * statistics.ts — Running counters mutated only by CacheModel.
 */

export interface CacheStatistics {
  hits: bigint;
  misses: bigint;
  evictions: bigint;
  /** Bytes held in valid, dirty lines right now */
  dirtyBytes: bigint;
  /** Bytes of dirty lines evicted so far */
  dirtyEvictions: bigint;
}

export class StatisticsCollector {
  private hits = 0n;
  private misses = 0n;
  private evictions = 0n;
  private dirtyBytes = 0n;
  private dirtyEvictions = 0n;

  constructor(private readonly blockSize: bigint) {}

  recordHit(): void {
    this.hits += 1n;
  }

  recordMiss(): void {
    this.misses += 1n;
  }

  recordEviction(): void {
    this.evictions += 1n;
  }

  /** A line turned dirty, by a store hit or a store fill. */
  lineDirtied(): void {
    this.dirtyBytes += this.blockSize;
  }

  /** A dirty line is being evicted; its bytes leave the cache. */
  dirtyLineEvicted(): void {
    this.dirtyEvictions += this.blockSize;
    this.dirtyBytes -= this.blockSize;
  }

  get currentDirtyBytes(): bigint {
    return this.dirtyBytes;
  }

  get currentDirtyEvictions(): bigint {
    return this.dirtyEvictions;
  }

  snapshot(): Readonly<CacheStatistics> {
    return Object.freeze({
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      dirtyBytes: this.dirtyBytes,
      dirtyEvictions: this.dirtyEvictions,
    });
  }
}
