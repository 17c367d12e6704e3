/**
 * cache-model.ts — Set-associative cache with LRU replacement.
 *
 * The model tracks only line metadata; data values are never stored.
 * A single logical clock, shared by all sets, stamps every hit and every
 * fill and is the sole ordering signal for replacement.
 *
 * The clock is an unsigned 64-bit counter and wraps to 0 after 2^64 - 1.
 * After a wrap, freshly touched lines compare as older than everything
 * stamped before it, so LRU order is wrong until the pre-wrap lines are
 * gone. That limitation is reproduced, not corrected; the model logs a
 * warning the first time it happens.
 */

import { log } from "../logger.js";
import { decodeAddress, U64_MASK } from "./address.js";
import { CacheSet, type CacheLine } from "./cache-set.js";
import { blockSize, validateGeometry, DEFAULT_MAX_LINES, type CacheGeometry } from "./geometry.js";
import { StatisticsCollector, type CacheStatistics } from "./statistics.js";

// ─── Types ──────────────────────────────────────────────────────

export type AccessOp = "L" | "S";

export type AccessKind = "hit" | "miss" | "eviction";

/** What a single access did, with the dirty counters after it. */
export interface AccessOutcome {
  kind: AccessKind;
  setIndex: number;
  tag: bigint;
  dirtyBytes: bigint;
  dirtyEvictions: bigint;
}

export interface CacheModelOptions {
  /** Ceiling on 2^s · E lines (default: DEFAULT_MAX_LINES) */
  maxLines?: number;
  /** Starting clock value; lets callers exercise the wrap boundary */
  initialClock?: bigint;
}

// ─── Model ──────────────────────────────────────────────────────

export class CacheModel {
  readonly geometry: Readonly<CacheGeometry>;
  private readonly sets: CacheSet[];
  private readonly stats: StatisticsCollector;
  private clock: bigint;
  private clockWrapped = false;

  constructor(geometry: CacheGeometry, options: CacheModelOptions = {}) {
    validateGeometry(geometry, options.maxLines ?? DEFAULT_MAX_LINES);
    this.geometry = Object.freeze({ ...geometry });
    this.sets = Array.from({ length: 2 ** geometry.setBits }, () => new CacheSet(geometry.linesPerSet));
    this.stats = new StatisticsCollector(blockSize(geometry));
    this.clock = (options.initialClock ?? 0n) & U64_MASK;

    log.boot.debug(
      { sets: this.sets.length, linesPerSet: geometry.linesPerSet, blockBytes: Number(blockSize(geometry)) },
      "cache model built",
    );
  }

  /**
   * Apply one load or store. `size` is accepted for interface parity;
   * accesses are assumed to lie inside one block.
   */
  access(address: bigint, op: AccessOp, _size: number): AccessOutcome {
    const { tag, setIndex } = decodeAddress(address, this.geometry.setBits, this.geometry.blockBits);
    const set = this.sets[setIndex];

    if (this.detectHit(set, tag, op)) {
      return this.outcome("hit", setIndex, tag);
    }

    this.stats.recordMiss();

    if (!set.isFull) {
      this.fill(set.claimColdLine(), tag, op);
      return this.outcome("miss", setIndex, tag);
    }

    const victim = set.lines[set.victimIndex()];
    if (victim.dirty) {
      this.stats.dirtyLineEvicted();
    }
    this.fill(victim, tag, op);
    this.stats.recordEviction();
    return this.outcome("eviction", setIndex, tag);
  }

  /** Read-only copy of the counters. */
  statistics(): Readonly<CacheStatistics> {
    return this.stats.snapshot();
  }

  /** Current clock value (the stamp the next touch will receive). */
  get currentClock(): bigint {
    return this.clock;
  }

  get setCount(): number {
    return this.sets.length;
  }

  /** Copy of one set's lines and fill cursor, for inspection. */
  inspectSet(setIndex: number): { fillCursor: number; lines: CacheLine[] } {
    const set = this.sets[setIndex];
    if (!set) {
      throw new RangeError(`set index ${setIndex} out of range 0..${this.sets.length - 1}`);
    }
    return { fillCursor: set.fillCursor, lines: set.lines.map((line) => ({ ...line })) };
  }

  // ─── Internals ────────────────────────────────────────────────

  private detectHit(set: CacheSet, tag: bigint, op: AccessOp): boolean {
    const line = set.findLine(tag);
    if (!line) return false;

    this.stats.recordHit();
    line.lru = this.tick();
    // Only the clean → dirty transition counts, so repeated stores never double-count.
    if (op === "S" && !line.dirty) {
      line.dirty = true;
      this.stats.lineDirtied();
    }
    return true;
  }

  private fill(line: CacheLine, tag: bigint, op: AccessOp): void {
    line.valid = true;
    line.tag = tag;
    line.dirty = op === "S";
    line.lru = this.tick();
    if (line.dirty) {
      this.stats.lineDirtied();
    }
  }

  /** Return the current stamp and advance the clock modulo 2^64. */
  private tick(): bigint {
    const stamp = this.clock;
    this.clock = (this.clock + 1n) & U64_MASK;
    if (this.clock === 0n && !this.clockWrapped) {
      this.clockWrapped = true;
      log.cache.warn({ lastStamp: stamp.toString() }, "logical clock wrapped to 0; LRU order is unreliable from here");
    }
    return stamp;
  }

  private outcome(kind: AccessKind, setIndex: number, tag: bigint): AccessOutcome {
    return {
      kind,
      setIndex,
      tag,
      dirtyBytes: this.stats.currentDirtyBytes,
      dirtyEvictions: this.stats.currentDirtyEvictions,
    };
  }
}
