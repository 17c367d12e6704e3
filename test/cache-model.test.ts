/**
 * cache-model.test.ts — LRU cache model behaviour.
 *
 * Scenarios use s=1, E=1, b=4: two sets of one 16-byte line each.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { CacheModel, type AccessOp } from "../src/sim/cache/cache-model.js";
import { U64_MASK } from "../src/sim/cache/address.js";
import { ConfigError, ResourceError } from "../src/sim/errors.js";
import { log } from "../src/sim/logger.js";
import { assertUniqueTags, seededRandom, validDirtyBytes } from "./helpers/cache-invariants.js";

// ─── Direct-mapped walkthrough ──────────────────────────────────

describe("CacheModel: two-set direct-mapped walkthrough", () => {
  let model: CacheModel;

  beforeEach(() => {
    model = new CacheModel({ setBits: 1, linesPerSet: 1, blockBits: 4 });
  });

  it("cold-misses the first load into set 0", () => {
    const outcome = model.access(0x0n, "L", 1);
    expect(outcome.kind).toBe("miss");
    expect(outcome.setIndex).toBe(0);
    expect(model.statistics()).toMatchObject({ hits: 0n, misses: 1n, evictions: 0n });
  });

  it("fills set 1 independently", () => {
    model.access(0x0n, "L", 1);
    const outcome = model.access(0x14n, "L", 1);
    expect(outcome).toMatchObject({ kind: "miss", setIndex: 1, tag: 0n });
    expect(model.statistics().misses).toBe(2n);
  });

  it("hits on a repeated load", () => {
    model.access(0x0n, "L", 1);
    model.access(0x14n, "L", 1);
    expect(model.access(0x0n, "L", 1).kind).toBe("hit");
    expect(model.statistics()).toMatchObject({ hits: 1n, misses: 2n });
  });

  it("evicts the clean line on a conflicting store and counts it dirty", () => {
    model.access(0x0n, "L", 1);
    model.access(0x14n, "L", 1);
    model.access(0x0n, "L", 1);
    const outcome = model.access(0x40n, "S", 1);

    expect(outcome).toEqual({ kind: "eviction", setIndex: 0, tag: 2n, dirtyBytes: 16n, dirtyEvictions: 0n });
    expect(model.statistics()).toEqual({
      hits: 1n,
      misses: 3n,
      evictions: 1n,
      dirtyBytes: 16n,
      dirtyEvictions: 0n,
    });
    expect(model.currentClock).toBe(4n);
  });

  it("does not double-count a second store to a dirty line", () => {
    model.access(0x0n, "L", 1);
    model.access(0x14n, "L", 1);
    model.access(0x0n, "L", 1);
    model.access(0x40n, "S", 1);
    const outcome = model.access(0x40n, "S", 1);

    expect(outcome.kind).toBe("hit");
    expect(model.statistics()).toMatchObject({ hits: 2n, dirtyBytes: 16n });
  });

  it("moves dirty bytes to dirty evictions when a dirty line is replaced", () => {
    model.access(0x40n, "S", 1);
    const outcome = model.access(0x0n, "L", 1);

    expect(outcome).toMatchObject({ kind: "eviction", dirtyBytes: 0n, dirtyEvictions: 16n });
    expect(model.statistics()).toMatchObject({ misses: 2n, evictions: 1n });
  });

  it("re-adds the block when a dirty line is replaced by a store", () => {
    model.access(0x40n, "S", 1);
    model.access(0x0n, "S", 1);
    expect(model.statistics()).toMatchObject({ dirtyBytes: 16n, dirtyEvictions: 16n });
  });

  it("marks a clean line dirty on a store hit", () => {
    model.access(0x14n, "L", 1);
    model.access(0x18n, "S", 1);
    const line = model.inspectSet(1).lines[0];
    expect(line).toMatchObject({ valid: true, dirty: true, tag: 0n });
    expect(model.statistics().dirtyBytes).toBe(16n);
  });
});

// ─── Replacement order ──────────────────────────────────────────

describe("CacheModel: LRU replacement", () => {
  it("evicts the least recently touched line", () => {
    const model = new CacheModel({ setBits: 0, linesPerSet: 2, blockBits: 4 });
    model.access(0x00n, "L", 1);
    model.access(0x10n, "L", 1);
    model.access(0x00n, "L", 1);
    model.access(0x20n, "L", 1);

    expect(model.inspectSet(0).lines.map((line) => line.tag)).toEqual([0n, 2n]);

    model.access(0x10n, "L", 1);
    expect(model.inspectSet(0).lines.map((line) => line.tag)).toEqual([1n, 2n]);
    expect(model.statistics()).toMatchObject({ hits: 1n, misses: 4n, evictions: 2n });
  });

  it("never evicts while the set has unused lines", () => {
    const model = new CacheModel({ setBits: 0, linesPerSet: 4, blockBits: 2 });
    for (const address of [0x0n, 0x4n, 0x8n, 0xcn]) {
      expect(model.access(address, "L", 1).kind).toBe("miss");
    }
    expect(model.inspectSet(0).fillCursor).toBe(4);
    expect(model.access(0x10n, "L", 1).kind).toBe("eviction");
  });

  it("always evicts on the second of two conflicting addresses when E = 1", () => {
    const model = new CacheModel({ setBits: 2, linesPerSet: 1, blockBits: 4 });
    expect(model.access(0x00n, "L", 1).kind).toBe("miss");
    expect(model.access(0x40n, "L", 1)).toMatchObject({ kind: "eviction", setIndex: 0, tag: 1n });
    expect(model.access(0x00n, "L", 1)).toMatchObject({ kind: "eviction", setIndex: 0, tag: 0n });
  });

  it("treats s = 0 as one fully associative set", () => {
    const model = new CacheModel({ setBits: 0, linesPerSet: 3, blockBits: 4 });
    expect(model.setCount).toBe(1);
    model.access(0x100n, "L", 1);
    model.access(0x200n, "L", 1);
    model.access(0x300n, "L", 1);
    expect(model.access(0x200n, "L", 1).kind).toBe("hit");
  });
});

// ─── Clock boundary ─────────────────────────────────────────────

describe("CacheModel: logical clock wrap", () => {
  it("wraps to 0 after 2^64 - 1 and keeps comparing raw stamps", () => {
    const model = new CacheModel({ setBits: 0, linesPerSet: 2, blockBits: 4 }, { initialClock: U64_MASK });
    model.access(0x00n, "L", 1);
    expect(model.currentClock).toBe(0n);
    model.access(0x10n, "L", 1);

    // The post-wrap line has the smaller stamp, so it is chosen even
    // though it was touched last.
    model.access(0x20n, "L", 1);
    const lines = model.inspectSet(0).lines;
    expect(lines[0]).toMatchObject({ tag: 0n, lru: U64_MASK });
    expect(lines[1]).toMatchObject({ tag: 2n, lru: 1n });
    expect(model.currentClock).toBe(2n);
  });

  it("warns once when the clock wraps", () => {
    const warn = vi.spyOn(log.cache, "warn");
    try {
      const model = new CacheModel({ setBits: 0, linesPerSet: 1, blockBits: 4 }, { initialClock: U64_MASK - 1n });
      for (let i = 0; i < 6; i++) model.access(BigInt(i % 2) << 4n, "L", 1);
      expect(model.currentClock).toBe(4n);
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      warn.mockRestore();
    }
  });
});

// ─── Construction ───────────────────────────────────────────────

describe("CacheModel: construction", () => {
  it("builds 2^s sets of E invalid lines", () => {
    const model = new CacheModel({ setBits: 3, linesPerSet: 2, blockBits: 5 });
    expect(model.setCount).toBe(8);
    const set = model.inspectSet(7);
    expect(set.fillCursor).toBe(0);
    expect(set.lines).toEqual([
      { valid: false, dirty: false, tag: 0n, lru: 0n },
      { valid: false, dirty: false, tag: 0n, lru: 0n },
    ]);
  });

  it("rejects invalid geometry before any access", () => {
    expect(() => new CacheModel({ setBits: 1, linesPerSet: 0, blockBits: 4 })).toThrow(ConfigError);
    expect(() => new CacheModel({ setBits: 40, linesPerSet: 1, blockBits: 24 })).toThrow(ConfigError);
    expect(() => new CacheModel({ setBits: 4, linesPerSet: 4, blockBits: 4 }, { maxLines: 8 })).toThrow(ResourceError);
  });

  it("rejects out-of-range set inspection", () => {
    const model = new CacheModel({ setBits: 1, linesPerSet: 1, blockBits: 4 });
    expect(() => model.inspectSet(2)).toThrow(RangeError);
  });

  it("returns copies from inspectSet", () => {
    const model = new CacheModel({ setBits: 0, linesPerSet: 1, blockBits: 4 });
    model.inspectSet(0).lines[0].valid = true;
    expect(model.inspectSet(0).lines[0].valid).toBe(false);
  });
});

// ─── Invariants over a generated trace ──────────────────────────

interface GeneratedAccess {
  address: bigint;
  op: AccessOp;
}

function generateAccesses(seed: number, count: number): GeneratedAccess[] {
  const random = seededRandom(seed);
  return Array.from({ length: count }, (): GeneratedAccess => ({
    address: BigInt(Math.floor(random() * 0x200)),
    op: random() < 0.4 ? "S" : "L",
  }));
}

describe("CacheModel: invariants", () => {
  const geometry = { setBits: 2, linesPerSet: 2, blockBits: 3 };
  const accesses = generateAccesses(0x5eed, 2000);

  it("holds dirty-byte, uniqueness, fill and eviction rules after every access", () => {
    const model = new CacheModel(geometry);
    const cursors = Array.from({ length: model.setCount }, () => 0);

    for (const { address, op } of accesses) {
      const setIndex = Number((address >> 3n) & 3n);
      const before = model.inspectSet(setIndex);
      const minLru = before.lines.reduce((min, line) => (line.lru < min ? line.lru : min), before.lines[0].lru);
      const expectedVictim = before.lines.findIndex((line) => line.lru === minLru);

      const outcome = model.access(address, op, 1);
      const after = model.inspectSet(setIndex);

      expect(outcome.setIndex).toBe(setIndex);
      expect(model.statistics().dirtyBytes).toBe(validDirtyBytes(model));
      expect(outcome.dirtyBytes).toBe(model.statistics().dirtyBytes);
      assertUniqueTags(model);

      expect(after.fillCursor).toBeGreaterThanOrEqual(cursors[setIndex]);
      expect(after.fillCursor).toBeLessThanOrEqual(geometry.linesPerSet);
      cursors[setIndex] = after.fillCursor;

      if (outcome.kind === "eviction") {
        expect(before.fillCursor).toBe(geometry.linesPerSet);
        expect(after.lines[expectedVictim].tag).toBe(outcome.tag);
      }
    }

    const stats = model.statistics();
    expect(stats.hits + stats.misses).toBe(BigInt(accesses.length));
  });

  it("is deterministic across replays", () => {
    const run = () => {
      const model = new CacheModel(geometry);
      for (const { address, op } of accesses) model.access(address, op, 1);
      return model.statistics();
    };
    expect(run()).toEqual(run());
  });
});
