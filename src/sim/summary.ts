/**
 * summary.ts — Text renderings of simulation results.
 */

import { writeFile } from "node:fs/promises";
import type { AccessOutcome } from "./cache/cache-model.js";
import type { CacheStatistics } from "./cache/statistics.js";
import type { AccessRecord } from "./trace/parser.js";

/** `hits:1 misses:3 evictions:1 dirty_bytes_in_cache:16 dirty_bytes_evicted:0` */
export function formatSummary(stats: Readonly<CacheStatistics>): string {
  return (
    `hits:${stats.hits} misses:${stats.misses} evictions:${stats.evictions} ` +
    `dirty_bytes_in_cache:${stats.dirtyBytes} dirty_bytes_evicted:${stats.dirtyEvictions}`
  );
}

/** Verbose per-access line, e.g. `S 40,4 miss eviction dirty_bytes:16 evicted:0`. */
export function formatAccess(record: AccessRecord, outcome: AccessOutcome): string {
  const head = `${record.op} ${record.address.toString(16)},${record.size}`;
  switch (outcome.kind) {
    case "hit":
      return `${head} hit dirty_bytes:${outcome.dirtyBytes}`;
    case "miss":
      return `${head} miss dirty_bytes:${outcome.dirtyBytes}`;
    case "eviction":
      return `${head} miss eviction dirty_bytes:${outcome.dirtyBytes} evicted:${outcome.dirtyEvictions}`;
  }
}

/** Five space-separated counters, newline-terminated. */
export function formatResults(stats: Readonly<CacheStatistics>): string {
  return [stats.hits, stats.misses, stats.evictions, stats.dirtyBytes, stats.dirtyEvictions].join(" ") + "\n";
}

export async function writeResults(path: string, stats: Readonly<CacheStatistics>): Promise<void> {
  await writeFile(path, formatResults(stats), "utf-8");
}

/** Counters as decimal strings, for JSON output. */
export function statisticsToJson(stats: Readonly<CacheStatistics>): Record<string, string> {
  return {
    hits: stats.hits.toString(),
    misses: stats.misses.toString(),
    evictions: stats.evictions.toString(),
    dirtyBytes: stats.dirtyBytes.toString(),
    dirtyEvictions: stats.dirtyEvictions.toString(),
  };
}
