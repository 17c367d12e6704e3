/**
 * driver.ts — Feed access records into a CacheModel in order.
 *
 * Synchronous and unbuffered: each record is applied before the next one
 * is pulled, so a parse error stops the replay with no later record seen.
 */

import type { AccessOutcome, CacheModel } from "../cache/cache-model.js";
import type { CacheStatistics } from "../cache/statistics.js";
import { log } from "../logger.js";
import type { AccessRecord } from "./parser.js";

export interface ReplayOptions {
  /** Called after every access, e.g. for verbose output */
  onAccess?: (record: AccessRecord, outcome: AccessOutcome) => void;
}

export interface ReplayResult {
  records: number;
  statistics: Readonly<CacheStatistics>;
}

export function replayTrace(
  model: CacheModel,
  records: Iterable<AccessRecord>,
  options: ReplayOptions = {},
): ReplayResult {
  let count = 0;
  for (const record of records) {
    const outcome = model.access(record.address, record.op, record.size);
    count++;
    options.onAccess?.(record, outcome);
  }

  const statistics = model.statistics();
  log.trace.debug(
    { records: count, hits: statistics.hits.toString(), misses: statistics.misses.toString() },
    "replay complete",
  );
  return { records: count, statistics };
}
