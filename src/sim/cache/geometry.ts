/**
 * geometry.ts — Cache shape (s, E, b) and its preconditions.
 */

import { ConfigError, ResourceError } from "../errors.js";

export interface CacheGeometry {
  /** Set-index bits; the cache has 2^setBits sets */
  setBits: number;
  /** Lines per set (associativity, E) */
  linesPerSet: number;
  /** Block bits; each block holds 2^blockBits bytes */
  blockBits: number;
}

/** Default ceiling on 2^s · E line records held in memory. */
export const DEFAULT_MAX_LINES = 1 << 24;

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Reject geometries the model cannot simulate. Throws ConfigError for
 * shapes that are invalid in themselves and ResourceError for valid
 * shapes too large to hold.
 */
export function validateGeometry(geometry: CacheGeometry, maxLines = DEFAULT_MAX_LINES): void {
  const { setBits, linesPerSet, blockBits } = geometry;

  if (!isCount(setBits) || !isCount(blockBits) || !isCount(linesPerSet)) {
    throw new ConfigError(
      `s, E and b must be non-negative integers (s = ${setBits}, E = ${linesPerSet}, b = ${blockBits})`,
    );
  }
  if (linesPerSet < 1) {
    throw new ConfigError("E must be at least 1", ["A direct-mapped cache is -E 1"]);
  }
  if (blockBits >= 64 || setBits >= 64 || setBits + blockBits >= 64) {
    throw new ConfigError(`s + b is too large (s = ${setBits}, b = ${blockBits})`, [
      "s + b must be below 64",
    ]);
  }

  const totalLines = 2 ** setBits * linesPerSet;
  if (totalLines > maxLines) {
    throw new ResourceError(
      `Failed to allocate memory: ${2 ** setBits} sets × ${linesPerSet} lines exceeds the ${maxLines}-line limit`,
      { setBits, linesPerSet, maxLines },
    );
  }
}

/** Size in bytes of one block. */
export function blockSize(geometry: CacheGeometry): bigint {
  return 1n << BigInt(geometry.blockBits);
}
