/**
 * address.ts — Split a 64-bit address into tag, set index and block offset.
 */

export const U64_MASK = (1n << 64n) - 1n;

export interface DecodedAddress {
  tag: bigint;
  setIndex: number;
  offset: bigint;
}

/**
 * Decode `address` for a cache with `2^setBits` sets of `2^blockBits`-byte
 * blocks. Caller guarantees `setBits + blockBits < 64`.
 */
export function decodeAddress(address: bigint, setBits: number, blockBits: number): DecodedAddress {
  const a = address & U64_MASK;
  const b = BigInt(blockBits);
  const s = BigInt(setBits);

  const tag = a >> (b + s);
  // s = 0 is a single fully-associative set.
  const setIndex = setBits === 0 ? 0 : Number((a >> b) & ((1n << s) - 1n));
  const offset = a & ((1n << b) - 1n);

  return { tag, setIndex, offset };
}
