/**
 * parser.ts — Trace text → access records.
 *
 * Line grammar:  <op> <hex-address>,<decimal-size>
 *   op       — "L" (load) or "S" (store), always column 0
 *   address  — hex, optional 0x prefix, must fit in 64 bits
 *   size     — decimal, must fit in 32 bits
 *
 * Lines longer than MAX_LINE_LENGTH characters (terminator excluded) are
 * rejected outright. Blank lines are skipped. Parsing is lazy: the first
 * bad line throws and nothing after it is read.
 */

import type { AccessOp } from "../cache/cache-model.js";
import { U64_MASK } from "../cache/address.js";
import { TraceFormatError, TraceFormatReason } from "../errors.js";

// ─── Types ──────────────────────────────────────────────────────

export interface AccessRecord {
  op: AccessOp;
  address: bigint;
  size: number;
  /** 1-based line number in the trace */
  line: number;
}

// ─── Constants ──────────────────────────────────────────────────

/** "S " + 16 hex digits + "," + 4 size digits, with one spare column. */
export const MAX_LINE_LENGTH = 23;

const MAX_SIZE = 0xffff_ffff;
const HEX_ADDRESS = /^(?:0[xX])?([0-9a-fA-F]+)$/;
const DECIMAL_SIZE = /^[0-9]+$/;
const FIELD_SEPARATORS = /[\t\r\n ]/;

// ─── Tokenizing ─────────────────────────────────────────────────

interface LineTokens {
  op: string;
  address: string | undefined;
  size: string | undefined;
  junk: string | undefined;
}

/** Take the next run of non-separator characters, skipping leading separators. */
function nextToken(input: string): { token: string | undefined; rest: string } {
  let start = 0;
  while (start < input.length && FIELD_SEPARATORS.test(input[start])) start++;
  if (start === input.length) return { token: undefined, rest: "" };
  let end = start;
  while (end < input.length && !FIELD_SEPARATORS.test(input[end])) end++;
  return { token: input.slice(start, end), rest: input.slice(end) };
}

function tokenize(text: string): LineTokens {
  const op = text.charAt(0);
  const body = text.slice(2).replace(/^,+/, "");
  if (body.length === 0) {
    return { op, address: undefined, size: undefined, junk: undefined };
  }

  const comma = body.indexOf(",");
  const address = comma < 0 ? body : body.slice(0, comma);
  const afterAddress = comma < 0 ? "" : body.slice(comma + 1);

  const size = nextToken(afterAddress);
  const junk = nextToken(size.rest);
  return { op, address, size: size.token, junk: junk.token };
}

// ─── Parsing ────────────────────────────────────────────────────

/** Parse one non-blank trace line. Throws TraceFormatError on any defect. */
export function parseTraceLine(text: string, line: number): AccessRecord {
  const fail = (reason: keyof typeof TraceFormatReason, message: string): never => {
    throw new TraceFormatError(message, { line, reason: TraceFormatReason[reason], text });
  };

  if (text.length > MAX_LINE_LENGTH) {
    fail("LINE_TOO_LONG", `line exceeds ${MAX_LINE_LENGTH} characters`);
  }

  const tokens = tokenize(text);
  if (!tokens.op || tokens.address === undefined || tokens.size === undefined) {
    return fail("MISSING_FIELD", "missing element in instruction");
  }
  if (tokens.junk !== undefined) {
    fail("TRAILING_JUNK", `unexpected junk in trace file: ${tokens.junk}`);
  }
  if (tokens.op !== "L" && tokens.op !== "S") {
    return fail("BAD_OP", `invalid operation '${tokens.op}'`);
  }

  const hex = HEX_ADDRESS.exec(tokens.address.trimStart());
  if (!hex) {
    return fail("BAD_ADDRESS", `invalid address '${tokens.address}'`);
  }
  const address = BigInt(`0x${hex[1]}`);
  if (address > U64_MASK) {
    fail("BAD_ADDRESS", `address '${tokens.address}' does not fit in 64 bits`);
  }

  if (!DECIMAL_SIZE.test(tokens.size)) {
    return fail("BAD_SIZE", `invalid size '${tokens.size}'`);
  }
  const size = Number(tokens.size);
  if (size > MAX_SIZE) {
    fail("BAD_SIZE", `size '${tokens.size}' does not fit in 32 bits`);
  }

  return { op: tokens.op, address, size, line };
}

/** Lazily parse a whole trace, in file order. */
export function* parseTrace(source: string): Generator<AccessRecord, void, undefined> {
  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    if (text.trim().length === 0) continue;
    yield parseTraceLine(text, i + 1);
  }
}
