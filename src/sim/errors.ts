/**
 * errors.ts — Typed error taxonomy for the simulator.
 *
 * Every failure is fatal to the run. Codes are stable and machine-readable
 * so the JSON output mode can report them without parsing messages.
 */

// ─── Error Codes ────────────────────────────────────────────────

export const SimErrorCode = {
  CONFIG_INVALID: "CONFIG_INVALID",
  TRACE_FORMAT: "TRACE_FORMAT",
  TRACE_UNREADABLE: "TRACE_UNREADABLE",
  RESOURCE_EXHAUSTED: "RESOURCE_EXHAUSTED",
} as const;

export type SimErrorCodeValue = (typeof SimErrorCode)[keyof typeof SimErrorCode];

/** Why a trace line was rejected. */
export const TraceFormatReason = {
  LINE_TOO_LONG: "LINE_TOO_LONG",
  MISSING_FIELD: "MISSING_FIELD",
  TRAILING_JUNK: "TRAILING_JUNK",
  BAD_OP: "BAD_OP",
  BAD_ADDRESS: "BAD_ADDRESS",
  BAD_SIZE: "BAD_SIZE",
} as const;

export type TraceFormatReasonValue = (typeof TraceFormatReason)[keyof typeof TraceFormatReason];

// ─── Error Types ────────────────────────────────────────────────

export class SimError extends Error {
  override readonly name: string = "SimError";
  readonly code: SimErrorCodeValue;
  readonly detail?: unknown;

  constructor(code: SimErrorCodeValue, message: string, detail?: unknown) {
    super(message);
    this.code = code;
    this.detail = detail;
  }
}

/** Invalid or missing s, E, b or trace path. Raised before any access. */
export class ConfigError extends SimError {
  override readonly name: string = "ConfigError";
  readonly hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(SimErrorCode.CONFIG_INVALID, message);
    this.hints = hints;
  }
}

export interface TraceFormatDetail {
  line: number;
  reason: TraceFormatReasonValue;
  text: string;
}

export class TraceFormatError extends SimError {
  override readonly name: string = "TraceFormatError";
  /** Where and why the trace was rejected; also carried as `detail` */
  readonly trace: TraceFormatDetail;

  constructor(message: string, trace: TraceFormatDetail) {
    super(SimErrorCode.TRACE_FORMAT, `line ${trace.line}: ${message}`, trace);
    this.trace = trace;
  }
}

export class TraceReadError extends SimError {
  override readonly name: string = "TraceReadError";

  constructor(path: string, cause: unknown) {
    super(
      SimErrorCode.TRACE_UNREADABLE,
      `Error opening trace file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { path },
    );
  }
}

/** The requested geometry cannot be allocated. */
export class ResourceError extends SimError {
  override readonly name: string = "ResourceError";

  constructor(message: string, detail?: unknown) {
    super(SimErrorCode.RESOURCE_EXHAUSTED, message, detail);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
