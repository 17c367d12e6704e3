/**
 * config.ts — Unified Configuration Resolution
 *
 * Single source of truth for a simulation run. Sources:
 *   1. Command-line flags  — cache geometry, trace path, output modes
 *   2. Environment         — memory ceiling, log level
 *   3. Defaults            ← lowest
 *
 * Rules:
 * - Geometry and trace path come only from flags; all four are mandatory
 * - No `process.env` reads outside this file (except logger bootstrap)
 * - Everything is validated before the cache is built
 */

import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_LINES, validateGeometry } from "./cache/geometry.js";
import { LOG_LEVELS, resolveLevel } from "./logger.js";

// ─── Configuration Interface ────────────────────────────────────

export interface SimConfig {
  // ── Cache geometry ──────────────────────────────────────────
  /** Set-index bits, -s (2^s sets) */
  setBits: number;
  /** Lines per set, -E */
  linesPerSet: number;
  /** Block bits, -b (2^b-byte blocks) */
  blockBits: number;

  // ── Input / output ──────────────────────────────────────────
  /** Trace file, -t */
  tracePath: string;
  /** Print the outcome of every access, -v */
  verbose: boolean;
  /** Emit a JSON result instead of the summary line, --json */
  json: boolean;
  /** Also write the counters to this file, --results */
  resultsPath: string | null;

  // ── Limits ──────────────────────────────────────────────────
  /** Ceiling on 2^s · E simulated lines (CSIM_MAX_LINES) */
  maxLines: number;

  // ── Logging ─────────────────────────────────────────────────
  /** Level applied to every logger once the run starts */
  logLevel: string;
}

/** Raw flag values as they appear on the command line. */
export interface CliArgs {
  help: boolean;
  verbose: boolean;
  json: boolean;
  setBits?: string;
  linesPerSet?: string;
  blockBits?: string;
  tracePath?: string;
  resultsPath?: string;
}

// ─── Arg parsing ────────────────────────────────────────────────

const VALUE_FLAGS: Record<string, "setBits" | "linesPerSet" | "blockBits" | "tracePath"> = {
  s: "setBits",
  E: "linesPerSet",
  b: "blockBits",
  t: "tracePath",
};

const MISSING_HINT = "The -s, -b, -E, and -t options must be supplied for all simulations.";

/**
 * getopt-style parsing of "hvs:b:E:t:" plus --json and --results.
 * Short flags may be clustered (-vs4); a value flag takes the rest of its
 * argument (-s4) or the next one (-s 4).
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, verbose: false, json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--json") {
      args.json = true;
      continue;
    }
    if (arg === "--help") {
      args.help = true;
      continue;
    }
    if (arg.startsWith("--results")) {
      const inline = arg.startsWith("--results=") ? arg.slice("--results=".length) : undefined;
      if (inline === undefined && arg !== "--results") {
        throw new ConfigError(`Unknown option: ${arg}`);
      }
      const value = inline ?? argv[++i];
      if (!value) throw new ConfigError("--results requires a file path");
      args.resultsPath = value;
      continue;
    }
    if (!arg.startsWith("-") || arg.length < 2 || arg.startsWith("--")) {
      throw new ConfigError(`Unexpected argument: ${arg}`, ["Run with -h for usage"]);
    }

    for (let pos = 1; pos < arg.length; pos++) {
      const flag = arg[pos];
      if (flag === "h") {
        args.help = true;
        continue;
      }
      if (flag === "v") {
        args.verbose = true;
        continue;
      }

      const key = VALUE_FLAGS[flag];
      if (!key) {
        throw new ConfigError(`Unknown option: -${flag}`, ["Run with -h for usage"]);
      }
      const value = pos + 1 < arg.length ? arg.slice(pos + 1) : argv[++i];
      if (value === undefined) {
        throw new ConfigError(`Option -${flag} requires an argument`, [MISSING_HINT]);
      }
      args[key] = value;
      break;
    }
  }

  return args;
}

// ─── Resolution Helpers ─────────────────────────────────────────

function parseCount(raw: string, flag: string): number {
  if (!/^[0-9]+$/.test(raw)) {
    throw new ConfigError(`-${flag} must be a non-negative integer, got '${raw}'`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(`-${flag} is out of range: ${raw}`);
  }
  return value;
}

function resolveLogLevel(env: NodeJS.ProcessEnv): string {
  const level = resolveLevel(env);
  if (!LOG_LEVELS.some((known) => known === level)) {
    throw new ConfigError(`CSIM_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got '${level}'`);
  }
  return level;
}

function resolveMaxLines(env: NodeJS.ProcessEnv): number {
  const raw = (env.CSIM_MAX_LINES || "").trim();
  if (!raw) return DEFAULT_MAX_LINES;
  const value = Number(raw);
  if (!/^[0-9]+$/.test(raw) || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`CSIM_MAX_LINES must be a positive integer, got '${raw}'`);
  }
  return value;
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve a complete run configuration from parsed flags and environment.
 * Throws ConfigError (or ResourceError for oversized geometry).
 */
export function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): SimConfig {
  if (
    args.setBits === undefined ||
    args.linesPerSet === undefined ||
    args.blockBits === undefined ||
    args.tracePath === undefined
  ) {
    throw new ConfigError("Mandatory arguments missing or zero.", [MISSING_HINT]);
  }

  const setBits = parseCount(args.setBits, "s");
  const linesPerSet = parseCount(args.linesPerSet, "E");
  const blockBits = parseCount(args.blockBits, "b");
  const maxLines = resolveMaxLines(env);

  validateGeometry({ setBits, linesPerSet, blockBits }, maxLines);

  return {
    setBits,
    linesPerSet,
    blockBits,
    tracePath: args.tracePath,
    verbose: args.verbose,
    json: args.json,
    resultsPath: args.resultsPath ?? null,
    maxLines,
    logLevel: resolveLogLevel(env),
  };
}
