/**
 * logger.ts — Structured Logging for csim
 *
 * Built on pino. Output goes to stderr so stdout stays reserved for the
 * summary line and verbose per-access output.
 *
 * Configuration:
 *   CSIM_LOG_LEVEL  — Minimum log level (default: "info", tests: "silent")
 *   CSIM_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   CSIM_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info({ setBits: 4 }, "cache built");
 *   log.trace.debug({ records: 120 }, "replay complete");
 *
 * Subsystem loggers:
 *   log.boot, log.trace, log.cache, log.cli
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

/** Resolve log level from environment */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  if (env.CSIM_LOG_LEVEL) {
    return env.CSIM_LOG_LEVEL;
  }
  const debugEnv = (env.CSIM_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  if (isTest) return "silent";
  return "info";
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/** Whether pino-pretty should format the output */
export function resolvePretty(env: NodeJS.ProcessEnv = process.env): boolean {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  const isDev = env.NODE_ENV !== "production" && !isTest;
  if (isTest) return false;
  return env.CSIM_LOG_PRETTY === "true" || (env.CSIM_LOG_PRETTY !== "false" && isDev);
}

/** Build pino transport configuration */
function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (IS_TEST || !resolvePretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
      destination: 2,
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = transport
  ? pino({
      level: resolveLevel(),
      transport,
      base: { service: "csim" },
      timestamp: pino.stdTimeFunctions.isoTime,
    })
  : pino(
      {
        level: resolveLevel(),
        base: { service: "csim" },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.cache.warn("clock wrapped")
 *   → { level: 40, subsystem: "cache", msg: "clock wrapped", ... }
 */
export const log = {
  /** Configuration and cache construction */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Trace reading, parsing and replay */
  trace: rootLogger.child({ subsystem: "trace" }),
  /** Cache model internals */
  cache: rootLogger.child({ subsystem: "cache" }),
  /** Command-line front end */
  cli: rootLogger.child({ subsystem: "cli" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

/**
 * Set the level on the root and every subsystem logger. Children copy the
 * level when created, so the root alone is not enough.
 */
export function applyLogLevel(level: string): void {
  for (const logger of Object.values(log)) {
    logger.level = level;
  }
}

export type { Logger };
