/**
 * cli.ts — csim command-line front end.
 *
 * Wires config → CacheModel → trace → replay → summary. Every error is
 * fatal: the run stops, no summary is printed and the exit code is 1.
 *
 * Usage:
 *   csim [-v] -s <s> -E <E> -b <b> -t <trace> [--json] [--results <file>]
 *   csim -h
 */

import { makeAxOutput } from "../shared/ax.js";
import { CacheModel } from "./cache/cache-model.js";
import { parseCliArgs, resolveConfig, type SimConfig } from "./config.js";
import { ConfigError, SimError, errorMessage } from "./errors.js";
import { applyLogLevel, log } from "./logger.js";
import { formatAccess, formatSummary, statisticsToJson, writeResults } from "./summary.js";
import { replayTrace, type ReplayResult } from "./trace/driver.js";
import { loadTrace } from "./trace/trace-file.js";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(line + "\n"),
  stderr: (line) => process.stderr.write(line + "\n"),
};

export const USAGE = [
  "Usage: csim [-v] -s <s> -E <E> -b <b> -t <trace> [--json] [--results <file>]",
  "       csim -h",
  "     -h          Print this help message and exit",
  "     -v          Verbose mode: report effects of each memory operation",
  "     -s <s>      Number of set index bits (there are 2**s sets)",
  "     -b <b>      Number of block bits (there are 2**b blocks)",
  "     -E <E>      Number of lines per set (associativity)",
  "     -t <trace>  File name of the memory trace to process",
  "     --json      Emit a JSON result instead of the summary line",
  "     --results <file>  Also write the five counters to <file>",
].join("\n");

/** Run a simulation described by `config`. Throws on any failure. */
export async function runSimulation(config: SimConfig, io: CliIO = defaultIO): Promise<ReplayResult> {
  const model = new CacheModel(
    { setBits: config.setBits, linesPerSet: config.linesPerSet, blockBits: config.blockBits },
    { maxLines: config.maxLines },
  );
  const records = await loadTrace(config.tracePath);
  const result = replayTrace(model, records, {
    onAccess: config.verbose && !config.json ? (record, outcome) => io.stdout(formatAccess(record, outcome)) : undefined,
  });
  if (config.resultsPath) {
    await writeResults(config.resultsPath, result.statistics);
  }
  return result;
}

/** CLI entry point. Returns the process exit code. */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const start = Date.now();
  const wantsJson = argv.includes("--json");

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = resolveConfig(args);
    applyLogLevel(config.logLevel);
    log.boot.debug(
      { s: config.setBits, E: config.linesPerSet, b: config.blockBits, trace: config.tracePath },
      "configuration resolved",
    );

    const result = await runSimulation(config, io);

    if (config.json) {
      const output = makeAxOutput("csim", start, {
        config: {
          setBits: config.setBits,
          linesPerSet: config.linesPerSet,
          blockBits: config.blockBits,
          tracePath: config.tracePath,
        },
        records: result.records,
        statistics: statisticsToJson(result.statistics),
      });
      io.stdout(JSON.stringify(output, null, 2));
    } else {
      io.stdout(formatSummary(result.statistics));
    }
    return 0;
  } catch (err: unknown) {
    const message = errorMessage(err);
    const hints = err instanceof ConfigError ? err.hints : [];
    log.cli.debug({ code: err instanceof SimError ? err.code : undefined, err: message }, "simulation failed");

    if (wantsJson) {
      const output = makeAxOutput("csim", start, {}, { success: false, errors: [message], hints });
      io.stdout(JSON.stringify(output, null, 2));
    } else {
      io.stderr(`Error: ${message}`);
      for (const hint of hints) io.stderr(hint);
      if (err instanceof ConfigError) io.stderr(USAGE);
    }
    return 1;
  }
}
