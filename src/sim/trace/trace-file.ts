/**
 * trace-file.ts — Load a trace from disk.
 */

import { readFile } from "node:fs/promises";
import { TraceReadError } from "../errors.js";
import { log } from "../logger.js";
import { parseTrace, type AccessRecord } from "./parser.js";

/**
 * Read the file at `path` and return its records as a lazy sequence.
 * Read failures surface here; format errors surface while iterating.
 */
export async function loadTrace(path: string): Promise<Iterable<AccessRecord>> {
  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (err: unknown) {
    throw new TraceReadError(path, err);
  }
  log.trace.debug({ path, bytes: source.length }, "trace loaded");
  return parseTrace(source);
}
