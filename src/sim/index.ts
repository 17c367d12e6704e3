/**
 * Public API of the simulator.
 */

export { decodeAddress, U64_MASK, type DecodedAddress } from "./cache/address.js";
export { CacheModel, type AccessOp, type AccessKind, type AccessOutcome, type CacheModelOptions } from "./cache/cache-model.js";
export { CacheSet, type CacheLine } from "./cache/cache-set.js";
export { validateGeometry, blockSize, DEFAULT_MAX_LINES, type CacheGeometry } from "./cache/geometry.js";
export { StatisticsCollector, type CacheStatistics } from "./cache/statistics.js";
export { parseTrace, parseTraceLine, MAX_LINE_LENGTH, type AccessRecord } from "./trace/parser.js";
export { loadTrace } from "./trace/trace-file.js";
export { replayTrace, type ReplayOptions, type ReplayResult } from "./trace/driver.js";
export { formatSummary, formatAccess, formatResults, writeResults, statisticsToJson } from "./summary.js";
export { parseCliArgs, resolveConfig, type SimConfig, type CliArgs } from "./config.js";
export { main, runSimulation, USAGE, type CliIO } from "./cli.js";
export * from "./errors.js";
