import type { LogLevel } from "../logger.js";
import { readEnum, readInt } from "./env.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Default ceiling on the node count accepted from a canonical payload. */
export const DEFAULT_MAX_DECODE_NODES = 1_000_000;

/** Default ceiling on the cells of a dense matrix, i.e. 4096 nodes. */
export const DEFAULT_MAX_DENSE_CELLS = 16_777_216;

export interface GraphConfig {
  /** Minimum level emitted by loggers built through {@link createLogger}. */
  readonly logLevel: LogLevel;
  /** Largest node count `decodeCanonical` accepts. */
  readonly maxDecodeNodes: number;
  /** Largest `nodeCount * nodeCount` a `DenseGraph` allocates. */
  readonly maxDenseCells: number;
}

/**
 * Resolves the library settings from the environment:
 * `WEIGHTGRAPH_LOG_LEVEL`, `WEIGHTGRAPH_MAX_DECODE_NODES` and
 * `WEIGHTGRAPH_MAX_DENSE_CELLS`.
 */
export function loadGraphConfig(): GraphConfig {
  return {
    logLevel: readEnum("WEIGHTGRAPH_LOG_LEVEL", LOG_LEVELS, "info"),
    maxDecodeNodes: readInt("WEIGHTGRAPH_MAX_DECODE_NODES", DEFAULT_MAX_DECODE_NODES, { min: 1 }),
    maxDenseCells: readInt("WEIGHTGRAPH_MAX_DENSE_CELLS", DEFAULT_MAX_DENSE_CELLS, { min: 1 }),
  };
}
