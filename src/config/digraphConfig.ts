import { readEnum, readInt, readOptionalString } from "./env.js";

/** Levels accepted by the logger threshold; `silent` suppresses every entry. */
export const LOG_LEVEL_SETTINGS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevelSetting = (typeof LOG_LEVEL_SETTINGS)[number];

/** Capacity hint used when a graph is constructed without one. */
export const DEFAULT_INITIAL_CAPACITY = 10;

export interface DigraphConfig {
  /** Default capacity hint applied to new graphs. */
  readonly initialCapacity: number;
  /** Minimum level emitted by the default logger. */
  readonly logLevel: LogLevelSetting;
  /** Optional file mirroring the default logger's output. */
  readonly logFile: string | null;
}

/**
 * Reads the graph configuration from the environment:
 *
 * - `DIGRAPH_INITIAL_CAPACITY`: non-negative integer, defaults to 10.
 * - `DIGRAPH_LOG_LEVEL`: `debug`, `info`, `warn`, `error` or `silent` (default).
 * - `DIGRAPH_LOG_FILE`: path mirroring log lines, unset by default.
 */
export function loadDigraphConfig(): DigraphConfig {
  return {
    initialCapacity: readInt("DIGRAPH_INITIAL_CAPACITY", DEFAULT_INITIAL_CAPACITY, { min: 0 }),
    logLevel: readEnum("DIGRAPH_LOG_LEVEL", LOG_LEVEL_SETTINGS, "silent"),
    logFile: readOptionalString("DIGRAPH_LOG_FILE") ?? null,
  };
}
