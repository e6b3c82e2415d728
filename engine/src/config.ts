export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface EngineConfig {
  logLevel: LogLevel;
  tileExtent: number; // tile-local units per tile edge
}

export type EnvSource = Record<string, string | undefined>;

export const DEFAULT_TILE_EXTENT = 8192;
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function processEnv(): EnvSource {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? DEFAULT_LOG_LEVEL;
}

function parseTileExtent(raw: string | undefined): number {
  if (!raw) return DEFAULT_TILE_EXTENT;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_TILE_EXTENT;
}

/**
 * Read engine settings from the environment.
 *
 * `MAP_STYLE_LOG_LEVEL` selects the lowest level that reaches the console and
 * `MAP_STYLE_TILE_EXTENT` the tile coordinate extent used when converting
 * tile-local geometry. Unset or malformed values fall back to the defaults.
 */
export function resolveEngineConfig(env: EnvSource = processEnv()): EngineConfig {
  return {
    logLevel: parseLogLevel(env.MAP_STYLE_LOG_LEVEL),
    tileExtent: parseTileExtent(env.MAP_STYLE_TILE_EXTENT),
  };
}
