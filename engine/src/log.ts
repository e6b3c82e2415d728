import { resolveEngineConfig, type LogLevel } from "./config.js";

type MessageLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

/**
 * Scoped console logger. Messages are prefixed with `[scope]`; details, when
 * given, are passed through as a second console argument.
 *
 * Without an explicit level the threshold is read from the environment on every
 * call, so `MAP_STYLE_LOG_LEVEL` changes apply to loggers created at import time.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const threshold = () => level ?? resolveEngineConfig().logLevel;

  const write = (messageLevel: MessageLevel, message: string, details: unknown) => {
    if (LEVEL_RANK[messageLevel] < LEVEL_RANK[threshold()]) return;
    const line = `[${scope}] ${message}`;
    if (details === undefined) console[messageLevel](line);
    else console[messageLevel](line, details);
  };

  return {
    scope,
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
}
