/**
 * Console logging with a level filter. Core functions never log; only the
 * assessment pipeline does, through a logger handed to it in its context.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** The subset of `console` a logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = "[ec-risk]";

export function createLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (at: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) => {
    if (LEVEL_RANK[at] < threshold) return;
    if (meta) sink[at](`${PREFIX} ${message}`, meta);
    else sink[at](`${PREFIX} ${message}`);
  };
  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}

export const silentLogger: Logger = createLogger("silent");
