/**
 * Tagged console logger. Components receive a `Logger` in their
 * constructor instead of writing to a module-level console.
 *
 * Output keeps the `[tag] message` shape used throughout the codebase.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  /** Logger with a nested tag, e.g. `[gateway:worker]`. */
  child: (tag: string) => Logger;
};

export type LogSink = Pick<Console, "debug" | "log" | "warn" | "error">;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function createLogger(tag: string, level: LogLevel = "info", sink: LogSink = console): Logger {
  const min = LEVEL_RANK[level];
  const prefix = `[${tag}]`;
  const enabled = (l: Exclude<LogLevel, "silent">) => LEVEL_RANK[l] >= min;

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) sink.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) sink.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) sink.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) sink.error(`${prefix} ${message}`, ...details);
    },
    child: (childTag) => createLogger(`${tag}:${childTag}`, level, sink),
  };
}

/** Logger that drops everything; handy in tests. */
export const silentLogger: Logger = createLogger("silent", "silent");
