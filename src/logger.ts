export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger that drops messages below `level`
 */
export function createLogger(level: LogLevel = "info", sink: Console = console): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (at: LogLevel) => LOG_LEVELS.indexOf(at) >= threshold;
  const stamp = (at: LogLevel, message: string) =>
    `${new Date().toISOString()} ${at.toUpperCase().padEnd(5)} ${message}`;

  return {
    debug(message, ...args) {
      if (enabled("debug")) sink.debug(stamp("debug", message), ...args);
    },
    info(message, ...args) {
      if (enabled("info")) sink.info(stamp("info", message), ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) sink.warn(stamp("warn", message), ...args);
    },
    error(message, ...args) {
      if (enabled("error")) sink.error(stamp("error", message), ...args);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
