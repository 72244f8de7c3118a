export const LOGGER_PREFIX = "[FlagTier]";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Minimal logger contract. Any object with these four methods
 * (console, pino, winston) can be passed to the client.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/**
 * Console-backed logger that prefixes every line and drops
 * messages below `level`.
 */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: LogLevel) =>
    LEVEL_ORDER[messageLevel] >= threshold;

  return {
    debug(message, ...meta) {
      if (enabled("debug")) console.debug(`${LOGGER_PREFIX} ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (enabled("info")) console.info(`${LOGGER_PREFIX} ${message}`, ...meta);
    },
    warn(message, ...meta) {
      if (enabled("warn")) console.warn(`${LOGGER_PREFIX} ${message}`, ...meta);
    },
    error(message, ...meta) {
      if (enabled("error")) console.error(`${LOGGER_PREFIX} ${message}`, ...meta);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");
