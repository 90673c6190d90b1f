export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (value: string): value is LogLevel => (LOG_LEVELS as readonly string[]).includes(value);

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Levels at or above `level`.
 */
export const enabledLevelsFrom = (level: LogLevel): Set<LogLevel> => {
  const levels = new Set<LogLevel>();
  switch (level) {
    case "debug":
      levels.add("debug");
    // fallthrough
    case "info":
      levels.add("info");
    // fallthrough
    case "warn":
      levels.add("warn");
    // fallthrough
    case "error":
      levels.add("error");
      break;
  }
  return levels;
};

export const describeError = (message: string, error?: unknown): string => {
  if (error instanceof Error) {
    return `${message}: ${error.message}`;
  }
  if (error !== undefined) {
    return `${message}: ${String(error)}`;
  }
  return message;
};
