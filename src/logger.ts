export const LogLevels = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LogLevels)[number];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

/**
 * Console logger tagged with a component name.
 * Entries below `level` are dropped; output looks like
 * `[WARN] store: message { ...extra }`.
 */
export function createLogger(component: string, level: LogLevel = "warn"): Logger {
  const write = (entryLevel: Exclude<LogLevel, "silent">, message: string, extra?: Record<string, unknown>) => {
    if (RANK[entryLevel] < RANK[level]) return;
    const line = `[${entryLevel.toUpperCase()}] ${component}: ${message}`;
    if (extra) {
      console[entryLevel](line, extra);
    } else {
      console[entryLevel](line);
    }
  };

  return {
    debug: (message, extra) => write("debug", message, extra),
    info: (message, extra) => write("info", message, extra),
    warn: (message, extra) => write("warn", message, extra),
    error: (message, extra) => write("error", message, extra),
  };
}
