export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
  child(category: string): Logger;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(category: string, level: LogLevel = "info"): Logger {
  const write = (entryLevel: Exclude<LogLevel, "silent">, message: string, details?: unknown) => {
    if (RANK[entryLevel] < RANK[level]) {
      return;
    }
    const line = `[${entryLevel}] [${category}] ${message}`;
    const args = details === undefined ? [line] : [line, describe(details)];
    if (entryLevel === "error") {
      console.error(...args);
    } else if (entryLevel === "warn") {
      console.warn(...args);
    } else {
      console.log(...args);
    }
  };

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
    child: (sub) => createLogger(`${category}:${sub}`, level),
  };
}

function describe(details: unknown): unknown {
  if (details instanceof Error) {
    const cause = details.cause === undefined ? "" : ` <- ${String(describe(details.cause))}`;
    return `${details.name}: ${details.message}${cause}`;
  }
  return details;
}
