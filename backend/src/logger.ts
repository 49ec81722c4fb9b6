/**
 * Logger utility for the Découvertes engine
 *
 * Provides structured logging with prefixes for different modules.
 * Everything is written to stderr: stdout carries the command output that
 * the editor plugin parses.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_THRESHOLD = "warn";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

/**
 * Formats a log entry for console output.
 */
export function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

function isThreshold(value: string): value is LogLevel | "silent" {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolves the minimum level to print.
 *
 * DECOUVERTES_LOG_LEVEL picks the threshold; DEBUG forces debug output.
 */
export function resolveThreshold(env: NodeJS.ProcessEnv = process.env): LogLevel | "silent" {
  if (env.DEBUG) {
    return "debug";
  }
  const configured = env.DECOUVERTES_LOG_LEVEL?.toLowerCase();
  if (configured && isThreshold(configured)) {
    return configured;
  }
  return DEFAULT_THRESHOLD;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string) {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    };

    console.error(formatLog(entry), data !== undefined ? data : "");
  };

  return {
    debug: (message: string, data?: unknown) => log("debug", message, data),
    info: (message: string, data?: unknown) => log("info", message, data),
    warn: (message: string, data?: unknown) => log("warn", message, data),
    error: (message: string, data?: unknown) => log("error", message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;

// Pre-created logger for the command dispatcher
export const cliLog = createLogger("CLI");
