/**
 * Structured logger shared by the library and the web API.
 *
 * - NODE_ENV=production: one JSON object per line
 * - otherwise: `[component] LEVEL message {extra}`
 *
 * LOG_LEVEL (debug < info < warn < error) sets the minimum level and is read
 * on every call, so tests can change it at runtime.
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("client", "Generating image", { model, estimatedCost });
 *
 *   const log = createLogger("decoder");
 *   log.debug("Skipping malformed frame", { bytes: payload.length });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

type LogExtra = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

interface ScopedLogger {
  debug(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  warn(message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function minimumLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

function write(level: LogLevel, component: string, message: string, extra?: LogExtra): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minimumLevel()]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const line =
    process.env.NODE_ENV === "production" ? JSON.stringify(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
  debug(component: string, message: string, extra?: LogExtra): void {
    write("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: LogExtra): void {
    write("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: LogExtra): void {
    write("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: LogExtra): void {
    write("error", component, message, extra);
  },
};

/** Bind a component name once for modules that log from many places. */
function createLogger(component: string): ScopedLogger {
  return {
    debug: (message, extra) => write("debug", component, message, extra),
    info: (message, extra) => write("info", component, message, extra),
    warn: (message, extra) => write("warn", component, message, extra),
    error: (message, extra) => write("error", component, message, extra),
  };
}

export { logger, createLogger };
export type { LogLevel, LogEntry, ScopedLogger };
