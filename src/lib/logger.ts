/**
 * Console logging with per-module prefixes.
 *
 * - Level threshold is process-wide (default "info", see config `logLevel`)
 * - Warnings and errors are always visible
 *
 * Usage:
 *   import { listenerLog } from './logger';
 *   listenerLog.debug('Datagram dropped', reason);  // Silent unless logLevel=debug
 *   listenerLog.info('Listening on 9000');
 *   listenerLog.error('Bind failed', err);          // Timestamped
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.GLOVE_LOG_LEVEL?.toLowerCase();
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (enabled("debug")) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (enabled("info")) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    /**
     * Warning-level logging (always visible)
     */
    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    /**
     * Error-level logging (always visible)
     */
    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },
  };
}

// Pre-configured loggers for each engine component
export const log = createLogger("App");
export const engineLog = createLogger("Engine");
export const listenerLog = createLogger("Listener");
export const calibLog = createLogger("Calib");
export const recordingLog = createLogger("Recording");
export const playbackLog = createLogger("Playback");
export const exportLog = createLogger("Export");
