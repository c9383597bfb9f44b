/**
 * Logging Types
 *
 * Shared by every package in the workspace.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the entry (e.g. "runtime.bridge", "runtime.conductor") */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  /** Ties together every entry produced while handling one turn */
  turnId?: string;
  conversationId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush buffered entries (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LogContext {
  component?: string;
  turnId?: string;
  conversationId?: string;
}

export interface LoggerConfig {
  /** Entries below this level are ignored */
  minLevel: LogLevel;
  component: string;
  defaultContext?: Omit<LogContext, "component">;
  transports: LogTransport[];
  /** Keys matching any of these are replaced with [REDACTED] */
  redactPatterns?: RegExp[];
  /** Keep the last N entries in memory */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: LogContext): ILogger;

  setTurnId(id: string | undefined): void;

  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
  /private/i,
];
