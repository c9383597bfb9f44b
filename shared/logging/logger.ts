/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transport support.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    if (this.count === 0) return [];
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private context: Omit<LogContext, "component">;

  constructor(config: LoggerConfig, ringBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    // Children share the parent's buffer so getRecentLogs() sees every component
    this.ringBuffer = ringBuffer ?? new RingBuffer(config.ringBufferSize ?? 1000);
    this.context = { ...config.defaultContext };
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      turnId: this.context.turnId,
      conversationId: this.context.conversationId,
    };

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          const pending = transport.log(entry);
          if (pending) {
            pending.catch((e: unknown) => console.error(`[Logger] Transport ${transport.name} failed:`, e));
          }
        } catch (e) {
          // Never let a broken transport take the caller down
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Error) {
        result[key] = { name: value.name, message: value.message };
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component ?? this.config.component,
        defaultContext: { ...this.context, ...rest },
      },
      this.ringBuffer
    );
  }

  setTurnId(id: string | undefined): void {
    this.context.turnId = id;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

// ============================================
// PROCESS-WIDE ROOT LOGGER
// ============================================

let rootLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  rootLogger = new Logger(config);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return rootLogger;
}
