/**
 * Logging Setup for the Runtime
 *
 * Initializes the shared structured logger with console and file transports.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogTransport,
} from "@pocketmind/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export const DEFAULT_LOG_DIR = path.join(os.homedir(), ".pocketmind", "logs");

export interface LoggingOptions {
  /** Default: "debug" in dev, "info" in production */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true) */
  file?: boolean;
  logDir?: string;
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

export function initRuntimeLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev,
    }));
  }

  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir ?? DEFAULT_LOG_DIR,
      filename: "runtime",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  logger = initLogger({
    minLevel,
    component: "runtime",
    transports,
    ringBufferSize: 2000,
  });

  return logger;
}

/**
 * Root runtime logger. Falls back to console-only output when accessed
 * before initRuntimeLogging().
 */
export function getRuntimeLogger(): Logger {
  if (!logger) {
    logger = initRuntimeLogging({ file: false });
  }
  return logger;
}

// ============================================
// COMPONENT LOGGERS
// ============================================

/**
 * Modules create their logger at import time, usually before
 * initRuntimeLogging() runs, so the child is bound to whichever root
 * logger is current on each call.
 */
class ComponentLogger implements ILogger {
  private root: Logger | null = null;
  private delegate: ILogger | null = null;

  constructor(private readonly context: LogContext & { component: string }) {}

  private target(): ILogger {
    const root = getRuntimeLogger();
    if (root !== this.root || !this.delegate) {
      this.root = root;
      this.delegate = root.child(this.context);
    }
    return this.delegate;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.target().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.target().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.target().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.target().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.target().fatal(message, error, data);
  }

  child(context: LogContext): ILogger {
    return new ComponentLogger({ ...this.context, ...context, component: context.component ?? this.context.component });
  }

  setTurnId(id: string | undefined): void {
    this.context.turnId = id;
    this.target().setTurnId(id);
  }

  getRecentLogs(count?: number): LogEntry[] {
    return this.target().getRecentLogs(count);
  }

  flush(): Promise<void> {
    return this.target().flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `runtime.${component}` });
}
