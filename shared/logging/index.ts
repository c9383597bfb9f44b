/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, getLogger, ConsoleTransport, FileTransport } from "@pocketmind/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   component: "runtime",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.pocketmind/logs" })
 *   ]
 * });
 *
 * const bridgeLog = getLogger().child({ component: "runtime.bridge" });
 * bridgeLog.debug("Dispatcher started");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export { Logger, RingBuffer, initLogger, getLogger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  formatPlainText,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
