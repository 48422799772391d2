/**
 * Centralized Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, ConsoleTransport } from "@toolchat/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "debug",
 *   component: "server",
 *   transports: [new ConsoleTransport({ colors: true })],
 * });
 *
 * const loopLog = logger.child({ component: "server.tool-loop" });
 * loopLog.info("Turn started", { conversationId: "c_123" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LogContext,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  log,
} from "./logger.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export { FileTransport, type FileTransportOptions } from "./transports/file.js";
