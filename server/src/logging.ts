/**
 * Logging Setup for the Server
 *
 * Initializes the shared logging system with console and file transports.
 * Component loggers resolve the server logger on each call, so loggers
 * created at import time pick up the settings `initServerLogging` is
 * given later.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogTransport,
} from "@toolchat/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL, else "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Console output (default: true) */
  console?: boolean;
  /** File output (default: true unless LOG_FILE=false) */
  file?: boolean;
  /** Log directory (default: LOG_DIR, else ~/.toolchat/logs) */
  logDir?: string;
  colors?: boolean;
}

let logger: Logger | null = null;

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * (Re)initialize the server logger. A previous logger's transports are
 * closed once the new one is in place.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel || defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: process.env.NODE_ENV !== "production",
    }));
  }

  const fileEnabled = options.file ?? process.env.LOG_FILE !== "false";
  if (fileEnabled) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir || process.env.LOG_DIR || path.join(os.homedir(), ".toolchat", "logs"),
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  const previous = logger;
  logger = initLogger({
    minLevel,
    component: "server",
    transports,
    ringBufferSize: 2000,
  });

  previous?.close().catch((err: unknown) => {
    console.error("[logging] Failed to close previous logger:", err);
  });

  return logger;
}

/**
 * Get the server logger, initializing with defaults on first use.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

/** Resolves the current server logger, then its child, at every call. */
class ComponentLogger implements ILogger {
  private root: Logger | null = null;
  private target: ILogger | null = null;

  constructor(private readonly context: LogContext) {}

  private resolve(): ILogger {
    const root = getServerLogger();
    if (this.root !== root || !this.target) {
      this.root = root;
      this.target = root.child(this.context);
    }
    return this.target;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.resolve().trace(message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.resolve().debug(message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.resolve().info(message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.resolve().warn(message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.resolve().error(message, error, data);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.resolve().fatal(message, error, data);
  }

  child(context: LogContext): ILogger {
    return new ComponentLogger({ ...this.context, ...context });
  }

  setCorrelationId(id: string): void {
    this.context.correlationId = id;
    this.target = null;
  }

  getRecentLogs(count?: number): LogEntry[] {
    return this.resolve().getRecentLogs(count);
  }

  flush(): Promise<void> {
    return this.resolve().flush();
  }
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return new ComponentLogger({ component: `server.${component}` });
}
