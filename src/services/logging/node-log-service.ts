/**
 * NodeLogService - logging implementation on electron-log's Node.js entry.
 *
 * Features:
 * - Level, console output, file output and scope filter supplied by config
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Logging settings, usually taken from the environment configuration.
 */
export interface LoggingConfig {
  readonly level: LogLevel;
  /** Mirror log lines to the console */
  readonly printLogs: boolean;
  /** Only these loggers write; undefined allows all */
  readonly loggers: ReadonlySet<LoggerName> | undefined;
  /** Enables the file transport when set */
  readonly logFile: string | undefined;
}

const LINE_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    const fullMessage = withContext(message, context);
    if (error) {
      this.scope.error(fullMessage, error);
    } else {
      this.scope.error(fullMessage);
    }
  }
}

/**
 * Logger that is a no-op unless its name is in the allowed set.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: ReadonlySet<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log outside Electron.
 *
 * Both transports are off unless configured.
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(config.logging);
 * const logger = loggingService.createLogger("locator");
 * logger.debug("Library found", { name: "ssl", path: "/usr/lib/libssl.so.3" });
 * // [2026-01-05 10:30:00.123] [debug] [locator] Library found name=ssl path=/usr/lib/libssl.so.3
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly allowedLoggers: ReadonlySet<LoggerName> | undefined;

  constructor(config: LoggingConfig) {
    this.allowedLoggers = config.loggers;

    const logFile = config.logFile;
    if (logFile !== undefined) {
      log.transports.file.resolvePathFn = (): string => logFile;
      log.transports.file.level = config.level;
    } else {
      log.transports.file.level = false;
    }
    log.transports.console.level = config.printLogs ? config.level : false;

    log.transports.file.format = LINE_FORMAT;
    log.transports.console.format = LINE_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * Loggers are cached per name.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
