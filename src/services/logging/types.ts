/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 */
export const LOGGER_NAMES = [
  "platform", // Identity resolution and the process singleton
  "locator", // Library search across directories
  "fs", // DefaultFileSystemLayer - filesystem queries
  "config", // Environment configuration
] as const;

export type LoggerName = (typeof LOGGER_NAMES)[number];

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class LibraryIndex {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async scan(dir: string): Promise<void> {
 *     this.logger.debug("Scanning", { dir });
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-entry details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues such as ignored configuration values.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * @param message - Human-readable error description
   * @param context - Structured context data
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service: creates named loggers.
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Drop cached loggers.
   */
  dispose(): void;
}
