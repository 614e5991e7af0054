export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel, LOGGER_NAMES } from "./types";
export { NodeLogService } from "./node-log-service";
export type { LoggingConfig } from "./node-log-service";
