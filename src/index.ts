/**
 * Native platform identity and shared-library resolution.
 *
 * @example
 * ```typescript
 * import { getPlatform, getDefaultSearchPaths } from "native-platform";
 *
 * const platform = getPlatform();
 * const libz = await platform.locateLibrary("z", getDefaultSearchPaths());
 * // "/usr/lib/x86_64-linux-gnu/libz.so.1" on Debian, "libz.dylib" if not found on macOS
 * ```
 */

export {
  getPlatform,
  initializePlatform,
  getDefaultSearchPaths,
  resetPlatformForTesting,
} from "./main/bootstrap";
export type { PlatformBootstrapDeps } from "./main/bootstrap";
export { NodePlatformInfo } from "./main/platform-info";

export * from "./services/native";
export { loadConfig, DEFAULT_PLATFORM_CONFIG } from "./services/config";
export type { PlatformConfig, ConfigIssue, ConfigLoadResult } from "./services/config";
export { NodeLogService, LogLevel } from "./services/logging";
export type { Logger, LoggerName, LoggingService, LoggingConfig, LogContext } from "./services/logging";
export { DefaultFileSystemLayer } from "./services/platform/filesystem";
export type { FileSystemLayer, DirEntry, FileStat } from "./services/platform/filesystem";
export type { PlatformInfo } from "./services/platform/platform-info";
export {
  ServiceError,
  PlatformInitError,
  FileSystemError,
  isServiceError,
  isPlatformInitErrorWithCode,
} from "./services/errors";
export type { PlatformInitErrorCode, SerializedError } from "./services/errors";
