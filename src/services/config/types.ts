/**
 * Configuration types.
 *
 * Configuration comes from NATIVE_PLATFORM_* environment variables and is
 * read once, when the platform singleton is created.
 */

import type { LoggingConfig } from "../logging";
import type { AddressWidth } from "../native/types";

export interface PlatformConfig {
  /** Address-model override; wins over the host's declared model */
  readonly dataModel: AddressWidth | undefined;
  /** Directories searched before the loader variables and system directories */
  readonly libraryPaths: readonly string[];
  readonly logging: LoggingConfig;
}

/**
 * A configuration value that was rejected and replaced by its default.
 */
export interface ConfigIssue {
  readonly variable: string;
  readonly message: string;
}

export interface ConfigLoadResult {
  readonly config: PlatformConfig;
  readonly issues: readonly ConfigIssue[];
}

export const DEFAULT_PLATFORM_CONFIG: PlatformConfig = {
  dataModel: undefined,
  libraryPaths: [],
  logging: {
    level: "warn",
    printLogs: false,
    loggers: undefined,
    logFile: undefined,
  },
};
