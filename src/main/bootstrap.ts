/**
 * Process-wide platform identity.
 *
 * One-time initialization rule: the identity is created on the first call to
 * getPlatform() (or eagerly via initializePlatform()) and kept for the life
 * of the process. A failed initialization is kept as well and rethrown on
 * every later access; the identity is never re-derived.
 */

import { loadConfig, type PlatformConfig } from "../services/config";
import { PlatformInitError } from "../services/errors";
import { NodeLogService, type LoggingService } from "../services/logging";
import { DefaultFileSystemLayer, type FileSystemLayer } from "../services/platform/filesystem";
import type { PlatformInfo } from "../services/platform/platform-info";
import { createPlatformIdentity } from "../services/native/platform";
import { defaultLibrarySearchPaths } from "../services/native/search-paths";
import type { PlatformIdentity } from "../services/native/types";
import { getErrorMessage } from "../shared/error-utils";
import { NodePlatformInfo } from "./platform-info";

/**
 * Optional dependencies for initializePlatform(). Anything omitted is built
 * from the environment.
 */
export interface PlatformBootstrapDeps {
  readonly config?: PlatformConfig;
  readonly loggingService?: LoggingService;
  readonly fileSystem?: FileSystemLayer;
  readonly platformInfo?: PlatformInfo;
}

type PlatformSlot =
  | {
      readonly state: "ready";
      readonly identity: PlatformIdentity;
      readonly libraryPaths: readonly string[];
    }
  | { readonly state: "failed"; readonly error: unknown };

let slot: PlatformSlot | undefined;

function establish(deps: PlatformBootstrapDeps): PlatformSlot {
  const { config, issues } = deps.config ? { config: deps.config, issues: [] } : loadConfig();
  const loggingService = deps.loggingService ?? new NodeLogService(config.logging);

  const configLogger = loggingService.createLogger("config");
  for (const issue of issues) {
    configLogger.warn("Ignoring invalid configuration value", {
      variable: issue.variable,
      error: issue.message,
    });
  }

  const logger = loggingService.createLogger("platform");
  const fileSystem =
    deps.fileSystem ?? new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const platformInfo = deps.platformInfo ?? new NodePlatformInfo(config.dataModel);

  try {
    const identity = createPlatformIdentity({
      platformInfo,
      fileSystem,
      logger,
      locatorLogger: loggingService.createLogger("locator"),
    });
    slot = { state: "ready", identity, libraryPaths: config.libraryPaths };
  } catch (error) {
    logger.error(
      "Platform initialization failed",
      { osName: platformInfo.osName, arch: platformInfo.arch, error: getErrorMessage(error) },
      error instanceof Error ? error : undefined
    );
    slot = { state: "failed", error };
  }
  return slot;
}

function unwrap(current: PlatformSlot): PlatformIdentity {
  if (current.state === "failed") {
    throw current.error;
  }
  return current.identity;
}

/**
 * Get the process-wide platform identity, creating it on first access.
 *
 * @throws PlatformInitError ADDRESS_WIDTH_UNKNOWN if the address model cannot
 *   be determined (on this and every later call)
 */
export function getPlatform(): PlatformIdentity {
  return unwrap(slot ?? establish({}));
}

/**
 * Create the platform identity eagerly with explicit dependencies.
 *
 * @throws PlatformInitError ALREADY_INITIALIZED if an identity (or a failed
 *   attempt) already exists
 */
export function initializePlatform(deps: PlatformBootstrapDeps = {}): PlatformIdentity {
  if (slot !== undefined) {
    throw new PlatformInitError("Platform identity is already initialized", "ALREADY_INITIALIZED");
  }
  return unwrap(establish(deps));
}

/**
 * Default search directories for the current platform, starting with the
 * configured NATIVE_PLATFORM_LIBRARY_PATH entries.
 */
export function getDefaultSearchPaths(
  env: Readonly<Record<string, string | undefined>> = process.env
): string[] {
  const identity = getPlatform();
  const libraryPaths = slot?.state === "ready" ? slot.libraryPaths : [];
  return defaultLibrarySearchPaths(identity, env, libraryPaths);
}

/**
 * Forget the process-wide identity.
 * @internal
 */
export function resetPlatformForTesting(): void {
  slot = undefined;
}
