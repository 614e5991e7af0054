/**
 * Composition of the platform identity: classification, derived values and
 * the per-OS library strategy, bound together once.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { PlatformInfo } from "../platform/platform-info";
import type { Logger } from "../logging";
import {
  addressMaskFor,
  classifyCpuArchitecture,
  classifyOperatingSystem,
  isBsdFamily,
  isUnixLike,
  libraryPatternFor,
  parseRuntimeMajorVersion,
  resolveAddressWidth,
} from "./identity";
import {
  mapDarwinName,
  mapLinuxName,
  mapUnixName,
  mapWindowsName,
  type NameMapper,
} from "./name-mapper";
import { locateHighestSoVersion, locateInSearchOrder, type LibraryLocator } from "./library-locator";
import { CpuArchitecture, OperatingSystem, type PlatformIdentity } from "./types";

/**
 * Per-OS behavior for library names and search.
 */
export interface LibraryStrategy {
  readonly mapName: NameMapper;
  readonly locate: LibraryLocator;
}

const DEFAULT_STRATEGY: LibraryStrategy = { mapName: mapUnixName, locate: locateInSearchOrder };

export const LIBRARY_STRATEGIES: Readonly<Record<OperatingSystem, LibraryStrategy>> = {
  [OperatingSystem.Darwin]: { mapName: mapDarwinName, locate: locateInSearchOrder },
  [OperatingSystem.Linux]: { mapName: mapLinuxName, locate: locateHighestSoVersion },
  [OperatingSystem.Windows]: { mapName: mapWindowsName, locate: locateInSearchOrder },
  [OperatingSystem.FreeBSD]: DEFAULT_STRATEGY,
  [OperatingSystem.NetBSD]: DEFAULT_STRATEGY,
  [OperatingSystem.OpenBSD]: DEFAULT_STRATEGY,
  [OperatingSystem.Solaris]: DEFAULT_STRATEGY,
  [OperatingSystem.AIX]: DEFAULT_STRATEGY,
  [OperatingSystem.ZLinux]: DEFAULT_STRATEGY,
  [OperatingSystem.Unknown]: DEFAULT_STRATEGY,
};

/**
 * Dependencies for createPlatformIdentity.
 */
export interface PlatformIdentityDeps {
  readonly platformInfo: PlatformInfo;
  readonly fileSystem: FileSystemLayer;
  /** Receives identity resolution messages */
  readonly logger: Logger;
  /** Receives library search messages; defaults to `logger` */
  readonly locatorLogger?: Logger;
}

/**
 * Resolve the platform identity from raw environment facts.
 *
 * @throws PlatformInitError ADDRESS_WIDTH_UNKNOWN
 */
export function createPlatformIdentity(deps: PlatformIdentityDeps): PlatformIdentity {
  const { platformInfo, fileSystem, logger } = deps;

  const operatingSystem = classifyOperatingSystem(platformInfo.osName);
  const cpuArchitecture = classifyCpuArchitecture(platformInfo.arch);
  const addressWidthBits = resolveAddressWidth(cpuArchitecture, platformInfo.dataModel);
  const libraryPattern = libraryPatternFor(operatingSystem);
  const strategy = LIBRARY_STRATEGIES[operatingSystem];

  const mapLibraryName = (genericName: string): string =>
    strategy.mapName(genericName, libraryPattern);
  const locatorContext = {
    fileSystem,
    logger: deps.locatorLogger ?? logger,
    mapName: mapLibraryName,
  };

  const identity: PlatformIdentity = {
    operatingSystem,
    cpuArchitecture,
    machine: platformInfo.arch.trim().toLowerCase(),
    addressWidthBits,
    addressMask: addressMaskFor(addressWidthBits),
    longSizeBits: addressWidthBits,
    runtimeMajorVersion: parseRuntimeMajorVersion(platformInfo.runtimeVersion),
    name: `${cpuArchitecture}-${operatingSystem}`,
    isUnixLike: isUnixLike(operatingSystem),
    isBsdFamily: isBsdFamily(operatingSystem),
    isSupported: operatingSystem !== OperatingSystem.Unknown,
    libraryPattern,
    mapLibraryName,
    locateLibrary: (genericName, searchPaths) =>
      strategy.locate(genericName, searchPaths, locatorContext),
  };

  if (!identity.isSupported || cpuArchitecture === CpuArchitecture.Unknown) {
    logger.warn("Unrecognized platform", {
      osName: platformInfo.osName,
      arch: platformInfo.arch,
    });
  }
  logger.info("Platform resolved", {
    name: identity.name,
    addressWidth: addressWidthBits,
    runtimeMajor: identity.runtimeMajorVersion,
  });

  return Object.freeze(identity);
}
