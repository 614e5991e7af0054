export { OperatingSystem, CpuArchitecture } from "./types";
export type { AddressWidth, PlatformIdentity } from "./types";
export {
  classifyOperatingSystem,
  classifyCpuArchitecture,
  resolveAddressWidth,
  parseRuntimeMajorVersion,
  libraryPatternFor,
} from "./identity";
export { createPlatformIdentity, LIBRARY_STRATEGIES } from "./platform";
export type { LibraryStrategy, PlatformIdentityDeps } from "./platform";
export { defaultLibrarySearchPaths, splitPathList, pathDelimiterFor } from "./search-paths";
export type { LibraryLocator, LocatorContext } from "./library-locator";
export type { NameMapper } from "./name-mapper";
