/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info";

/**
 * Create a mock PlatformInfo.
 * Defaults to a 64-bit Linux x86_64 host running Node 20.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    osName: overrides?.osName ?? "Linux",
    arch: overrides?.arch ?? "x86_64",
    dataModel: overrides && "dataModel" in overrides ? overrides.dataModel : 64,
    runtimeVersion:
      overrides && "runtimeVersion" in overrides ? overrides.runtimeVersion : "v20.11.1",
  };
}
