/**
 * Default library search directories for a platform.
 */

import { OperatingSystem, type PlatformIdentity } from "./types";

/**
 * Environment variables a platform's dynamic loader searches, in order.
 */
const LOADER_PATH_VARIABLES: Readonly<Partial<Record<OperatingSystem, readonly string[]>>> = {
  [OperatingSystem.Darwin]: ["DYLD_LIBRARY_PATH", "DYLD_FALLBACK_LIBRARY_PATH"],
  [OperatingSystem.Windows]: ["PATH"],
  [OperatingSystem.AIX]: ["LIBPATH", "LD_LIBRARY_PATH"],
};

const UNIX_LOADER_PATH_VARIABLES: readonly string[] = ["LD_LIBRARY_PATH"];

/**
 * Debian-style multiarch triplets, keyed by host machine name. Many of these
 * machines (aarch64, armv7l, i686) classify as an unknown CPU.
 */
const MULTIARCH_TRIPLETS: ReadonlyMap<string, string> = new Map([
  ["x86_64", "x86_64-linux-gnu"],
  ["amd64", "x86_64-linux-gnu"],
  ["i386", "i386-linux-gnu"],
  ["i486", "i386-linux-gnu"],
  ["i586", "i386-linux-gnu"],
  ["i686", "i386-linux-gnu"],
  ["x86", "i386-linux-gnu"],
  ["aarch64", "aarch64-linux-gnu"],
  ["arm64", "aarch64-linux-gnu"],
  ["armv7l", "arm-linux-gnueabihf"],
  ["armv8l", "arm-linux-gnueabihf"],
  ["armv6l", "arm-linux-gnueabihf"],
  ["ppc", "powerpc-linux-gnu"],
  ["powerpc", "powerpc-linux-gnu"],
  ["ppc64", "powerpc64-linux-gnu"],
  ["ppc64le", "powerpc64le-linux-gnu"],
  ["riscv64", "riscv64-linux-gnu"],
  ["s390x", "s390x-linux-gnu"],
  ["sparc64", "sparc64-linux-gnu"],
  ["sparcv9", "sparc64-linux-gnu"],
  ["mips64", "mips64-linux-gnuabi64"],
  ["mips64el", "mips64el-linux-gnuabi64"],
  ["loongarch64", "loongarch64-linux-gnu"],
]);

/**
 * Triplet for the host machine, falling back to the canonical CPU name.
 */
function multiarchTriplet(platform: SearchPathPlatform): string | undefined {
  return (
    MULTIARCH_TRIPLETS.get(platform.machine) ??
    MULTIARCH_TRIPLETS.get(platform.cpuArchitecture)
  );
}

type SearchPathPlatform = Pick<
  PlatformIdentity,
  "operatingSystem" | "cpuArchitecture" | "machine" | "addressWidthBits"
>;

/**
 * Path list delimiter of the target platform (not of the host running the code).
 */
export function pathDelimiterFor(os: OperatingSystem): string {
  return os === OperatingSystem.Windows ? ";" : ":";
}

/**
 * Split a path-list value, dropping empty entries.
 */
export function splitPathList(value: string | undefined, os: OperatingSystem): string[] {
  if (!value) return [];
  return value
    .split(pathDelimiterFor(os))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function systemDirectories(platform: SearchPathPlatform): readonly string[] {
  switch (platform.operatingSystem) {
    case OperatingSystem.Windows:
      return [];
    case OperatingSystem.Darwin:
      return ["/usr/local/lib", "/opt/homebrew/lib", "/usr/lib"];
    case OperatingSystem.Linux: {
      const triplet = multiarchTriplet(platform);
      return [
        "/usr/local/lib",
        ...(triplet ? [`/usr/lib/${triplet}`, `/lib/${triplet}`] : []),
        ...(platform.addressWidthBits === 64 ? ["/usr/lib64", "/lib64"] : []),
        "/usr/lib",
        "/lib",
      ];
    }
    default:
      return ["/usr/local/lib", "/usr/lib", "/lib"];
  }
}

/**
 * Build the ordered, de-duplicated directory list to hand to `locateLibrary`:
 * 1. `extraPaths` (e.g. from NATIVE_PLATFORM_LIBRARY_PATH)
 * 2. the loader's environment variables (LD_LIBRARY_PATH, DYLD_*, PATH)
 * 3. well-known system library directories
 *
 * @example
 * const platform = getPlatform();
 * const path = await platform.locateLibrary("z", defaultLibrarySearchPaths(platform));
 */
export function defaultLibrarySearchPaths(
  platform: SearchPathPlatform,
  env: Readonly<Record<string, string | undefined>> = process.env,
  extraPaths: readonly string[] = []
): string[] {
  const os = platform.operatingSystem;
  const variables = LOADER_PATH_VARIABLES[os] ?? UNIX_LOADER_PATH_VARIABLES;

  const ordered = [
    ...extraPaths,
    ...variables.flatMap((name) => splitPathList(env[name], os)),
    ...systemDirectories(platform),
  ];
  return [...new Set(ordered)];
}
