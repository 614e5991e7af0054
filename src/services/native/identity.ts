/**
 * Classification of raw environment facts into the closed OS and CPU
 * taxonomies, plus the values derived from them.
 */

import { PlatformInitError } from "../errors";
import { CpuArchitecture, OperatingSystem, type AddressWidth } from "./types";

/**
 * OS name prefixes, tried in order against the first word of the OS name.
 */
const OS_PREFIXES: readonly (readonly [prefix: string, os: OperatingSystem])[] = [
  ["mac", OperatingSystem.Darwin],
  ["darwin", OperatingSystem.Darwin],
  ["linux", OperatingSystem.Linux],
  ["sunos", OperatingSystem.Solaris],
  ["solaris", OperatingSystem.Solaris],
  ["aix", OperatingSystem.AIX],
  ["openbsd", OperatingSystem.OpenBSD],
  ["freebsd", OperatingSystem.FreeBSD],
  ["windows", OperatingSystem.Windows],
];

/**
 * Architecture aliases checked before the canonical-name lookup.
 */
const CPU_ALIASES: ReadonlyMap<string, CpuArchitecture> = new Map([
  ["x86", CpuArchitecture.I386],
  ["i386", CpuArchitecture.I386],
  ["i86pc", CpuArchitecture.I386],
  ["x86_64", CpuArchitecture.X86_64],
  ["amd64", CpuArchitecture.X86_64],
  ["ppc", CpuArchitecture.PPC],
  ["powerpc", CpuArchitecture.PPC],
]);

const CANONICAL_CPUS: ReadonlySet<string> = new Set(Object.values(CpuArchitecture));

function isCpuArchitecture(value: string): value is CpuArchitecture {
  return CANONICAL_CPUS.has(value);
}

const CPU_ADDRESS_WIDTHS: Readonly<Partial<Record<CpuArchitecture, AddressWidth>>> = {
  [CpuArchitecture.I386]: 32,
  [CpuArchitecture.PPC]: 32,
  [CpuArchitecture.Sparc]: 32,
  [CpuArchitecture.X86_64]: 64,
  [CpuArchitecture.PPC64]: 64,
  [CpuArchitecture.SparcV9]: 64,
  [CpuArchitecture.S390X]: 64,
};

/**
 * Classify an OS name such as "Mac OS X", "Windows 10" or "SunOS".
 * Unrecognized names yield `OperatingSystem.Unknown`.
 */
export function classifyOperatingSystem(rawOsName: string): OperatingSystem {
  const firstWord = rawOsName.trim().split(/\s+/)[0]?.toLowerCase() ?? "";
  for (const [prefix, os] of OS_PREFIXES) {
    if (firstWord.startsWith(prefix)) {
      return os;
    }
  }
  return OperatingSystem.Unknown;
}

/**
 * Classify a CPU architecture string such as "amd64", "i386" or "sparcv9".
 * Unrecognized strings yield `CpuArchitecture.Unknown`.
 */
export function classifyCpuArchitecture(rawArch: string): CpuArchitecture {
  const arch = rawArch.toLowerCase();
  const alias = CPU_ALIASES.get(arch);
  if (alias !== undefined) {
    return alias;
  }
  return isCpuArchitecture(arch) ? arch : CpuArchitecture.Unknown;
}

/**
 * Determine the native address width.
 *
 * An explicit hint of exactly 32 or 64 wins; any other hint is ignored.
 * Without a usable hint the width follows from the CPU.
 *
 * @throws PlatformInitError ADDRESS_WIDTH_UNKNOWN when neither source gives a width
 */
export function resolveAddressWidth(
  cpu: CpuArchitecture,
  hint: number | undefined
): AddressWidth {
  if (hint === 32 || hint === 64) {
    return hint;
  }
  const width = CPU_ADDRESS_WIDTHS[cpu];
  if (width === undefined) {
    throw new PlatformInitError(
      `Cannot determine cpu address size for architecture "${cpu}"`,
      "ADDRESS_WIDTH_UNKNOWN"
    );
  }
  return width;
}

export function addressMaskFor(width: AddressWidth): bigint {
  return width === 32 ? 0xffff_ffffn : 0xffff_ffff_ffff_ffffn;
}

/**
 * Read the major version from a runtime version string ("v20.11.1" -> 20).
 * Returns null when the string is missing or not a version.
 */
export function parseRuntimeMajorVersion(rawVersion: string | undefined): number | null {
  const match = rawVersion?.trim().match(/^v?(\d+)(?:\.|$)/);
  const major = match?.[1];
  return major === undefined ? null : Number.parseInt(major, 10);
}

/**
 * Pattern recognizing names that are already platform library file names.
 * Searched anywhere in the name, like the loaders that consume them.
 */
export function libraryPatternFor(os: OperatingSystem): RegExp {
  switch (os) {
    case OperatingSystem.Windows:
      return /\.dll$/;
    case OperatingSystem.Darwin:
      return /lib.*\.(dylib|jnilib)$/;
    default:
      return /lib.*\.so.*$/;
  }
}

export function isUnixLike(os: OperatingSystem): boolean {
  return os !== OperatingSystem.Windows;
}

export function isBsdFamily(os: OperatingSystem): boolean {
  return (
    os === OperatingSystem.FreeBSD ||
    os === OperatingSystem.OpenBSD ||
    os === OperatingSystem.NetBSD ||
    os === OperatingSystem.Darwin
  );
}
