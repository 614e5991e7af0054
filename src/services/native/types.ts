/**
 * Platform identity types.
 */

/**
 * Operating system families.
 *
 * The values are stable identifiers (lower-case names) and appear in platform
 * names such as "x86_64-linux"; do not rename.
 */
export const OperatingSystem = {
  Darwin: "darwin",
  FreeBSD: "freebsd",
  NetBSD: "netbsd",
  OpenBSD: "openbsd",
  Linux: "linux",
  /** Solaris and OpenSolaris */
  Solaris: "solaris",
  Windows: "windows",
  AIX: "aix",
  /** IBM z/Architecture Linux */
  ZLinux: "zlinux",
  Unknown: "unknown",
} as const;

export type OperatingSystem = (typeof OperatingSystem)[keyof typeof OperatingSystem];

/**
 * CPU architectures. Values are the lower-case canonical names.
 */
export const CpuArchitecture = {
  /** Intel ia32 */
  I386: "i386",
  /** AMD64 / EM64T / x64 */
  X86_64: "x86_64",
  PPC: "ppc",
  PPC64: "ppc64",
  Sparc: "sparc",
  SparcV9: "sparcv9",
  /** IBM zSeries S/390, 64 bit */
  S390X: "s390x",
  Unknown: "unknown",
} as const;

export type CpuArchitecture = (typeof CpuArchitecture)[keyof typeof CpuArchitecture];

/**
 * Native pointer width in bits.
 */
export type AddressWidth = 32 | 64;

/**
 * The process-wide description of the native platform.
 * Created once, frozen, never re-derived.
 */
export interface PlatformIdentity {
  readonly operatingSystem: OperatingSystem;
  readonly cpuArchitecture: CpuArchitecture;
  /** Machine name as reported by the host, lower-cased ("aarch64", "armv7l") */
  readonly machine: string;
  readonly addressWidthBits: AddressWidth;
  /** 0xffffffff for 32-bit, 0xffffffffffffffff for 64-bit */
  readonly addressMask: bigint;
  /** Size of a C `long`, in bits */
  readonly longSizeBits: AddressWidth;
  /** Major version of the runtime, or null when it could not be read */
  readonly runtimeMajorVersion: number | null;
  /** "<cpu>-<os>", e.g. "x86_64-linux" */
  readonly name: string;
  readonly isUnixLike: boolean;
  readonly isBsdFamily: boolean;
  /** False when the operating system was not recognized */
  readonly isSupported: boolean;
  /** Matches file names that are already platform-qualified library names */
  readonly libraryPattern: RegExp;

  /**
   * Map a generic library name ("ssl") to this platform's file name ("libssl.so").
   * Names that already match `libraryPattern` are returned unchanged.
   */
  mapLibraryName(genericName: string): string;

  /**
   * Search `searchPaths` for the library.
   *
   * @returns An absolute path, or the mapped file name when nothing was found,
   *   for a system loader to search its own paths.
   */
  locateLibrary(genericName: string, searchPaths: readonly string[]): Promise<string>;
}
