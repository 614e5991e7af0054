/**
 * Generic library name -> platform file name.
 *
 * Every mapper first honors names that already match the platform's library
 * pattern, so callers can always bypass mapping with a qualified name such as
 * "libfoo.so.3".
 */

/**
 * Maps a generic name using the platform's compiled library pattern.
 */
export type NameMapper = (genericName: string, libraryPattern: RegExp) => string;

export const mapWindowsName: NameMapper = (genericName, libraryPattern) =>
  libraryPattern.test(genericName) ? genericName : `${genericName}.dll`;

export const mapDarwinName: NameMapper = (genericName, libraryPattern) =>
  libraryPattern.test(genericName) ? genericName : `lib${genericName}.dylib`;

/**
 * Default Unix convention; also used for unrecognized operating systems.
 */
export const mapUnixName: NameMapper = (genericName, libraryPattern) =>
  libraryPattern.test(genericName) ? genericName : `lib${genericName}.so`;

/**
 * On glibc systems the unversioned libc.so is a linker script, not a loadable
 * object; the runtime library is libc.so.6.
 */
const LINUX_LIBC = "libc.so.6";

export const mapLinuxName: NameMapper = (genericName, libraryPattern) => {
  const mapped = mapUnixName(genericName, libraryPattern);
  return mapped === "libc.so" ? LINUX_LIBC : mapped;
};
