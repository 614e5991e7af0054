/**
 * Library search strategies.
 *
 * A locator never fails for a missing library: when nothing is found it
 * returns the mapped file name, leaving the final search (and any load
 * failure) to the system loader.
 */

import type { DirEntry, FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { FileSystemError } from "../errors";
import { Path } from "../platform/path";

/**
 * Dependencies shared by all locators.
 */
export interface LocatorContext {
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
  /** The platform's name mapper, bound to its library pattern */
  readonly mapName: (genericName: string) => string;
}

export type LibraryLocator = (
  genericName: string,
  searchPaths: readonly string[],
  context: LocatorContext
) => Promise<string>;

/**
 * Resolve a search directory to an absolute Path.
 * Relative directories resolve against the working directory; empty entries
 * (e.g. from "a::b" in a path variable) are skipped.
 */
function resolveSearchDir(dir: string, logger: Logger): Path | null {
  if (dir.trim() === "") {
    logger.silly("Skipping empty search directory");
    return null;
  }
  return Path.resolve(dir);
}

function describeMiss(error: FileSystemError): string {
  return error.originalCode ?? error.fsCode;
}

async function isRegularFile(
  fileSystem: FileSystemLayer,
  candidate: Path,
  logger: Logger
): Promise<boolean> {
  try {
    const stat = await fileSystem.stat(candidate);
    return stat.isFile;
  } catch (error) {
    if (error instanceof FileSystemError) {
      if (error.fsCode !== "ENOENT") {
        logger.debug("Candidate not accessible", {
          path: candidate.toString(),
          code: describeMiss(error),
        });
      }
      return false;
    }
    throw error;
  }
}

async function listDirectory(
  fileSystem: FileSystemLayer,
  dir: Path,
  logger: Logger
): Promise<readonly DirEntry[]> {
  try {
    return await fileSystem.readdir(dir);
  } catch (error) {
    if (error instanceof FileSystemError) {
      logger.debug("Skipping search directory", {
        dir: dir.toString(),
        code: describeMiss(error),
      });
      return [];
    }
    throw error;
  }
}

/**
 * Default strategy: the first `<dir>/<mapped name>` that is a regular file,
 * in search-path order.
 */
export const locateInSearchOrder: LibraryLocator = async (
  genericName,
  searchPaths,
  { fileSystem, logger, mapName }
) => {
  const mappedName = mapName(genericName);

  for (const dir of searchPaths) {
    const dirPath = resolveSearchDir(dir, logger);
    if (dirPath === null) continue;

    const candidate = new Path(dirPath, mappedName);
    if (await isRegularFile(fileSystem, candidate, logger)) {
      logger.debug("Library found", { name: genericName, path: candidate.toString() });
      return candidate.toNative();
    }
  }

  logger.debug("Library not found, deferring to system loader", {
    name: genericName,
    mappedName,
    searched: searchPaths.length,
  });
  return mappedName;
};

interface SharedObjectMatch {
  readonly path: Path;
  /** Major version digits without leading zeros; null for the unversioned `lib<name>.so` */
  readonly version: string | null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function stripLeadingZeros(digits: string): string {
  const trimmed = digits.replace(/^0+/, "");
  return trimmed === "" ? "0" : trimmed;
}

/**
 * Compare two version digit strings (no leading zeros) of any length.
 */
function compareVersions(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Whether `candidate` replaces the current best match.
 *
 * Any versioned object beats the unversioned one; between versioned objects
 * the higher number wins and an equal number keeps the earlier match, so a
 * directory earlier in the search path wins ties.
 */
function outranks(candidate: SharedObjectMatch, best: SharedObjectMatch | undefined): boolean {
  if (best === undefined) return true;
  if (candidate.version === null) return false;
  if (best.version === null) return true;
  return compareVersions(candidate.version, best.version) > 0;
}

/**
 * Linux strategy: pool `lib<name>.so` and `lib<name>.so.<N>` across all
 * directories and pick the highest N.
 *
 * Shared objects are often installed with only their major-version name
 * (libz.so.1) and no unversioned development symlink.
 */
export const locateHighestSoVersion: LibraryLocator = async (
  genericName,
  searchPaths,
  { fileSystem, logger, mapName }
) => {
  const exactName = `lib${genericName}.so`;
  const versionedName = new RegExp(`^lib${escapeRegExp(genericName)}\\.so\\.(\\d+)$`);

  let best: SharedObjectMatch | undefined;
  let matches = 0;

  for (const dir of searchPaths) {
    const dirPath = resolveSearchDir(dir, logger);
    if (dirPath === null) continue;

    for (const entry of await listDirectory(fileSystem, dirPath, logger)) {
      if (entry.isDirectory) continue;

      let version: string | null;
      if (entry.name === exactName) {
        version = null;
      } else {
        const digits = versionedName.exec(entry.name)?.[1];
        if (digits === undefined) continue;
        version = stripLeadingZeros(digits);
      }

      matches++;
      const candidate: SharedObjectMatch = { path: new Path(dirPath, entry.name), version };
      logger.silly("Shared object candidate", {
        path: candidate.path.toString(),
        version,
      });
      if (outranks(candidate, best)) {
        best = candidate;
      }
    }
  }

  if (best !== undefined) {
    logger.debug("Library found", {
      name: genericName,
      path: best.path.toString(),
      version: best.version,
      candidates: matches,
    });
    return best.path.toNative();
  }

  const mappedName = mapName(genericName);
  logger.debug("Library not found, deferring to system loader", {
    name: genericName,
    mappedName,
    searched: searchPaths.length,
  });
  return mappedName;
};
