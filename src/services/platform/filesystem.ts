/**
 * FileSystemLayer - Abstraction over the read-only filesystem queries the
 * library locator performs.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of the locator with an in-memory FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against the real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { Path } from "./path";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/** Type for paths accepted by FileSystemLayer (Path object or string) */
export type PathLike = Path | string;

/**
 * Convert a PathLike to a native path string for node:fs operations.
 * @internal
 */
function toNativePath(pathLike: PathLike): string {
  if (pathLike instanceof Path) {
    return pathLike.toNative();
  }
  return pathLike;
}

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  readonly isDirectory: boolean;
}

/**
 * Result of stat. Symbolic links are followed.
 */
export interface FileStat {
  readonly isFile: boolean;
  readonly isDirectory: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Read-only filesystem queries.
 *
 * NOTE: No exists() method - callers stat and handle ENOENT.
 */
export interface FileSystemLayer {
  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   *
   * @example
   * const entries = await fs.readdir("/usr/lib");
   * const sharedObjects = entries.filter((e) => e.name.includes(".so"));
   */
  readdir(path: PathLike): Promise<readonly DirEntry[]>;

  /**
   * Stat a path, following symbolic links.
   *
   * @throws FileSystemError with code ENOENT if the path (or a link target) does not exist
   * @throws FileSystemError with code EACCES if permission denied
   */
  stat(path: PathLike): Promise<FileStat>;
}

const KNOWN_ERROR_CODES = new Set<string>(["ENOENT", "EACCES", "ENOTDIR", "EISDIR"]);

function isKnownErrorCode(code: string | undefined): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return code !== undefined && KNOWN_ERROR_CODES.has(code);
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
export function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;

  if (isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readdir(dirPath: PathLike): Promise<readonly DirEntry[]> {
    const nativePath = toNativePath(dirPath);
    try {
      const entries = await fs.readdir(nativePath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
      }));
      this.logger.silly("Readdir", { path: nativePath, count: result.length });
      return result;
    } catch (error) {
      const fsError = mapError(error, nativePath);
      this.logger.debug("Readdir failed", {
        path: nativePath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async stat(targetPath: PathLike): Promise<FileStat> {
    const nativePath = toNativePath(targetPath);
    try {
      const stats = await fs.stat(nativePath);
      return { isFile: stats.isFile(), isDirectory: stats.isDirectory() };
    } catch (error) {
      throw mapError(error, nativePath);
    }
  }
}
