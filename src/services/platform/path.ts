/**
 * Path class for normalized, cross-platform absolute paths.
 *
 * Internal format:
 * - POSIX separators (forward slashes) always
 * - Absolute paths required (throws on relative paths)
 * - No trailing slashes (except root)
 * - No `.` or `..` segments (resolved)
 *
 * Case is preserved on every platform: resolved library paths are handed to a
 * native loader verbatim.
 */

import * as nodePath from "node:path";

// Internal platform state (can be overridden for testing)
let isWindowsPlatform = process.platform === "win32";

/**
 * Set whether the platform is Windows for testing purposes.
 * @internal
 */
export function setPlatformForTesting(isWindows: boolean): void {
  isWindowsPlatform = isWindows;
}

/**
 * Reset platform detection to actual values.
 * @internal
 */
export function resetPlatform(): void {
  isWindowsPlatform = process.platform === "win32";
}

/**
 * Immutable, normalized absolute path.
 *
 * ```typescript
 * new Path("/usr/lib/", "libz.so.1").toString(); // "/usr/lib/libz.so.1"
 * new Path("C:\\Windows\\System32").toString(); // "C:/Windows/System32" (on Windows)
 * Path.resolve("lib").toString();               // "<cwd>/lib"
 * ```
 */
export class Path {
  private readonly _value: string;

  /**
   * @param base - Base path (string or existing Path) - must be absolute
   * @param parts - Additional path segments to join (must not be empty)
   * @throws Error if path is empty, relative, or parts are invalid
   */
  constructor(base: string | Path, ...parts: string[]) {
    const joined = Path.joinParts(base, parts);
    this._value = Path.normalize(joined, isWindowsPlatform);
  }

  private static joinParts(base: string | Path, parts: string[]): string {
    const baseStr = base instanceof Path ? base._value : base;

    if (baseStr === "") {
      throw new Error("Path cannot be empty");
    }

    for (const part of parts) {
      if (part === "") {
        throw new Error("Path parts cannot be empty strings");
      }
    }

    if (parts.length > 0) {
      const posixBase = baseStr.replace(/\\/g, "/");
      return nodePath.posix.join(posixBase, ...parts);
    }

    return baseStr;
  }

  private static normalize(joined: string, isWindows: boolean): string {
    let normalized = joined.replace(/\\/g, "/");

    // Collapse multiple slashes (but preserve UNC paths on Windows: //server/share)
    if (isWindows && normalized.startsWith("//")) {
      normalized = "//" + normalized.slice(2).replace(/\/+/g, "/");
    } else {
      normalized = normalized.replace(/\/+/g, "/");
    }

    if (!Path.isAbsolute(normalized, isWindows)) {
      throw new Error(
        `Path must be absolute, got relative path: "${joined}". ` +
          `Use Path.resolve("${joined}") to resolve against the working directory.`
      );
    }

    const segments = normalized.split("/");
    const resolvedSegments: string[] = [];

    for (const segment of segments) {
      if (segment === "..") {
        if (resolvedSegments.length > 1) {
          resolvedSegments.pop();
        }
      } else if (segment !== "." && segment !== "") {
        resolvedSegments.push(segment);
      } else if (segment === "" && resolvedSegments.length === 0) {
        resolvedSegments.push("");
      }
    }

    normalized = resolvedSegments.join("/");

    if (!isWindows && !normalized.startsWith("/")) {
      normalized = "/" + normalized;
    }

    if (normalized.length > 1 && normalized.endsWith("/")) {
      normalized = normalized.slice(0, -1);
    }

    // Windows drive root ("C:" -> "C:/")
    if (isWindows && /^[a-zA-Z]:$/.test(normalized)) {
      normalized = normalized + "/";
    }

    return normalized;
  }

  /**
   * Whether a path string is absolute under the current platform rules.
   */
  static isAbsolute(value: string, isWindows: boolean = isWindowsPlatform): boolean {
    const posix = value.replace(/\\/g, "/");
    return posix.startsWith("/") || (isWindows && /^[a-zA-Z]:\//.test(posix));
  }

  /**
   * Get the current working directory as a Path.
   */
  static cwd(): Path {
    return new Path(process.cwd());
  }

  /**
   * Resolve a possibly relative path against the working directory.
   */
  static resolve(value: string | Path): Path {
    if (value instanceof Path) {
      return value;
    }
    return Path.isAbsolute(value) ? new Path(value) : new Path(Path.cwd(), value);
  }

  /**
   * Get the normalized path string.
   * Use for Map keys, comparisons, and serialization.
   */
  toString(): string {
    return this._value;
  }

  /**
   * Get path in OS-native format.
   * Use when calling node:fs or handing the path to a native loader.
   */
  toNative(): string {
    if (isWindowsPlatform) {
      return this._value.replace(/\//g, "\\");
    }
    return this._value;
  }

  toJSON(): string {
    return this._value;
  }
}
