/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * - In-memory file/directory/symlink storage
 * - Errors mirror DefaultFileSystemLayer (ENOENT, ENOTDIR, configured codes)
 * - readdir lists children in insertion order, so listing order is deterministic
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/usr/lib/libfoo.so.5": file(),
 *     "/usr/lib/libfoo.so.6": symlink("/usr/lib/libfoo.so.6.0.1"),
 *     "/usr/lib/libfoo.so.6.0.1": file(),
 *   },
 * });
 */

import { vi, type Mock } from "vitest";
import type { DirEntry, FileStat, FileSystemErrorCode, FileSystemLayer, PathLike } from "./filesystem";
import { FileSystemError } from "../errors";
import { Path } from "./path";

export interface FileEntry {
  readonly type: "file";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export interface DirectoryEntry {
  readonly type: "directory";
  readonly error?: FileSystemErrorCode;
}

export interface SymlinkEntry {
  readonly type: "symlink";
  /** Absolute target path */
  readonly target: string;
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry | SymlinkEntry;

/**
 * State of the mock, reachable via the `$` property.
 */
export interface FileSystemMockState {
  /** Keys are normalized path strings. */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * Set an entry, auto-creating parent directories.
   * This is a test helper - it does NOT follow real filesystem semantics.
   */
  setEntry(path: string | Path, entry: Entry): void;

  /**
   * Human-readable representation, sorted by path.
   */
  toString(): string;
}

export type MockFileSystemLayer = FileSystemLayer & { readonly $: FileSystemMockState };

/**
 * Create a file entry.
 *
 * @example
 * file()
 * file({ error: "EACCES" })
 */
export function file(options?: { error?: FileSystemErrorCode }): FileEntry {
  return {
    type: "file" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a symlink entry.
 */
export function symlink(target: string, options?: { error?: FileSystemErrorCode }): SymlinkEntry {
  return {
    type: "symlink" as const,
    target,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

function normalizePath(pathLike: PathLike): string {
  if (pathLike instanceof Path) {
    return pathLike.toString();
  }
  return new Path(pathLike).toString();
}

function getParentPath(normalizedPath: string): string | null {
  const lastSlash = normalizedPath.lastIndexOf("/");
  if (lastSlash <= 0) {
    return normalizedPath === "/" ? null : "/";
  }
  return normalizedPath.substring(0, lastSlash);
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries = new Map<string, Entry>();

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  setEntry(path: string | Path, entry: Entry): void {
    const normalizedPath = normalizePath(path);

    const missingParents: string[] = [];
    let parent = getParentPath(normalizedPath);
    while (parent !== null && !this._entries.has(parent)) {
      missingParents.push(parent);
      parent = getParentPath(parent);
    }
    for (const dir of missingParents.reverse()) {
      this._entries.set(dir, directory());
    }

    this._entries.set(normalizedPath, entry);
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    return sorted
      .map(([path, entry]) => {
        const flags = entry.error ? ` [error:${entry.error}]` : "";
        if (entry.type === "symlink") {
          return `${path}: symlink -> ${entry.target}${flags}`;
        }
        return `${path}: ${entry.type}${flags}`;
      })
      .join("\n");
  }
}

export interface MockFileSystemOptions {
  /**
   * Initial entries, inserted in iteration order. Keys are normalized via Path.
   */
  entries?: Map<string, Entry> | Record<string, Entry>;
}

const MAX_SYMLINK_HOPS = 40;

/**
 * Create a behavioral mock for FileSystemLayer.
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const state = new FileSystemMockStateImpl();
  if (options?.entries) {
    const entries =
      options.entries instanceof Map ? options.entries.entries() : Object.entries(options.entries);
    for (const [key, entry] of entries) {
      state.setEntry(key, entry);
    }
  }

  const throwIfError = (entry: Entry, path: string): void => {
    if (entry.error) {
      throw new FileSystemError(entry.error, path, `Mock error: ${entry.error}`);
    }
  };

  const layer: FileSystemLayer = {
    async readdir(pathLike: PathLike): Promise<readonly DirEntry[]> {
      const path = normalizePath(pathLike);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Directory not found: ${path}`);
      }

      throwIfError(entry, path);

      if (entry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Not a directory: ${path}`);
      }

      const prefix = path === "/" ? "/" : path + "/";
      const children: DirEntry[] = [];
      for (const [entryPath, e] of state.entries) {
        if (!entryPath.startsWith(prefix) || entryPath === path) continue;
        const relativePath = entryPath.substring(prefix.length);
        if (!relativePath.includes("/")) {
          children.push({
            name: relativePath,
            isDirectory: e.type === "directory",
          });
        }
      }
      return children;
    },

    async stat(pathLike: PathLike): Promise<FileStat> {
      let path = normalizePath(pathLike);
      for (let hops = 0; hops <= MAX_SYMLINK_HOPS; hops++) {
        const entry = state.entries.get(path);
        if (!entry) {
          throw new FileSystemError("ENOENT", path, `No such file or directory: ${path}`);
        }
        throwIfError(entry, path);
        if (entry.type !== "symlink") {
          return { isFile: entry.type === "file", isDirectory: entry.type === "directory" };
        }
        path = normalizePath(entry.target);
      }
      throw new FileSystemError("UNKNOWN", path, `Too many symbolic links: ${path}`, undefined, "ELOOP");
    },
  };

  return Object.assign(layer, { $: state });
}

/**
 * FileSystemLayer whose methods are vitest spies delegating to a behavioral mock.
 */
export interface SpyFileSystemLayer extends MockFileSystemLayer {
  readdir: Mock<FileSystemLayer["readdir"]>;
  stat: Mock<FileSystemLayer["stat"]>;
}

/**
 * Create a spy-wrapped behavioral mock, for asserting which paths were queried.
 */
export function createSpyFileSystemLayer(options?: MockFileSystemOptions): SpyFileSystemLayer {
  const mock = createFileSystemMock(options);
  return {
    $: mock.$,
    readdir: vi.fn(mock.readdir.bind(mock)),
    stat: vi.fn(mock.stat.bind(mock)),
  };
}
