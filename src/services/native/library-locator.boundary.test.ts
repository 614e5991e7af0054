/**
 * Boundary tests for the library locators against the real filesystem.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdir, symlink, writeFile } from "node:fs/promises";
import { locateHighestSoVersion, locateInSearchOrder, type LocatorContext } from "./library-locator";
import { mapLinuxName, mapWindowsName } from "./name-mapper";
import { libraryPatternFor } from "./identity";
import { OperatingSystem } from "./types";
import { DefaultFileSystemLayer } from "../platform/filesystem";
import { createTempDir } from "../test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";

describe("library locators", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };
  let context: LocatorContext;

  beforeEach(async () => {
    tempDir = await createTempDir();
    const logger = createSilentLogger();
    const pattern = libraryPatternFor(OperatingSystem.Linux);
    context = {
      fileSystem: new DefaultFileSystemLayer(logger),
      logger,
      mapName: (name) => mapLinuxName(name, pattern),
    };
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("finds the highest version across real directories", async () => {
    const first = join(tempDir.path, "first");
    const second = join(tempDir.path, "second");
    await mkdir(first);
    await mkdir(second);
    await writeFile(join(first, "libfoo.so.5"), "");
    await writeFile(join(second, "libfoo.so.6"), "");
    await writeFile(join(second, "libfoo.so"), "");

    const result = await locateHighestSoVersion(
      "foo",
      [first, join(tempDir.path, "missing"), second],
      context
    );

    expect(result).toBe(join(second, "libfoo.so.6"));
  });

  it("skips a subdirectory named like a library", async () => {
    await mkdir(join(tempDir.path, "libfoo.so.9"));
    await writeFile(join(tempDir.path, "libfoo.so.1"), "");

    const result = await locateHighestSoVersion("foo", [tempDir.path], context);

    expect(result).toBe(join(tempDir.path, "libfoo.so.1"));
  });

  it.skipIf(process.platform === "win32")(
    "finds a library through a symlink in search order",
    async () => {
      await writeFile(join(tempDir.path, "libbar.so.2"), "");
      await symlink(join(tempDir.path, "libbar.so.2"), join(tempDir.path, "libbar.so"));

      const result = await locateInSearchOrder("bar", [tempDir.path], context);

      expect(result).toBe(join(tempDir.path, "libbar.so"));
    }
  );

  it("returns the mapped name when the library is absent", async () => {
    const windowsPattern = libraryPatternFor(OperatingSystem.Windows);

    const result = await locateInSearchOrder("ssl", [tempDir.path], {
      ...context,
      mapName: (name) => mapWindowsName(name, windowsPattern),
    });

    expect(result).toBe("ssl.dll");
  });
});
