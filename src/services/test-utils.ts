/**
 * Shared test helpers for boundary tests against the real filesystem.
 */

import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory, resolved to its canonical path.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "native-platform-test-"));
  // Canonical path: macOS /var -> /private/var, Windows 8.3 short names
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true, maxRetries: 5, retryDelay: 200 });
    },
  };
}
