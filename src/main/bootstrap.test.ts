/**
 * Tests for the process-wide platform identity.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockScope } = vi.hoisted(() => ({ mockScope: vi.fn() }));

vi.mock("electron-log/node", () => ({
  default: {
    scope: mockScope,
    transports: { file: {}, console: {} },
  },
}));

import {
  getDefaultSearchPaths,
  getPlatform,
  initializePlatform,
  resetPlatformForTesting,
  type PlatformBootstrapDeps,
} from "./bootstrap";
import { DEFAULT_PLATFORM_CONFIG } from "../services/config";
import { isPlatformInitErrorWithCode } from "../services/errors";
import { createMockLoggingService, type MockLoggingService } from "../services/logging/logging.test-utils";
import { createFileSystemMock } from "../services/platform/filesystem.state-mock";
import { createMockPlatformInfo } from "../services/platform/platform-info.test-utils";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("platform bootstrap", () => {
  let loggingService: MockLoggingService;

  function testDeps(overrides?: Partial<PlatformBootstrapDeps>): PlatformBootstrapDeps {
    return {
      config: DEFAULT_PLATFORM_CONFIG,
      loggingService,
      fileSystem: createFileSystemMock(),
      platformInfo: createMockPlatformInfo(),
      ...overrides,
    };
  }

  beforeEach(() => {
    resetPlatformForTesting();
    loggingService = createMockLoggingService();
    mockScope.mockReturnValue({
      silly: vi.fn(),
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetPlatformForTesting();
  });

  describe("initializePlatform", () => {
    it("creates the identity returned by getPlatform", () => {
      const identity = initializePlatform(testDeps());

      expect(identity.name).toBe("x86_64-linux");
      expect(getPlatform()).toBe(identity);
      expect(getPlatform()).toBe(identity);
    });

    it("refuses to initialize twice", () => {
      initializePlatform(testDeps());

      const error = captureError(() => initializePlatform(testDeps()));

      expect(isPlatformInitErrorWithCode(error, "ALREADY_INITIALIZED")).toBe(true);
    });

    it("refuses to initialize after getPlatform created the identity", () => {
      getPlatform();

      const error = captureError(() => initializePlatform(testDeps()));

      expect(isPlatformInitErrorWithCode(error, "ALREADY_INITIALIZED")).toBe(true);
    });
  });

  describe("failed initialization", () => {
    const unresolvable = (): PlatformBootstrapDeps =>
      testDeps({ platformInfo: createMockPlatformInfo({ arch: "mystery", dataModel: undefined }) });

    it("throws ADDRESS_WIDTH_UNKNOWN", () => {
      const error = captureError(() => initializePlatform(unresolvable()));

      expect(isPlatformInitErrorWithCode(error, "ADDRESS_WIDTH_UNKNOWN")).toBe(true);
    });

    it("rethrows the same error on every access", () => {
      const first = captureError(() => initializePlatform(unresolvable()));

      expect(captureError(() => getPlatform())).toBe(first);
      expect(captureError(() => getPlatform())).toBe(first);
    });

    it("does not allow a second attempt", () => {
      captureError(() => initializePlatform(unresolvable()));

      const error = captureError(() => initializePlatform(testDeps()));

      expect(isPlatformInitErrorWithCode(error, "ALREADY_INITIALIZED")).toBe(true);
    });

    it("logs the failure", () => {
      captureError(() => initializePlatform(unresolvable()));

      expect(loggingService.getLogger("platform")?.error).toHaveBeenCalledWith(
        "Platform initialization failed",
        {
          osName: "Linux",
          arch: "mystery",
          error: 'Cannot determine cpu address size for architecture "unknown"',
        },
        expect.any(Error)
      );
    });
  });

  describe("configuration", () => {
    it("warns about rejected environment values", () => {
      vi.stubEnv("NATIVE_PLATFORM_LOGLEVEL", "verbose");

      initializePlatform({
        loggingService,
        fileSystem: createFileSystemMock(),
        platformInfo: createMockPlatformInfo(),
      });

      expect(loggingService.getLogger("config")?.warn).toHaveBeenCalledWith(
        "Ignoring invalid configuration value",
        { variable: "NATIVE_PLATFORM_LOGLEVEL", error: expect.any(String) }
      );
    });

    it("applies the data model override to the host facts", () => {
      vi.stubEnv("NATIVE_PLATFORM_DATA_MODEL", "32");

      const identity = initializePlatform({ loggingService, fileSystem: createFileSystemMock() });

      expect(identity.addressWidthBits).toBe(32);
    });

    it("puts configured library paths first", () => {
      initializePlatform(
        testDeps({ config: { ...DEFAULT_PLATFORM_CONFIG, libraryPaths: ["/srv/lib"] } })
      );

      expect(getDefaultSearchPaths({})).toEqual([
        "/srv/lib",
        "/usr/local/lib",
        "/usr/lib/x86_64-linux-gnu",
        "/lib/x86_64-linux-gnu",
        "/usr/lib64",
        "/lib64",
        "/usr/lib",
        "/lib",
      ]);
    });

    it("includes the multiarch directories of an arm64 host", () => {
      initializePlatform(
        testDeps({ platformInfo: createMockPlatformInfo({ arch: "aarch64", dataModel: 64 }) })
      );

      expect(getDefaultSearchPaths({}).slice(0, 3)).toEqual([
        "/usr/local/lib",
        "/usr/lib/aarch64-linux-gnu",
        "/lib/aarch64-linux-gnu",
      ]);
    });
  });

  describe("getPlatform", () => {
    it("creates the identity from the host on first access", () => {
      const identity = getPlatform();

      expect(getPlatform()).toBe(identity);
      expect(mockScope).toHaveBeenCalledWith("[platform]");
    });
  });
});
