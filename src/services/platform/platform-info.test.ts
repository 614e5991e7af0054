/**
 * Tests for the PlatformInfo mock factory.
 */

import { describe, it, expect } from "vitest";
import { createMockPlatformInfo } from "./platform-info.test-utils";

describe("createMockPlatformInfo", () => {
  it("returns a 64-bit linux host by default", () => {
    expect(createMockPlatformInfo()).toEqual({
      osName: "Linux",
      arch: "x86_64",
      dataModel: 64,
      runtimeVersion: "v20.11.1",
    });
  });

  it("keeps defaults for fields not overridden", () => {
    const info = createMockPlatformInfo({ osName: "Mac OS X" });

    expect(info.osName).toBe("Mac OS X");
    expect(info.arch).toBe("x86_64");
  });

  it("allows clearing the data model", () => {
    expect(createMockPlatformInfo({ dataModel: undefined }).dataModel).toBeUndefined();
  });
});
