/**
 * Tests for service errors.
 */

import { describe, it, expect } from "vitest";
import {
  FileSystemError,
  PlatformInitError,
  ServiceError,
  getErrorMessage,
  isPlatformInitErrorWithCode,
  isServiceError,
} from "./errors";

describe("PlatformInitError", () => {
  it("carries its code", () => {
    const error = new PlatformInitError("no width", "ADDRESS_WIDTH_UNKNOWN");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ServiceError);
    expect(error.name).toBe("PlatformInitError");
    expect(error.errorCode).toBe("ADDRESS_WIDTH_UNKNOWN");
    expect(error.code).toBe("ADDRESS_WIDTH_UNKNOWN");
  });

  it("serializes to JSON", () => {
    const error = new PlatformInitError("already set", "ALREADY_INITIALIZED");

    expect(error.toJSON()).toEqual({
      type: "platform",
      message: "already set",
      code: "ALREADY_INITIALIZED",
    });
  });
});

describe("FileSystemError", () => {
  it("serializes with its path", () => {
    const error = new FileSystemError("ENOENT", "/usr/lib/libz.so", "missing");

    expect(error.toJSON()).toEqual({
      type: "filesystem",
      message: "missing",
      path: "/usr/lib/libz.so",
      code: "ENOENT",
    });
  });

  it("keeps the original node code", () => {
    const cause = new Error("loop");
    const error = new FileSystemError("UNKNOWN", "/a", "loop", cause, "ELOOP");

    expect(error.cause).toBe(cause);
    expect(error.originalCode).toBe("ELOOP");
  });
});

describe("type guards", () => {
  it("recognizes service errors", () => {
    expect(isServiceError(new FileSystemError("EACCES", "/a", "denied"))).toBe(true);
    expect(isServiceError(new Error("plain"))).toBe(false);
    expect(isServiceError("text")).toBe(false);
  });

  it("matches platform errors by code", () => {
    const error = new PlatformInitError("no width", "ADDRESS_WIDTH_UNKNOWN");

    expect(isPlatformInitErrorWithCode(error, "ADDRESS_WIDTH_UNKNOWN")).toBe(true);
    expect(isPlatformInitErrorWithCode(error, "ALREADY_INITIALIZED")).toBe(false);
    expect(isPlatformInitErrorWithCode(new Error("x"), "ALREADY_INITIALIZED")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("reads messages from errors and stringifies the rest", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage(42)).toBe("42");
  });
});
