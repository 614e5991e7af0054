/**
 * Tests for OS/CPU classification and derived values.
 */

import { describe, it, expect } from "vitest";
import {
  addressMaskFor,
  classifyCpuArchitecture,
  classifyOperatingSystem,
  isBsdFamily,
  isUnixLike,
  libraryPatternFor,
  parseRuntimeMajorVersion,
  resolveAddressWidth,
} from "./identity";
import { CpuArchitecture, OperatingSystem } from "./types";
import { PlatformInitError, isPlatformInitErrorWithCode } from "../errors";

describe("classifyOperatingSystem", () => {
  it.each([
    ["Mac OS X", OperatingSystem.Darwin],
    ["Darwin", OperatingSystem.Darwin],
    ["Linux", OperatingSystem.Linux],
    ["SunOS", OperatingSystem.Solaris],
    ["Solaris", OperatingSystem.Solaris],
    ["AIX", OperatingSystem.AIX],
    ["OpenBSD", OperatingSystem.OpenBSD],
    ["FreeBSD", OperatingSystem.FreeBSD],
    ["Windows 10", OperatingSystem.Windows],
    ["Windows_NT", OperatingSystem.Windows],
  ])("classifies %j as %s", (raw, expected) => {
    expect(classifyOperatingSystem(raw)).toBe(expected);
  });

  it("ignores case and surrounding whitespace", () => {
    expect(classifyOperatingSystem("  LINUX  ")).toBe(OperatingSystem.Linux);
  });

  it("only looks at the first word", () => {
    expect(classifyOperatingSystem("GNU Linux")).toBe(OperatingSystem.Unknown);
  });

  it.each(["Plan9", "NetBSD", "Haiku", ""])("returns unknown for %j", (raw) => {
    expect(classifyOperatingSystem(raw)).toBe(OperatingSystem.Unknown);
  });
});

describe("classifyCpuArchitecture", () => {
  it.each([
    ["x86", CpuArchitecture.I386],
    ["i386", CpuArchitecture.I386],
    ["i86pc", CpuArchitecture.I386],
    ["x86_64", CpuArchitecture.X86_64],
    ["AMD64", CpuArchitecture.X86_64],
    ["powerpc", CpuArchitecture.PPC],
    ["ppc", CpuArchitecture.PPC],
    ["ppc64", CpuArchitecture.PPC64],
    ["sparc", CpuArchitecture.Sparc],
    ["sparcv9", CpuArchitecture.SparcV9],
    ["s390x", CpuArchitecture.S390X],
  ])("classifies %j as %s", (raw, expected) => {
    expect(classifyCpuArchitecture(raw)).toBe(expected);
  });

  it.each(["i686", "aarch64", "riscv64", ""])("returns unknown for %j", (raw) => {
    expect(classifyCpuArchitecture(raw)).toBe(CpuArchitecture.Unknown);
  });
});

describe("resolveAddressWidth", () => {
  it("uses the hint when it is 32 or 64", () => {
    expect(resolveAddressWidth(CpuArchitecture.X86_64, 32)).toBe(32);
    expect(resolveAddressWidth(CpuArchitecture.Unknown, 64)).toBe(64);
  });

  it("ignores other hints and falls back to the cpu", () => {
    expect(resolveAddressWidth(CpuArchitecture.SparcV9, 16)).toBe(64);
    expect(resolveAddressWidth(CpuArchitecture.I386, undefined)).toBe(32);
  });

  it.each([
    [CpuArchitecture.I386, 32],
    [CpuArchitecture.PPC, 32],
    [CpuArchitecture.Sparc, 32],
    [CpuArchitecture.X86_64, 64],
    [CpuArchitecture.PPC64, 64],
    [CpuArchitecture.SparcV9, 64],
    [CpuArchitecture.S390X, 64],
  ])("derives the width of %s", (cpu, expected) => {
    expect(resolveAddressWidth(cpu, undefined)).toBe(expected);
  });

  it("throws ADDRESS_WIDTH_UNKNOWN for an unknown cpu without a hint", () => {
    let caught: unknown;
    try {
      resolveAddressWidth(CpuArchitecture.Unknown, 48);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PlatformInitError);
    expect(isPlatformInitErrorWithCode(caught, "ADDRESS_WIDTH_UNKNOWN")).toBe(true);
    expect(caught).toHaveProperty(
      "message",
      'Cannot determine cpu address size for architecture "unknown"'
    );
  });
});

describe("addressMaskFor", () => {
  it("masks 32 and 64 bits", () => {
    expect(addressMaskFor(32)).toBe(0xffffffffn);
    expect(addressMaskFor(64)).toBe(0xffffffffffffffffn);
  });
});

describe("parseRuntimeMajorVersion", () => {
  it.each([
    ["v20.11.1", 20],
    ["18.0.0", 18],
    ["v22", 22],
    [" v21.1.0 ", 21],
  ])("reads %j as %i", (raw, expected) => {
    expect(parseRuntimeMajorVersion(raw)).toBe(expected);
  });

  it.each([undefined, "", "latest", "v.20", "20abc"])("returns null for %j", (raw) => {
    expect(parseRuntimeMajorVersion(raw)).toBeNull();
  });
});

describe("libraryPatternFor", () => {
  it("matches dll names on windows", () => {
    const pattern = libraryPatternFor(OperatingSystem.Windows);

    expect(pattern.test("ssl.dll")).toBe(true);
    expect(pattern.test("libssl.so")).toBe(false);
  });

  it("matches dylib and jnilib names on darwin", () => {
    const pattern = libraryPatternFor(OperatingSystem.Darwin);

    expect(pattern.test("libssl.dylib")).toBe(true);
    expect(pattern.test("libbridge.jnilib")).toBe(true);
    expect(pattern.test("ssl.dylib")).toBe(false);
  });

  it("matches versioned shared objects elsewhere", () => {
    const pattern = libraryPatternFor(OperatingSystem.Solaris);

    expect(pattern.test("libfoo.so")).toBe(true);
    expect(pattern.test("libfoo.so.3")).toBe(true);
    expect(pattern.test("foo")).toBe(false);
  });
});

describe("os families", () => {
  it("treats everything but windows as unix-like", () => {
    expect(isUnixLike(OperatingSystem.Windows)).toBe(false);
    expect(isUnixLike(OperatingSystem.Linux)).toBe(true);
    expect(isUnixLike(OperatingSystem.Unknown)).toBe(true);
  });

  it("includes darwin in the bsd family", () => {
    expect(isBsdFamily(OperatingSystem.Darwin)).toBe(true);
    expect(isBsdFamily(OperatingSystem.FreeBSD)).toBe(true);
    expect(isBsdFamily(OperatingSystem.OpenBSD)).toBe(true);
    expect(isBsdFamily(OperatingSystem.NetBSD)).toBe(true);
    expect(isBsdFamily(OperatingSystem.Linux)).toBe(false);
    expect(isBsdFamily(OperatingSystem.Windows)).toBe(false);
  });
});
