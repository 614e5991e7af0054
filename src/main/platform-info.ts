/**
 * Node.js implementation of PlatformInfo.
 * Uses os.type(), os.machine(), process.arch and process.version.
 */

import os from "node:os";
import type { PlatformInfo } from "../services/platform/platform-info";

/**
 * Pointer width of each Node.js architecture, keyed by `process.arch`.
 */
const NODE_ARCH_DATA_MODELS: ReadonlyMap<string, number> = new Map([
  ["arm", 32],
  ["ia32", 32],
  ["mips", 32],
  ["mipsel", 32],
  ["ppc", 32],
  ["s390", 32],
  ["arm64", 64],
  ["loong64", 64],
  ["ppc64", 64],
  ["riscv64", 64],
  ["s390x", 64],
  ["x64", 64],
]);

/**
 * Address model declared by the Node.js build, if known.
 */
export function dataModelForNodeArch(nodeArch: string): number | undefined {
  return NODE_ARCH_DATA_MODELS.get(nodeArch);
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency.
 * `osName` is the kernel name (`uname -s`, "Windows_NT" on Windows) and `arch`
 * the machine name (`uname -m`), the same vocabulary the identity resolver
 * classifies.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly osName: string;
  readonly arch: string;
  readonly dataModel: number | undefined;
  readonly runtimeVersion: string | undefined;

  constructor(dataModelOverride?: number) {
    this.osName = os.type();
    this.arch = os.machine();
    this.dataModel = dataModelOverride ?? dataModelForNodeArch(process.arch);
    this.runtimeVersion = process.version;
  }
}
