/**
 * Platform information provider.
 * Abstracts the raw environment facts identity resolution reads, for testability.
 *
 * All values are untrusted free text as reported by the host; classification
 * happens in the native identity resolver.
 */

export interface PlatformInfo {
  /** Operating system name, e.g. "Linux", "Darwin", "Windows_NT", "SunOS" */
  readonly osName: string;

  /** CPU architecture, e.g. "x86_64", "amd64", "ppc64", "sparcv9" */
  readonly arch: string;

  /** Declared address model in bits, if the host declares one */
  readonly dataModel: number | undefined;

  /** Runtime version string, e.g. "v20.11.1" */
  readonly runtimeVersion: string | undefined;
}
