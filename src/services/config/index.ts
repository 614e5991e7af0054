export { loadConfig, ENV_PREFIX } from "./config-service";
export type { PlatformConfig, ConfigIssue, ConfigLoadResult } from "./types";
export { DEFAULT_PLATFORM_CONFIG } from "./types";
