/**
 * Environment configuration, validated with zod.
 *
 * Each variable is validated on its own: an invalid value is reported as an
 * issue and replaced by its default, the remaining variables still apply.
 * Issues are returned rather than logged because logging is configured from
 * the result.
 */

import { z } from "zod";
import { delimiter } from "node:path";
import { LOGGER_NAMES, LogLevel } from "../logging";
import type { AddressWidth } from "../native/types";
import type { ConfigIssue, ConfigLoadResult } from "./types";
import { DEFAULT_PLATFORM_CONFIG } from "./types";

export const ENV_PREFIX = "NATIVE_PLATFORM_";

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.nativeEnum(LogLevel));

const dataModelSchema = z
  .string()
  .trim()
  .pipe(z.enum(["32", "64"]))
  .transform((value): AddressWidth => (value === "32" ? 32 : 64));

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off", ""]);

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUTHY.has(value) || FALSY.has(value), {
    message: "Expected a boolean flag (1/0, true/false, yes/no, on/off)",
  })
  .transform((value) => TRUTHY.has(value));

const loggerNameSchema = z.enum(LOGGER_NAMES);

const loggerFilterSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  )
  .pipe(z.array(loggerNameSchema))
  .transform((names) => (names.length > 0 ? new Set(names) : undefined));

const pathListSchema = z.string().transform((value) =>
  value
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

const logFileSchema = z.string().trim().min(1);

/**
 * Parse one variable. Unset variables yield the default without an issue.
 */
function readVariable<T, F>(
  env: Readonly<Record<string, string | undefined>>,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  fallback: F,
  issues: ConfigIssue[]
): T | F {
  const variable = ENV_PREFIX + name;
  const raw = env[variable];
  if (raw === undefined) {
    return fallback;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    issues.push({
      variable,
      message: result.error.issues.map((issue) => issue.message).join("; "),
    });
    return fallback;
  }
  return result.data;
}

/**
 * Load configuration from environment variables.
 *
 * | Variable                        | Meaning                                 |
 * | ------------------------------- | --------------------------------------- |
 * | NATIVE_PLATFORM_DATA_MODEL      | "32" or "64", overrides the host value  |
 * | NATIVE_PLATFORM_LIBRARY_PATH    | extra search directories                |
 * | NATIVE_PLATFORM_LOGLEVEL        | silly, debug, info, warn, error         |
 * | NATIVE_PLATFORM_PRINT_LOGS      | mirror logs to the console              |
 * | NATIVE_PLATFORM_LOGGER          | comma-separated logger names to keep    |
 * | NATIVE_PLATFORM_LOG_FILE        | log file path                           |
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): ConfigLoadResult {
  const issues: ConfigIssue[] = [];
  const defaults = DEFAULT_PLATFORM_CONFIG;

  const config = {
    dataModel: readVariable(env, "DATA_MODEL", dataModelSchema, defaults.dataModel, issues),
    libraryPaths: readVariable(
      env,
      "LIBRARY_PATH",
      pathListSchema,
      defaults.libraryPaths,
      issues
    ),
    logging: {
      level: readVariable(env, "LOGLEVEL", logLevelSchema, defaults.logging.level, issues),
      printLogs: readVariable(
        env,
        "PRINT_LOGS",
        booleanFlagSchema,
        defaults.logging.printLogs,
        issues
      ),
      loggers: readVariable(env, "LOGGER", loggerFilterSchema, defaults.logging.loggers, issues),
      logFile: readVariable(env, "LOG_FILE", logFileSchema, defaults.logging.logFile, issues),
    },
  };

  return { config, issues };
}
