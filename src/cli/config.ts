/**
 * Configuration Management
 *
 * CLI defaults come from `logtemplate.config.json` in the working directory,
 * or from the file passed with `--config`. `LOGTEMPLATE_LOG_LEVEL` overrides
 * the file's log level.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { LOG_LEVEL_NAMES } from "../lib/logger.js";
import { err, ok, type Result } from "../lib/result.js";

import { OUTPUT_FORMATS } from "./formatters.js";

export const CONFIG_FILE_NAME = "logtemplate.config.json";

export const LOG_LEVEL_ENV = "LOGTEMPLATE_LOG_LEVEL";

/**
 * Configuration schema
 */
export const CliConfigSchema = z
  .object({
    output: z.enum(OUTPUT_FORMATS).default("terminal"),
    logLevel: z.enum(LOG_LEVEL_NAMES).default("warn"),
    jsonValues: z.boolean().default(false),
    color: z.boolean().default(true),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function readConfigFile(filePath: string): Result<unknown, ConfigError> {
  try {
    return ok(JSON.parse(readFileSync(filePath, "utf-8")));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Cannot read config file ${filePath}: ${reason}`, { filePath }));
  }
}

/**
 * Load CLI configuration, filling defaults for anything the file leaves out
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<CliConfig, ConfigError> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const filePath = resolve(cwd, options.path ?? CONFIG_FILE_NAME);

  let raw: unknown = {};
  if (existsSync(filePath)) {
    const read = readConfigFile(filePath);
    if (!read.success) {
      return read;
    }
    raw = read.data;
  } else if (options.path !== undefined) {
    return err(new ConfigError(`Config file not found: ${filePath}`, { filePath }));
  }

  const envLevel = env[LOG_LEVEL_ENV];
  if (envLevel !== undefined && envLevel.length > 0 && typeof raw === "object" && raw !== null) {
    raw = { ...raw, logLevel: envLevel };
  }

  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`, {
        filePath,
        issues: parsed.error.issues,
      })
    );
  }

  return ok(parsed.data);
}
