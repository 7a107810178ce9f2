/**
 * Shared CLI utilities
 */

import chalk from "chalk";

import { ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, ok, type Result } from "../lib/result.js";

import { loadConfig } from "./config.js";
import { formatError, isValidOutputFormat, type OutputFormat } from "./formatters.js";

import type { Command } from "commander";

/**
 * Settings a command runs with, after merging flags over the config file
 */
export interface CommandContext {
  output: OutputFormat;
  jsonValues: boolean;
}

/**
 * Register the options every command accepts
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option("-o, --output <format>", "Output format: terminal, json")
    .option("--json-values", "Parse each value as JSON (numbers, arrays, null)")
    .option("--config <path>", "Path to a logtemplate.config.json file")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)");
}

/**
 * Load config, apply command-line overrides and configure logging
 */
export function resolveContext(options: Record<string, unknown>): Result<CommandContext, Error> {
  const configPath = typeof options["config"] === "string" ? options["config"] : undefined;
  const config = loadConfig(configPath === undefined ? {} : { path: configPath });
  if (!config.success) {
    return config;
  }

  if (!config.data.color) {
    chalk.level = 0;
  }

  if (options["quiet"]) {
    logger.configure({ level: "error" });
  } else if (options["verbose"]) {
    logger.configure({ level: "debug" });
  } else {
    logger.configure({ level: config.data.logLevel });
  }

  const output = typeof options["output"] === "string" ? options["output"] : config.data.output;
  if (!isValidOutputFormat(output)) {
    return err(new ValidationError(`Invalid output format: ${output}. Use: terminal, json`, { output }));
  }

  return ok({
    output,
    jsonValues: options["jsonValues"] === true || config.data.jsonValues,
  });
}

/**
 * Turn raw command-line values into arguments. With `json`, each value is
 * parsed as JSON and kept as a string when it is not valid JSON.
 */
export function parseValueArgs(raw: readonly string[], json: boolean): unknown[] {
  if (!json) {
    return [...raw];
  }

  return raw.map((text): unknown => {
    try {
      return JSON.parse(text);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return text;
      }
      throw error;
    }
  });
}

/**
 * Print an error and exit with status 1
 */
export function exitWithError(error: Error): never {
  console.error(formatError(error));
  process.exit(1);
}
