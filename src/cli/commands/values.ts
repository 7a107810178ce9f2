/**
 * Values command - Extract placeholder names paired with values
 */

import { tryCatch, type Result } from "../../lib/result.js";
import { LogValuesFormatter } from "../../templates/formatter.js";
import { formatLogValues } from "../formatters.js";
import {
  addCommonOptions,
  exitWithError,
  parseValueArgs,
  resolveContext,
  type CommandContext,
} from "../shared.js";

import type { Command } from "commander";

export function runValues(
  template: string,
  rawValues: readonly string[],
  context: CommandContext
): Result<string, Error> {
  const formatter = new LogValuesFormatter(template);
  const values = parseValueArgs(rawValues, context.jsonValues);
  return tryCatch(() => formatLogValues(formatter.getValues(values), context.output));
}

export function registerValuesCommand(program: Command): void {
  addCommonOptions(
    program
      .command("values <template> [values...]")
      .description("List placeholder names with their values, then {OriginalFormat}")
  ).action((template: string, values: string[], options: Record<string, unknown>) => {
    const context = resolveContext(options);
    if (!context.success) {
      exitWithError(context.error);
    }

    const output = runValues(template, values, context.data);
    if (!output.success) {
      exitWithError(output.error);
    }
    console.log(output.data);
  });
}
