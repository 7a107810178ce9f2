/**
 * Render command - Format a template against positional values
 */

import { logger } from "../../lib/logger.js";
import { ok, type Result } from "../../lib/result.js";
import { LogValuesFormatter } from "../../templates/formatter.js";
import { formatRendered } from "../formatters.js";
import {
  addCommonOptions,
  exitWithError,
  parseValueArgs,
  resolveContext,
  type CommandContext,
} from "../shared.js";

import type { Command } from "commander";

export function runRender(
  template: string,
  rawValues: readonly string[],
  context: CommandContext
): Result<string, Error> {
  const formatter = new LogValuesFormatter(template);
  const values = parseValueArgs(rawValues, context.jsonValues);

  logger.debug("Rendering {Canonical} with {Count} value(s)", formatter.canonicalFormat, values.length);

  const rendered = formatter.tryFormat(values);
  if (!rendered.success) {
    return rendered;
  }
  return ok(formatRendered(rendered.data, context.output));
}

export function registerRenderCommand(program: Command): void {
  addCommonOptions(
    program
      .command("render <template> [values...]")
      .description("Render a message template with positional values")
  ).action((template: string, values: string[], options: Record<string, unknown>) => {
    const context = resolveContext(options);
    if (!context.success) {
      exitWithError(context.error);
    }

    const output = runRender(template, values, context.data);
    if (!output.success) {
      exitWithError(output.error);
    }
    console.log(output.data);
  });
}
