/**
 * Inspect command - Show how a template is parsed
 */

import { LogValuesFormatter } from "../../templates/formatter.js";
import { formatInspection } from "../formatters.js";
import { addCommonOptions, exitWithError, resolveContext, type CommandContext } from "../shared.js";

import type { Command } from "commander";

export function runInspect(template: string, context: CommandContext): string {
  const formatter = new LogValuesFormatter(template);
  return formatInspection(
    {
      originalFormat: formatter.originalFormat,
      canonicalFormat: formatter.canonicalFormat,
      valueNames: formatter.valueNames,
    },
    context.output
  );
}

export function registerInspectCommand(program: Command): void {
  addCommonOptions(
    program
      .command("inspect <template>")
      .description("Show the positional form and placeholder names of a template")
  ).action((template: string, options: Record<string, unknown>) => {
    const context = resolveContext(options);
    if (!context.success) {
      exitWithError(context.error);
    }
    console.log(runInspect(template, context.data));
  });
}
