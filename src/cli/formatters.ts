import chalk from "chalk";

import { formatValue } from "../format/invariant.js";
import { LogTemplateError } from "../lib/errors.js";
import { NULL_VALUE, type LogValue } from "../templates/formatter.js";

/**
 * Output format types
 */
export const OUTPUT_FORMATS = ["terminal", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * What `inspect` reports about a template
 */
export interface TemplateInspection {
  originalFormat: string;
  canonicalFormat: string;
  valueNames: readonly string[];
}

/**
 * Check if a string is a valid output format
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, member: unknown) => (typeof member === "bigint" ? member.toString() : member),
    2
  );
}

/**
 * Format a rendered message
 */
export function formatRendered(message: string, format: OutputFormat): string {
  return format === "json" ? toJson({ message }) : message;
}

/**
 * Format the parse of a template
 */
export function formatInspection(inspection: TemplateInspection, format: OutputFormat): string {
  if (format === "json") {
    return toJson(inspection);
  }

  const names =
    inspection.valueNames.length === 0
      ? chalk.gray("(none)")
      : inspection.valueNames.map((name, index) => `${chalk.cyan(`{${index}}`)} ${name}`).join(", ");

  return [
    `${chalk.bold("Template:")}  ${inspection.originalFormat}`,
    `${chalk.bold("Canonical:")} ${inspection.canonicalFormat}`,
    `${chalk.bold(`Names (${inspection.valueNames.length}):`)} ${names}`,
  ].join("\n");
}

/**
 * Format extracted name/value pairs, one per line
 */
export function formatLogValues(pairs: readonly LogValue[], format: OutputFormat): string {
  if (format === "json") {
    return toJson(pairs.map(([name, value]) => ({ name, value })));
  }

  return pairs
    .map(([name, value]) => {
      const text = value === null || value === undefined ? NULL_VALUE : formatValue(value);
      return `${chalk.cyan(name)} = ${text}`;
    })
    .join("\n");
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  const code = error instanceof LogTemplateError ? ` [${error.code}]` : "";
  return chalk.red(`Error${code}: ${error.message}`);
}
