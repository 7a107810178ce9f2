import { formatComposite } from "../format/composite.js";
import { formatValue } from "../format/invariant.js";
import { IndexOutOfRangeError } from "../lib/errors.js";
import { tryCatch, type Result } from "../lib/result.js";

import { parseTemplate, type ParsedTemplate } from "./scanner.js";

/**
 * Text rendered in place of a null or undefined argument
 */
export const NULL_VALUE = "(null)";

/**
 * Key of the trailing pair that carries the unparsed template
 */
export const ORIGINAL_FORMAT_KEY = "{OriginalFormat}";

/**
 * A placeholder name paired with its argument
 */
export type LogValue = readonly [name: string, value: unknown];

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Argument as the renderer sees it: nulls marked, collections joined
 */
function prepareValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return NULL_VALUE;
  }
  if (typeof value === "string" || !isIterable(value)) {
    return value;
  }
  return Array.from(value, (element) =>
    element === null || element === undefined ? NULL_VALUE : formatValue(element)
  ).join(", ");
}

/**
 * Parses a named message template once and renders or extracts values from it.
 *
 * @example
 * ```typescript
 * const formatter = new LogValuesFormatter("User {UserId} logged in from {IpAddress}");
 *
 * formatter.format([42, "10.0.0.1"]);
 * // "User 42 logged in from 10.0.0.1"
 *
 * formatter.getValues([42, "10.0.0.1"]);
 * // [["UserId", 42], ["IpAddress", "10.0.0.1"], ["{OriginalFormat}", "User {UserId} ..."]]
 * ```
 */
export class LogValuesFormatter {
  private parsed: ParsedTemplate | undefined;

  constructor(public readonly originalFormat: string) {}

  /**
   * Parsed form, computed on first use. Parsing is pure, so a second
   * computation would produce the same value.
   */
  private get template(): ParsedTemplate {
    this.parsed ??= parseTemplate(this.originalFormat);
    return this.parsed;
  }

  /**
   * Placeholder names in the order they appear, repeats included
   */
  get valueNames(): readonly string[] {
    return this.template.valueNames;
  }

  /**
   * The template with names replaced by positional indexes
   */
  get canonicalFormat(): string {
    return this.template.canonicalFormat;
  }

  /**
   * Render the template against positional arguments.
   *
   * `values` is not modified. Throws `FormatError` when a placeholder has no
   * matching argument.
   */
  format(values?: readonly unknown[] | null): string {
    const { canonicalFormat, bypassed } = this.template;
    if (bypassed) {
      return canonicalFormat;
    }
    return formatComposite(canonicalFormat, Array.from(values ?? [], prepareValue));
  }

  /**
   * Like `format`, with failures returned instead of thrown
   */
  tryFormat(values?: readonly unknown[] | null): Result<string, Error> {
    return tryCatch(() => this.format(values));
  }

  /**
   * Name/value pair at `index`. `index === valueNames.length` returns the
   * `{OriginalFormat}` pair.
   */
  getValue(values: readonly unknown[], index: number): LogValue {
    const names = this.valueNames;

    if (!Number.isInteger(index) || index < 0 || index > names.length) {
      throw new IndexOutOfRangeError(index, names.length + 1);
    }

    const name = names[index];
    if (name === undefined) {
      return [ORIGINAL_FORMAT_KEY, this.originalFormat];
    }
    if (index >= values.length) {
      throw new IndexOutOfRangeError(index, values.length);
    }
    return [name, values[index]];
  }

  /**
   * Every name zipped with its argument, then the `{OriginalFormat}` pair
   */
  getValues(values: readonly unknown[]): LogValue[] {
    const names = this.valueNames;

    if (values.length < names.length) {
      throw new IndexOutOfRangeError(values.length, values.length);
    }

    const pairs: LogValue[] = names.map((name, index): LogValue => [name, values[index]]);
    pairs.push([ORIGINAL_FORMAT_KEY, this.originalFormat]);
    return pairs;
  }
}
