/**
 * Positional format engine for `{index[,alignment][:formatString]}` items
 */

import { FormatError } from "../lib/errors.js";

import { formatValue } from "./invariant.js";

/**
 * A well-formed format item found in a composite format string
 */
export interface FormatItem {
  index: number;
  /** Positive pads on the left, negative on the right */
  alignment: number;
  formatString: string | undefined;
  /** Position of the item's closing brace */
  end: number;
}

const DIGIT_REGEX = /[0-9]/;

/** Alignment widths must stay below this */
const MAX_ALIGNMENT = 1_000_000;

function readDigits(format: string, start: number): { value: string; end: number } {
  let end = start;
  while (end < format.length && DIGIT_REGEX.test(format[end] ?? "")) {
    end++;
  }
  return { value: format.slice(start, end), end };
}

function skipSpaces(format: string, start: number): number {
  let end = start;
  while (format[end] === " ") {
    end++;
  }
  return end;
}

/**
 * Read the format item opening at `start`, or undefined when the text there
 * is not a complete item
 */
export function readFormatItem(format: string, start: number): FormatItem | undefined {
  const index = readDigits(format, start + 1);
  if (index.value.length === 0) {
    return undefined;
  }

  let position = skipSpaces(format, index.end);
  let alignment = 0;

  if (format[position] === ",") {
    position = skipSpaces(format, position + 1);
    const negative = format[position] === "-";
    if (negative) {
      position++;
    }
    const width = readDigits(format, position);
    if (width.value.length === 0) {
      return undefined;
    }
    alignment = negative ? -Number(width.value) : Number(width.value);
    position = skipSpaces(format, width.end);
  }

  let formatString: string | undefined;

  if (format[position] === ":") {
    const close = format.indexOf("}", position + 1);
    const open = format.indexOf("{", position + 1);
    if (close === -1 || (open !== -1 && open < close)) {
      return undefined;
    }
    formatString = format.slice(position + 1, close);
    position = close;
  }

  if (format[position] !== "}") {
    return undefined;
  }

  return { index: Number(index.value), alignment, formatString, end: position };
}

function align(text: string, alignment: number): string {
  return alignment < 0 ? text.padEnd(-alignment) : text.padStart(alignment);
}

/**
 * Replace each format item with the matching argument.
 *
 * `{{` and `}}` produce literal braces. Text that does not form a complete
 * item is copied as-is. An item whose index has no argument throws.
 *
 * @example
 * ```typescript
 * formatComposite("{0,-6}|{1:F1}", ["id", 2.25]); // "id    |2.3"
 * ```
 */
export function formatComposite(format: string, args: readonly unknown[]): string {
  const output: string[] = [];
  let literalStart = 0;
  let position = 0;

  const flush = (end: number): void => {
    if (end > literalStart) {
      output.push(format.slice(literalStart, end));
    }
  };

  while (position < format.length) {
    const char = format[position];

    if ((char === "{" || char === "}") && format[position + 1] === char) {
      flush(position);
      output.push(char);
      position += 2;
      literalStart = position;
      continue;
    }

    if (char === "{") {
      const item = readFormatItem(format, position);
      if (item !== undefined) {
        if (item.index >= args.length) {
          throw new FormatError(
            `Format item index ${item.index} has no argument (${args.length} supplied)`,
            { index: item.index, count: args.length, format }
          );
        }
        if (Math.abs(item.alignment) >= MAX_ALIGNMENT) {
          throw new FormatError(
            `Format item alignment ${item.alignment} must be below ${MAX_ALIGNMENT} in absolute value`,
            { index: item.index, alignment: item.alignment, format }
          );
        }
        flush(position);
        output.push(align(formatValue(args[item.index], item.formatString), item.alignment));
        position = item.end + 1;
        literalStart = position;
        continue;
      }
    }

    position++;
  }

  flush(position);
  return output.join("");
}
