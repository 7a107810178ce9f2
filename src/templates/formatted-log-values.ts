import { IndexOutOfRangeError } from "../lib/errors.js";

import { LogValuesFormatter, ORIGINAL_FORMAT_KEY, type LogValue } from "./formatter.js";

/**
 * Shown in place of a missing message template
 */
export const NULL_FORMAT = "[null]";

/**
 * A message template with its arguments, read as an ordered list of
 * name/value pairs ending with `{OriginalFormat}`.
 *
 * This is the state object a structured log sink receives: `toString()` gives
 * the human-readable message, iteration gives the fields.
 *
 * @example
 * ```typescript
 * const state = new FormattedLogValues("Order {OrderId} shipped", 1042);
 * state.toString();  // "Order 1042 shipped"
 * state.toRecord();  // { OrderId: 1042, "{OriginalFormat}": "Order {OrderId} shipped" }
 * ```
 */
export class FormattedLogValues implements Iterable<LogValue> {
  private readonly originalMessage: string;
  private readonly formatter: LogValuesFormatter | undefined;
  private readonly values: readonly unknown[];

  constructor(format: string | null | undefined, ...values: unknown[]) {
    this.originalMessage = format ?? NULL_FORMAT;
    this.values = values;
    // Without arguments the template is the whole message; nothing to parse
    this.formatter = values.length > 0 ? new LogValuesFormatter(this.originalMessage) : undefined;
  }

  /**
   * Number of pairs, `{OriginalFormat}` included
   */
  get length(): number {
    return this.formatter === undefined ? 1 : this.formatter.valueNames.length + 1;
  }

  at(index: number): LogValue {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexOutOfRangeError(index, this.length);
    }
    if (index === this.length - 1 || this.formatter === undefined) {
      return [ORIGINAL_FORMAT_KEY, this.originalMessage];
    }
    return this.formatter.getValue(this.values, index);
  }

  *[Symbol.iterator](): Iterator<LogValue> {
    for (let index = 0; index < this.length; index++) {
      yield this.at(index);
    }
  }

  /**
   * Pairs as a plain object; a repeated name keeps its last value
   */
  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this);
  }

  toString(): string {
    return this.formatter === undefined ? this.originalMessage : this.formatter.format(this.values);
  }
}
