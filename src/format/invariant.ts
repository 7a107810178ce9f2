/**
 * The single formatting convention used when rendering argument values.
 *
 * Independent of the host locale and time zone: numbers use `.` and `,`,
 * dates are written in UTC.
 */

import { formatDate } from "./datetime.js";
import { formatNumber } from "./numeric.js";

function hasOwnToString(value: object): boolean {
  return typeof value.toString === "function" && value.toString !== Object.prototype.toString;
}

/**
 * Convert one argument to text, applying `format` where the value's type
 * understands one (numbers, bigints, dates). Other types ignore it.
 */
export function formatValue(value: unknown, format?: string): string {
  if (value === null || value === undefined) {
    return "";
  }

  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "bigint":
      return format ? formatNumber(value, format) : String(value);
    case "object":
      break;
    default:
      return String(value);
  }

  if (value instanceof Date) {
    if (format) {
      return formatDate(value, format);
    }
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }

  if (typeof value !== "object" || hasOwnToString(value)) {
    return String(value);
  }

  try {
    return JSON.stringify(value) ?? String(value);
  } catch (error) {
    // Circular structures and BigInt members cannot be serialized
    if (error instanceof TypeError) {
      return String(value);
    }
    throw error;
  }
}
