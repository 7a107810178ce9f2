/**
 * Invariant date formatting, always in UTC
 */

import { FormatError } from "../lib/errors.js";

const LOCALE = "en-US";

/**
 * Single-letter standard formats and the custom pattern each stands for
 */
const STANDARD_PATTERNS: Record<string, string> = {
  d: "MM/dd/yyyy",
  D: "dddd, dd MMMM yyyy",
  f: "dddd, dd MMMM yyyy HH:mm",
  F: "dddd, dd MMMM yyyy HH:mm:ss",
  g: "MM/dd/yyyy HH:mm",
  G: "MM/dd/yyyy HH:mm:ss",
  m: "MMMM dd",
  M: "MMMM dd",
  o: "yyyy'-'MM'-'dd'T'HH':'mm':'ss'.'fffffffK",
  O: "yyyy'-'MM'-'dd'T'HH':'mm':'ss'.'fffffffK",
  r: "ddd, dd MMM yyyy HH':'mm':'ss 'GMT'",
  R: "ddd, dd MMM yyyy HH':'mm':'ss 'GMT'",
  s: "yyyy'-'MM'-'dd'T'HH':'mm':'ss",
  t: "HH:mm",
  T: "HH:mm:ss",
  u: "yyyy'-'MM'-'dd HH':'mm':'ss'Z'",
  U: "dddd, dd MMMM yyyy HH:mm:ss",
  y: "yyyy MMMM",
  Y: "yyyy MMMM",
};

function partName(date: Date, options: Intl.DateTimeFormatOptions): string {
  return new Intl.DateTimeFormat(LOCALE, { ...options, timeZone: "UTC" }).format(date);
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Seven-digit fraction of a second; Date only carries milliseconds
 */
function fraction(date: Date): string {
  return pad(date.getUTCMilliseconds(), 3) + "0000";
}

function renderToken(date: Date, char: string, count: number): string {
  const year = date.getUTCFullYear();
  const hours = date.getUTCHours();

  switch (char) {
    case "y":
      if (count === 1) return String(year % 100);
      if (count === 2) return pad(year % 100, 2);
      return pad(year, count);
    case "M": {
      const month = date.getUTCMonth() + 1;
      if (count === 1) return String(month);
      if (count === 2) return pad(month, 2);
      return partName(date, { month: count === 3 ? "short" : "long" });
    }
    case "d": {
      const day = date.getUTCDate();
      if (count === 1) return String(day);
      if (count === 2) return pad(day, 2);
      return partName(date, { weekday: count === 3 ? "short" : "long" });
    }
    case "H":
      return count === 1 ? String(hours) : pad(hours, 2);
    case "h": {
      const twelve = hours % 12 === 0 ? 12 : hours % 12;
      return count === 1 ? String(twelve) : pad(twelve, 2);
    }
    case "m":
      return count === 1 ? String(date.getUTCMinutes()) : pad(date.getUTCMinutes(), 2);
    case "s":
      return count === 1 ? String(date.getUTCSeconds()) : pad(date.getUTCSeconds(), 2);
    case "f":
      return fraction(date).slice(0, Math.min(count, 7));
    case "F":
      return fraction(date).slice(0, Math.min(count, 7)).replace(/0+$/, "");
    case "t": {
      const designator = hours < 12 ? "AM" : "PM";
      return count === 1 ? designator.charAt(0) : designator;
    }
    case "K":
      return "Z";
    case "z":
      if (count === 1) return "+0";
      if (count === 2) return "+00";
      return "+00:00";
    default:
      return char.repeat(count);
  }
}

const TOKEN_CHARS = new Set(["y", "M", "d", "H", "h", "m", "s", "f", "F", "t", "K", "z"]);

function formatCustom(date: Date, pattern: string): string {
  const output: string[] = [];
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index] ?? "";

    if (char === "'" || char === '"') {
      const end = pattern.indexOf(char, index + 1);
      const stop = end === -1 ? pattern.length : end;
      output.push(pattern.slice(index + 1, stop));
      index = stop + 1;
      continue;
    }

    if (char === "\\") {
      output.push(pattern[index + 1] ?? "");
      index += 2;
      continue;
    }

    if (char === "%") {
      // "%d" forces a one-letter custom pattern
      index++;
      continue;
    }

    if (TOKEN_CHARS.has(char)) {
      let count = 1;
      while (pattern[index + count] === char) {
        count++;
      }
      output.push(renderToken(date, char, count));
      index += count;
      continue;
    }

    output.push(char);
    index++;
  }

  return output.join("");
}

/**
 * Format a date with a standard (`"s"`, `"u"`, `"D"`...) or custom
 * (`"yyyy-MM-dd HH:mm"`) format string
 */
export function formatDate(date: Date, format: string): string {
  if (Number.isNaN(date.getTime())) {
    return "Invalid Date";
  }

  if (format.length === 1) {
    const pattern = STANDARD_PATTERNS[format];
    if (pattern === undefined) {
      throw new FormatError(`Unknown date format specifier '${format}'`, { specifier: format });
    }
    return formatCustom(date, pattern);
  }

  return formatCustom(date, format);
}
