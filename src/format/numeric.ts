/**
 * Invariant numeric formatting
 *
 * Standard specifiers (`D`, `E`, `F`, `G`, `N`, `P`, `R`, `X`, each with an
 * optional precision) and custom patterns built from `0`, `#`, `.`, `,`, `%`,
 * quoted literals and `;` sections.
 */

import { FormatError } from "../lib/errors.js";

const LOCALE = "en-US";

const STANDARD_FORMAT_REGEX = /^([A-Za-z])(\d{1,3})?$/;

/** Largest precision accepted by Intl and toExponential */
const MAX_PRECISION = 100;

/** `G` without a precision switches to exponent notation from 1E+15 */
const DEFAULT_GENERAL_PRECISION = 15;

type NumericToken =
  | { kind: "digit"; zero: boolean }
  | { kind: "point" }
  | { kind: "group" }
  | { kind: "percent" }
  | { kind: "literal"; text: string };

function nonFinite(value: number): string {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  return value > 0 ? "Infinity" : "-Infinity";
}

function requireInteger(value: number | bigint, specifier: string): bigint {
  if (typeof value === "bigint") {
    return value;
  }
  if (!Number.isInteger(value)) {
    throw new FormatError(`Format specifier '${specifier}' requires an integer value`, {
      specifier,
      value,
    });
  }
  return BigInt(value);
}

/**
 * Fixed-point digits with exactly `fractionDigits` decimals, no grouping
 */
function toFixedDigits(value: number, fractionDigits: number, grouping = false): string {
  return new Intl.NumberFormat(LOCALE, {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
    useGrouping: grouping,
  }).format(value);
}

function padExponent(exponent: string, width: number): string {
  const sign = exponent.startsWith("-") ? "-" : "+";
  const digits = exponent.replace(/^[+-]/, "");
  return sign + digits.padStart(width, "0");
}

function formatDecimal(value: number | bigint, specifier: string, precision: number): string {
  const integer = requireInteger(value, specifier);
  const digits = (integer < 0n ? -integer : integer).toString().padStart(precision, "0");
  return integer < 0n ? `-${digits}` : digits;
}

function formatHex(value: number | bigint, specifier: string, precision: number): string {
  let integer = requireInteger(value, specifier);
  if (integer < 0n) {
    // Two's complement, 32 bits when it fits, 64 otherwise
    integer = integer >= -(2n ** 31n) ? BigInt.asUintN(32, integer) : BigInt.asUintN(64, integer);
  }
  const hex = integer.toString(16).padStart(precision, "0");
  return specifier === "X" ? hex.toUpperCase() : hex;
}

function formatExponential(value: number, specifier: string, precision: number): string {
  const [mantissa = "", exponent = "0"] = value.toExponential(precision).split("e");
  return `${mantissa}${specifier}${padExponent(exponent, 3)}`;
}

function trimFractionZeros(text: string): string {
  return text.includes(".") ? text.replace(/\.?0+$/, "") : text;
}

function formatGeneral(value: number, specifier: string, precision: number | undefined): string {
  const letter = specifier === "g" ? "e" : "E";

  if (precision === undefined || precision === 0) {
    const [mantissa = "", exponentText = "0"] = value.toExponential().split("e");
    const exponent = Number(exponentText);
    return exponent > -5 && exponent < DEFAULT_GENERAL_PRECISION
      ? String(value)
      : `${mantissa}${letter}${padExponent(exponentText, 2)}`;
  }

  const [mantissa = "", exponentText = "0"] = value.toExponential(precision - 1).split("e");
  const exponent = Number(exponentText);

  if (exponent > -5 && exponent < precision) {
    return trimFractionZeros(value.toPrecision(precision));
  }
  return `${trimFractionZeros(mantissa)}${letter}${padExponent(exponentText, 2)}`;
}

function formatStandard(value: number | bigint, specifier: string, precision: number | undefined): string {
  const upper = specifier.toUpperCase();

  if (upper === "D") {
    return formatDecimal(value, specifier, precision ?? 0);
  }
  if (upper === "X") {
    return formatHex(value, specifier, precision ?? 0);
  }

  const numeric = Number(value);
  if (!Number.isFinite(numeric)) {
    return nonFinite(numeric);
  }

  switch (upper) {
    case "E":
      return formatExponential(numeric, specifier, precision ?? 6);
    case "F":
      return toFixedDigits(numeric, precision ?? 2);
    case "G":
      return typeof value === "bigint" && precision === undefined
        ? value.toString()
        : formatGeneral(numeric, specifier, precision);
    case "N":
      return toFixedDigits(numeric, precision ?? 2, true);
    case "P":
      return `${toFixedDigits(numeric * 100, precision ?? 2, true)} %`;
    case "R":
      return String(value);
    default:
      throw new FormatError(`Unknown numeric format specifier '${specifier}'`, { specifier });
  }
}

/**
 * Split a custom pattern on `;`, leaving quoted and escaped ones alone
 */
function splitSections(format: string): string[] {
  const sections: string[] = [];
  let current = "";
  let quote: string | undefined;

  for (let index = 0; index < format.length; index++) {
    const char = format[index] ?? "";
    if (quote !== undefined) {
      current += char;
      if (char === quote) {
        quote = undefined;
      }
    } else if (char === "\\") {
      current += char + (format[index + 1] ?? "");
      index++;
    } else if (char === "'" || char === '"') {
      quote = char;
      current += char;
    } else if (char === ";") {
      sections.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  sections.push(current);
  return sections.slice(0, 3);
}

function tokenize(section: string): NumericToken[] {
  const tokens: NumericToken[] = [];
  let seenPoint = false;

  for (let index = 0; index < section.length; index++) {
    const char = section[index] ?? "";
    switch (char) {
      case "0":
      case "#":
        tokens.push({ kind: "digit", zero: char === "0" });
        break;
      case ".":
        // Only the first point is a decimal point
        tokens.push(seenPoint ? { kind: "literal", text: "." } : { kind: "point" });
        seenPoint = true;
        break;
      case ",":
        tokens.push({ kind: "group" });
        break;
      case "%":
        tokens.push({ kind: "percent" });
        break;
      case "\\":
        tokens.push({ kind: "literal", text: section[index + 1] ?? "" });
        index++;
        break;
      case "'":
      case '"': {
        const end = section.indexOf(char, index + 1);
        const stop = end === -1 ? section.length : end;
        tokens.push({ kind: "literal", text: section.slice(index + 1, stop) });
        index = stop;
        break;
      }
      default:
        tokens.push({ kind: "literal", text: char });
    }
  }

  return tokens;
}

interface PatternLayout {
  integerTokens: NumericToken[];
  fractionTokens: NumericToken[];
  minIntegerDigits: number;
  minFractionDigits: number;
  maxFractionDigits: number;
  grouping: boolean;
  scale: number;
}

function analyze(tokens: NumericToken[]): PatternLayout {
  const pointIndex = tokens.findIndex((token) => token.kind === "point");
  const integerTokens = pointIndex === -1 ? tokens : tokens.slice(0, pointIndex);
  const fractionTokens = pointIndex === -1 ? [] : tokens.slice(pointIndex + 1);

  const integerDigits = integerTokens.filter((token) => token.kind === "digit");
  const firstZero = integerDigits.findIndex((token) => token.kind === "digit" && token.zero);
  const minIntegerDigits = firstZero === -1 ? 0 : integerDigits.length - firstZero;

  const fractionDigits = fractionTokens.filter((token) => token.kind === "digit");
  let minFractionDigits = 0;
  fractionDigits.forEach((token, index) => {
    if (token.kind === "digit" && token.zero) {
      minFractionDigits = index + 1;
    }
  });

  // Commas between integer placeholders group; commas right after the last one scale by 1000
  const lastDigit = integerTokens.reduce(
    (last, token, index) => (token.kind === "digit" ? index : last),
    -1
  );
  const firstDigit = integerTokens.findIndex((token) => token.kind === "digit");
  let grouping = false;
  integerTokens.forEach((token, index) => {
    if (token.kind === "group" && index > firstDigit && index < lastDigit) {
      grouping = true;
    }
  });

  let scale = 1;
  if (lastDigit !== -1) {
    for (let index = lastDigit + 1; index < integerTokens.length; index++) {
      if (integerTokens[index]?.kind !== "group") {
        break;
      }
      scale /= 1000;
    }
  }

  for (const token of tokens) {
    if (token.kind === "percent") {
      scale *= 100;
    }
  }

  return {
    integerTokens,
    fractionTokens,
    minIntegerDigits,
    minFractionDigits,
    maxFractionDigits: fractionDigits.length,
    grouping,
    scale,
  };
}

function renderSection(magnitude: number, section: string, negativeSign: boolean): string {
  const layout = analyze(tokenize(section));
  const fixed = toFixedDigits(magnitude * layout.scale, layout.maxFractionDigits);
  const [integerText = "0", fractionText = ""] = fixed.split(".");

  let fraction = fractionText;
  while (fraction.length > layout.minFractionDigits && fraction.endsWith("0")) {
    fraction = fraction.slice(0, -1);
  }

  let integer = integerText === "0" && layout.minIntegerDigits === 0 ? "" : integerText;
  integer = integer.padStart(layout.minIntegerDigits, "0");

  const isZero = /^0*$/.test(integer) && /^0*$/.test(fraction);
  const output: string[] = negativeSign && !isZero ? ["-"] : [];

  const integerPlaceholders = layout.integerTokens.filter((token) => token.kind === "digit").length;
  let placeholder = 0;

  const emitDigit = (digitIndex: number): void => {
    output.push(integer[digitIndex] ?? "");
    const fromRight = integer.length - 1 - digitIndex;
    if (layout.grouping && fromRight > 0 && fromRight % 3 === 0) {
      output.push(",");
    }
  };

  for (const token of layout.integerTokens) {
    if (token.kind === "digit") {
      const fromRight = integerPlaceholders - 1 - placeholder;
      if (placeholder === 0) {
        // Leading placeholder takes every digit that has no placeholder of its own
        for (let digitIndex = 0; digitIndex < integer.length - integerPlaceholders; digitIndex++) {
          emitDigit(digitIndex);
        }
      }
      const digitIndex = integer.length - 1 - fromRight;
      if (digitIndex >= 0) {
        emitDigit(digitIndex);
      }
      placeholder++;
    } else if (token.kind === "literal") {
      output.push(token.text);
    } else if (token.kind === "percent") {
      output.push("%");
    }
  }

  let fractionPlaceholder = 0;
  for (const [index, token] of layout.fractionTokens.entries()) {
    if (index === 0 && fraction.length > 0) {
      output.push(".");
    }
    if (token.kind === "digit") {
      output.push(fraction[fractionPlaceholder] ?? "");
      fractionPlaceholder++;
    } else if (token.kind === "literal") {
      output.push(token.text);
    } else if (token.kind === "percent") {
      output.push("%");
    }
  }

  return output.join("");
}

function formatCustom(value: number, format: string): string {
  if (!Number.isFinite(value)) {
    return nonFinite(value);
  }

  const sections = splitSections(format);
  const [positive = "", negative, zero] = sections;

  if (value === 0 && zero !== undefined) {
    return renderSection(0, zero, false);
  }
  if (value < 0 && negative !== undefined) {
    return renderSection(-value, negative, false);
  }
  return renderSection(Math.abs(value), positive, value < 0);
}

/**
 * Format a number with a standard or custom numeric format string
 *
 * @example
 * ```typescript
 * formatNumber(7, "D3");              // "007"
 * formatNumber(1234.5, "N1");         // "1,234.5"
 * formatNumber(5551234567, "(###) ###-####"); // "(555) 123-4567"
 * ```
 */
export function formatNumber(value: number | bigint, format: string): string {
  const standard = STANDARD_FORMAT_REGEX.exec(format);

  if (standard) {
    const specifier = standard[1] ?? "";
    const precision = standard[2] === undefined ? undefined : Number(standard[2]);
    if (precision !== undefined && precision > MAX_PRECISION) {
      throw new FormatError(`Precision ${precision} exceeds ${MAX_PRECISION}`, { specifier, precision });
    }
    return formatStandard(value, specifier, precision);
  }

  return formatCustom(Number(value), format);
}
