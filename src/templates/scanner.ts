/**
 * Message template scanner
 *
 * Rewrites named placeholders (`{UserId}`, `{Elapsed,8:F2}`) into positional
 * ones (`{0}`, `{1,8:F2}`) and records the names in the order they appear.
 */

/**
 * How a run of identical braces resolves to a single boundary.
 *
 * An even run is always an escaped literal. For an odd run, `pick` decides
 * which brace of the run is the real one.
 */
export interface BracePolicy {
  readonly brace: "{" | "}";
  readonly pick: "first" | "last";
}

/**
 * `{{{X}` is a literal `{` followed by an opener: the last `{` of the run opens
 */
export const OPEN_BRACE_POLICY: BracePolicy = { brace: "{", pick: "last" };

/**
 * `{X}}}` is a closer followed by a literal `}`: the first `}` of the run closes
 */
export const CLOSE_BRACE_POLICY: BracePolicy = { brace: "}", pick: "first" };

/**
 * Format item syntax: `{index[,alignment][:formatString]}`
 */
const FORMAT_DELIMITERS: readonly string[] = [",", ":"];

/**
 * Templates shorter than this cannot hold a placeholder and are never scanned
 */
export const MIN_SCANNED_LENGTH = 3;

/**
 * Result of scanning a message template
 */
export interface ParsedTemplate {
  /** Template with every name replaced by its zero-based position */
  canonicalFormat: string;
  /** Placeholder names, left to right, one per positional slot */
  valueNames: readonly string[];
  /** True when the template was too short to be scanned */
  bypassed: boolean;
}

/**
 * Find the boundary brace for `policy` in `format[startIndex, endIndex)`.
 *
 * Returns `endIndex` when no unescaped brace exists in the range. A run that
 * reaches `endIndex` is returned as found, even when it is even.
 *
 * @example
 * ```typescript
 * findBraceIndex("{{prefix{{{Arg}}}suffix}}", OPEN_BRACE_POLICY, 0, 25); // 10
 * ```
 */
export function findBraceIndex(
  format: string,
  policy: BracePolicy,
  startIndex: number,
  endIndex: number
): number {
  let braceIndex = endIndex;
  let runLength = 0;

  for (let scanIndex = startIndex; scanIndex < endIndex; scanIndex++) {
    const char = format[scanIndex];

    if (runLength > 0 && char !== policy.brace) {
      if (runLength % 2 === 0) {
        // Escaped pair(s); keep looking past them
        runLength = 0;
        braceIndex = endIndex;
      } else {
        break;
      }
    } else if (char === policy.brace) {
      if (policy.pick === "last" || runLength === 0) {
        braceIndex = scanIndex;
      }
      runLength++;
    }
  }

  return braceIndex;
}

/**
 * Index of the first `,` or `:` in `format[startIndex, endIndex)`, or `endIndex`
 */
function findFormatDelimiter(format: string, startIndex: number, endIndex: number): number {
  for (let index = startIndex; index < endIndex; index++) {
    const char = format[index];
    if (char !== undefined && FORMAT_DELIMITERS.includes(char)) {
      return index;
    }
  }
  return endIndex;
}

/**
 * Scan a message template once, producing its positional form and names.
 *
 * Unterminated or unbalanced braces are kept as literal text; this function
 * never throws.
 */
export function parseTemplate(format: string): ParsedTemplate {
  const endIndex = format.length;

  if (endIndex < MIN_SCANNED_LENGTH) {
    return { canonicalFormat: format, valueNames: [], bypassed: true };
  }

  const output: string[] = [];
  const valueNames: string[] = [];
  let scanIndex = 0;

  while (scanIndex < endIndex) {
    const openBraceIndex = findBraceIndex(format, OPEN_BRACE_POLICY, scanIndex, endIndex);
    const closeBraceIndex = findBraceIndex(format, CLOSE_BRACE_POLICY, openBraceIndex, endIndex);

    if (closeBraceIndex === endIndex) {
      output.push(format.slice(scanIndex));
      break;
    }

    const delimiterIndex = findFormatDelimiter(format, openBraceIndex, closeBraceIndex);

    output.push(format.slice(scanIndex, openBraceIndex + 1));
    output.push(String(valueNames.length));
    valueNames.push(format.slice(openBraceIndex + 1, delimiterIndex));
    output.push(format.slice(delimiterIndex, closeBraceIndex + 1));

    scanIndex = closeBraceIndex + 1;
  }

  return { canonicalFormat: output.join(""), valueNames, bypassed: false };
}
