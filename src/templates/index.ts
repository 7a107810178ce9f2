/**
 * Message Template Module
 *
 * Named message templates for structured logging:
 * - Scan `{Name[,alignment][:format]}` placeholders once per template
 * - Render against positional arguments
 * - Extract name/value pairs ending with `{OriginalFormat}`
 *
 * @example
 * ```typescript
 * import { LogValuesFormatter } from "@/templates";
 *
 * const formatter = new LogValuesFormatter("Took {Elapsed:F1} ms");
 * formatter.format([12.34]);     // "Took 12.3 ms"
 * formatter.valueNames;          // ["Elapsed"]
 * ```
 */

export {
  parseTemplate,
  findBraceIndex,
  OPEN_BRACE_POLICY,
  CLOSE_BRACE_POLICY,
  MIN_SCANNED_LENGTH,
  type BracePolicy,
  type ParsedTemplate,
} from "./scanner.js";
export {
  LogValuesFormatter,
  NULL_VALUE,
  ORIGINAL_FORMAT_KEY,
  type LogValue,
} from "./formatter.js";
export { FormattedLogValues, NULL_FORMAT } from "./formatted-log-values.js";
