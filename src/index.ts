/**
 * logtemplate - named message templates for structured logging
 *
 * @packageDocumentation
 */

export { VERSION } from "./version.js";

// Templates
export {
  LogValuesFormatter,
  FormattedLogValues,
  parseTemplate,
  findBraceIndex,
  OPEN_BRACE_POLICY,
  CLOSE_BRACE_POLICY,
  MIN_SCANNED_LENGTH,
  NULL_VALUE,
  NULL_FORMAT,
  ORIGINAL_FORMAT_KEY,
} from "./templates/index.js";
export type { BracePolicy, ParsedTemplate, LogValue } from "./templates/index.js";

// Positional formatting
export { formatComposite, formatValue, formatNumber, formatDate } from "./format/index.js";
export type { FormatItem } from "./format/index.js";

// Library utilities
export {
  // Errors
  LogTemplateError,
  FormatError,
  IndexOutOfRangeError,
  ValidationError,
  ConfigError,
  // Result
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
  LOG_LEVEL_NAMES,
} from "./lib/index.js";
export type { Result, LogLevel, LogFormat, Logger } from "./lib/index.js";
