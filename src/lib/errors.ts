/**
 * Base error class for all logtemplate errors
 */
export class LogTemplateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "LogTemplateError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error raised by the positional format engine
 */
export class FormatError extends LogTemplateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "FORMAT_ERROR", context);
    this.name = "FormatError";
  }
}

/**
 * Error for an index outside `[0, length)`
 */
export class IndexOutOfRangeError extends LogTemplateError {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(`Index ${index} is outside the range [0, ${length})`, "INDEX_OUT_OF_RANGE", {
      index,
      length,
    });
    this.name = "IndexOutOfRangeError";
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends LogTemplateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends LogTemplateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}
