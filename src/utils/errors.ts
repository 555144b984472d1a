/**
 * Standard error classes for FieldScope
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  PARSE_ERROR = "PARSE_ERROR",
}

export class FieldScopeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FieldScopeError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends FieldScopeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends FieldScopeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends FieldScopeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

export class ParseError extends FieldScopeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.PARSE_ERROR, message, details, options);
    this.name = "ParseError";
  }
}

/**
 * Node system errors carry a string `code` such as ENOENT or EACCES
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    "syscall" in error
  );
}

/**
 * Wrap a failure raised while reading `path` into the matching FieldScope error
 */
export function toReadError(error: unknown, path: string): FieldScopeError {
  if (error instanceof FieldScopeError) {
    return error;
  }
  if (isSystemError(error)) {
    const reason = error.code === "ENOENT" ? "File not found" : "Failed to read file";
    return new FileIOError(`${reason}: ${path}`, { code: error.code }, { cause: error });
  }
  if (error instanceof Error && "code" in error && typeof error.code === "string" && error.code.startsWith("CSV_")) {
    return new ParseError(`Failed to parse delimited records in ${path}: ${error.message}`, { code: error.code }, { cause: error });
  }
  return new FieldScopeError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
